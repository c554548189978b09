// Keep test output clean and never pick up a developer's real credentials or renderer overrides.
process.env.NODE_ENV = 'test'
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent'

delete process.env.OPENROUTER_API_KEY
delete process.env.OPENROUTER_BASE_URL
delete process.env.OPENROUTER_MODEL
delete process.env.RENDERCV_COMMAND
