import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{git,cache,output,temp}/**',
    ],
    environment: 'node',
    setupFiles: ['tests/setup-env.ts'],
    allowOnly: false,
    isolate: true,
    clearMocks: true,
    testTimeout: 30000,
    hookTimeout: 30000,
    passWithNoTests: false,
  },
})
