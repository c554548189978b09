const ROLE_PREAMBLE =
  'You are an expert resume writer and ATS optimization specialist. You will receive a resume in YAML format ' +
  'and a job posting. Your task is to modify ONLY the highlights in the Experience section and the ' +
  'Technologies section to better match the job posting while keeping all other content exactly the same.'

const INSTRUCTIONS = `INSTRUCTIONS:
Please modify the resume to better match this job posting. You must:

1. EXPERIENCE SECTION HIGHLIGHTS:
   - Reorder the highlights (bullet points) within each job in the Experience section
   - Put the most relevant highlights first based on the job posting requirements
   - Keep all highlights but reorder them by relevance to the job posting
   - Do not add, remove, or modify the content of highlights - only reorder them

2. TECHNOLOGIES SECTION:
   - Remove technologies that are not relevant at all to the job posting
   - Keep technologies that are mentioned or very closely related to those in the job posting
   - Reorder the technologies to put the most relevant ones first, and reorder each technology category if needed
   - Add important technologies from the job posting that are missing but would be relevant
   - Only add technologies that are equivalents of, or very closely related to, those already listed in the resume
   - Only modify the "details" field within each technology category
   - Maintain the same technology categories/labels

3. IMPORTANT RESTRICTIONS:
   - ONLY modify the highlights in the Experience section and details in the Technologies section
   - Keep all other sections, formatting, and content exactly the same
   - Return the complete modified YAML with proper formatting
   - Do not change section names, structure, or any other content

CRITICAL: Return ONLY the raw YAML content. Do not wrap it in code blocks, markdown, or any other formatting. Return the YAML exactly as it should be parsed. Be direct and focused in your modifications.`

/** Build the single user message sent to the model. The template is the same for every input pair. */
export function buildTransformationRequest(resume: string, jobPosting: string): string {
  return [
    ROLE_PREAMBLE,
    '',
    'JOB POSTING:',
    jobPosting,
    '',
    'CURRENT RESUME (YAML format):',
    resume,
    '',
    INSTRUCTIONS,
    ''
  ].join('\n')
}
