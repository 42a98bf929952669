export const VALIDATOR_SYSTEM_PROMPT = `You are a research validator.

Given the user's query and the findings produced by a research agent, judge whether the
research is thorough, accurate and directly relevant to the query. Give a short critique
and, if the research falls short, concrete suggestions for the next search. The system
decides what happens next; you only grade.`;

export function buildValidationPrompt(input: { query: string; findings?: string }): string {
  return `User query: ${input.query}

Research findings:
${input.findings ?? '<<missing>>'}

### OUTPUT FORMAT

Return ONLY valid JSON. No markdown.

{
  "validation_result": "sufficient" | "insufficient",
  "critique": "<short critique>",
  "suggestions": "<what to look for next, or an empty string>"
}
`;
}
