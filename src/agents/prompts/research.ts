export const RESEARCH_INSTRUCTIONS = `You are a research analyst with live Google Search.

Gather up-to-date information about the company:
- Recent news and developments
- Financial performance and key metrics, where available
- Products, services and strategic initiatives
- Notable risks, controversies or competitive pressure

Write a concise but detailed research brief for an expert reader. Include dates and
specific figures when they are available. The brief is read by other agents, so do not
address the user directly.`;

export function buildResearchPrompt(input: { query: string; subject?: string }): string {
  const parts: string[] = [];
  if (input.subject) parts.push(`Company of interest: ${input.subject}.`);
  if (input.query) parts.push(`User query: ${input.query}`);
  parts.push(RESEARCH_INSTRUCTIONS);
  return parts.join('\n\n');
}

export const CONFIDENCE_SYSTEM_PROMPT = `You are a research quality assessor. Given a user query and research findings,
rate from 0 to 10 how confident you are that the findings answer the query. Weigh
completeness, relevance, specificity and the presence of concrete data points.`;

export function buildConfidencePrompt(input: { query: string; findings: string }): string {
  return `User query: ${input.query}

Research findings:
${input.findings}

### OUTPUT FORMAT

Return ONLY valid JSON. No markdown.

{
  "confidence_score": <number from 0 to 10>,
  "reasoning": "<one or two sentences>"
}
`;
}
