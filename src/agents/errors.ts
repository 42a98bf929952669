/** Model output that cannot be turned into a state update. */
export class AgentOutputError extends Error {
  constructor(
    public readonly agent: string,
    details: string,
    public readonly rawOutput?: string,
    cause?: unknown,
  ) {
    super(`${agent}: ${details}`, { cause });
    this.name = 'AgentOutputError';
  }
}
