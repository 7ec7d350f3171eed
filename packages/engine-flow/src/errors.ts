/**
 * Proposal that cannot enter the negotiation flow (missing product, bad volume,
 * malformed targeting). Converted to a rejected Decision by the desk.
 */
export class InvalidProposalError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid proposal: ${issues.join('; ')}`);
    this.name = 'InvalidProposalError';
  }
}

/** An external lookup did not settle within its budget. */
export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}
