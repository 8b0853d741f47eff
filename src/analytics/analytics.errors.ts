/**
 * Raised when a caller breaks an engine contract (mismatched input arrays,
 * negative rank limit, unknown grouping key). These are caller bugs and
 * are never caught inside the engine.
 */
export class ContractViolationError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
  ) {
    super(`[${operation}] ${message}`);
    this.name = 'ContractViolationError';
  }
}
