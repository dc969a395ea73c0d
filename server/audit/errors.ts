/**
 * Raised when crawl bookkeeping reaches a state that well-formed input cannot
 * produce. These are bugs, so nothing in the pipeline catches them.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}
