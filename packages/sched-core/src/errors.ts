// ---------------------------------------------------------------------------
// @schedsim/core: Errors
// ---------------------------------------------------------------------------

export type InputIssue = {
  path: string;
  message: string;
};

/** Input rejected at the API boundary (unsorted arrivals, bad quantum, ...). */
export class SchedulingInputError extends Error {
  constructor(public readonly issues: InputIssue[]) {
    super(
      `Invalid scheduling input: ${issues
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'SchedulingInputError';
  }
}

/** A broken internal invariant. Indicates a bug in the engine, never bad input. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(`Scheduler invariant violated: ${message}`);
    this.name = 'InvariantError';
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) throw new InvariantError(message);
}
