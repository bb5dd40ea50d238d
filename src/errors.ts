// src/errors.ts
export class BfError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnmatchedBracketsError extends BfError {
  constructor() {
    super('Unmatched brackets');
  }
}

/**
 * Raised when a cell sequence cannot grow any further. There is no recovery
 * from this; the CLI terminates on it.
 */
export class AllocationError extends BfError {
  constructor(public readonly detail: string) {
    super(`Memory allocation failed: ${detail}`);
  }
}

/** The reader of the program's output went away (EPIPE). */
export class OutputClosedError extends BfError {
  constructor() {
    super('Output closed');
  }
}
