/**
 * Error Types
 *
 * Every failure in the stack is thrown as a subclass of ConcentraError.
 * The category tells callers which class of rule was broken; the code
 * identifies the exact condition.
 */

export type ErrorCategory =
  /** Bad input: ticks, price limits, pool keys, pool existence. */
  | "validation"
  /** A value left its representable range. */
  | "arithmetic"
  /** A ledger rule would be broken by completing the operation. */
  | "invariant"
  /** The caller is not allowed to perform the operation. */
  | "access";

/**
 * Base class for structured errors. Always thrown, never returned.
 */
export class ConcentraError<Code extends string = string> extends Error {
  public readonly code: Code;
  public readonly category: ErrorCategory;

  constructor(code: Code, category: ErrorCategory, message: string) {
    super(message);
    this.name = "ConcentraError";
    this.code = code;
    this.category = category;
  }
}
