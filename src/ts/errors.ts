import type { InvalidInputReason } from "./types.js";

/**
 * Raised when a signal violates the transform's input contract.
 *
 * Extends RangeError so callers that already catch the library's range
 * checks keep working; `reason` tells the two cases apart.
 *
 * @example
 * ```typescript
 * try {
 *   dct([1, NaN, 3]);
 * } catch (error) {
 *   if (error instanceof InvalidInputError && error.reason === "NonFiniteValue") {
 *     console.log(`Bad sample at ${error.index}`); // Bad sample at 1
 *   }
 * }
 * ```
 */
export class InvalidInputError extends RangeError {
  readonly reason: InvalidInputReason;
  /** Position of the offending sample (NonFiniteValue only) */
  readonly index?: number;
  /** The offending sample itself (NonFiniteValue only) */
  readonly value?: number;

  constructor(
    reason: InvalidInputReason,
    message: string,
    details: { index?: number; value?: number } = {}
  ) {
    super(message);
    this.name = "InvalidInputError";
    this.reason = reason;
    this.index = details.index;
    this.value = details.value;
  }

  static emptySequence(): InvalidInputError {
    return new InvalidInputError(
      "EmptySequence",
      "Signal must contain at least one sample"
    );
  }

  static nonFiniteValue(index: number, value: number): InvalidInputError {
    return new InvalidInputError(
      "NonFiniteValue",
      `Signal contains a non-finite value at index ${index}: ${value}`,
      { index, value }
    );
  }
}
