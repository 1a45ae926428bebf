/**
 * Discrete Cosine Transform, Type II, with orthonormal scaling
 *
 *   X[k] = s(k) * Σ_{n=0}^{N-1} x[n] * cos(π/N * (n + 0.5) * k),  k = 0..N-1
 *
 * where s(0) = sqrt(1/N) and s(k) = sqrt(2/N) for k >= 1. With this scaling
 * the transform matrix is orthogonal: its transpose (the orthonormal DCT-III)
 * is its inverse and the sum of squares is preserved.
 *
 * Computed by direct summation in double precision, O(N²) time.
 */

import { InvalidInputError } from "./errors.js";
import type { DctOptions, NumericSequence } from "./types.js";

/**
 * Compute the orthonormal DCT-II of a real signal.
 *
 * The input is never modified. Float32Array input is widened to double
 * precision before summation; the result is always a Float64Array.
 *
 * Inputs near the limits of the double range can overflow during summation.
 * That is not an error: the non-finite coefficients are returned as computed
 * and reported through `options.onLog` at "warn" level.
 *
 * @param signal - Input samples (length N >= 1, all finite)
 * @param options - Optional log callback and output buffer
 * @returns DCT coefficients, index k is frequency bin k
 * @throws {TypeError} If signal is not an array-like of numbers
 * @throws {InvalidInputError} If signal is empty or holds NaN/Infinity
 * @throws {RangeError} If options.output has the wrong length or shares memory with signal
 *
 * @example
 * ```typescript
 * const coeffs = dct([-1, 2, 3, 6, -3, -2, 0, 3]);
 * // coeffs[0] = sqrt(1/8) * 8 ≈ 2.828 (scaled mean)
 * ```
 *
 * @example
 * ```typescript
 * // Energy compaction: a smooth ramp concentrates in the first bins
 * const ramp = Float64Array.from({ length: 16 }, (_, i) => i);
 * const coeffs = dct(ramp);
 * const lowBandEnergy = coeffs[0] ** 2 + coeffs[1] ** 2;
 * // lowBandEnergy / DctUtils.energy(coeffs) > 0.99
 * ```
 */
export function dct(
  signal: NumericSequence,
  options?: DctOptions
): Float64Array {
  DctUtils.validate(signal);

  const n = signal.length;
  const output = resolveOutput(signal, n, options?.output);

  const angleStep = Math.PI / n;
  const dcScale = Math.sqrt(1 / n);
  const acScale = Math.sqrt(2 / n);

  for (let k = 0; k < n; k++) {
    let sum = 0;
    for (let i = 0; i < n; i++) {
      sum += signal[i] * Math.cos(angleStep * (i + 0.5) * k);
    }
    output[k] = sum * (k === 0 ? dcScale : acScale);
  }

  const onLog = options?.onLog;
  if (onLog) {
    const overflowed: number[] = [];
    for (let k = 0; k < n; k++) {
      if (!Number.isFinite(output[k])) {
        overflowed.push(k);
      }
    }
    if (overflowed.length > 0) {
      onLog("warn", "dct produced non-finite coefficients", {
        length: n,
        indices: overflowed,
      });
    }
    onLog("debug", "dct computed", { length: n });
  }

  return output;
}

function resolveOutput(
  signal: NumericSequence,
  n: number,
  output: Float64Array | undefined
): Float64Array {
  if (output === undefined) {
    return new Float64Array(n);
  }
  if (!(output instanceof Float64Array)) {
    throw new TypeError("Output must be a Float64Array");
  }
  if (output.length !== n) {
    throw new RangeError(
      `Output length must match signal: output.length=${output.length}, signal.length=${n}`
    );
  }
  if (ArrayBuffer.isView(signal) && signal.buffer === output.buffer) {
    throw new RangeError("Output must not share memory with the signal");
  }
  return output;
}

/**
 * Helper functions around the DCT
 */
export namespace DctUtils {
  /**
   * Check a signal against the transform's input contract without
   * transforming it.
   *
   * @throws {TypeError} If signal is not an array-like of numbers
   * @throws {InvalidInputError} If signal is empty or holds NaN/Infinity
   */
  export function validate(signal: NumericSequence): void {
    if (
      signal === null ||
      typeof signal !== "object" ||
      typeof signal.length !== "number"
    ) {
      throw new TypeError("Signal must be an array or typed array of numbers");
    }

    if (signal.length === 0) {
      throw InvalidInputError.emptySequence();
    }

    for (let i = 0; i < signal.length; i++) {
      const value = signal[i];
      if (typeof value !== "number") {
        throw new TypeError(
          `Signal must contain only numbers: got ${typeof value} at index ${i}`
        );
      }
      if (!Number.isFinite(value)) {
        throw InvalidInputError.nonFiniteValue(i, value);
      }
    }
  }

  /**
   * Orthonormal scale factor applied to bin k of an N-point DCT-II
   *
   * @returns sqrt(1/n) for k = 0, sqrt(2/n) otherwise
   *
   * @example
   * ```ts
   * DctUtils.orthoScale(0, 8); // 0.35355... = sqrt(1/8)
   * DctUtils.orthoScale(3, 8); // 0.5       = sqrt(2/8)
   * ```
   */
  export function orthoScale(k: number, n: number): number {
    if (!Number.isInteger(n) || n < 1) {
      throw new RangeError(`Transform size must be a positive integer: ${n}`);
    }
    if (!Number.isInteger(k) || k < 0 || k >= n) {
      throw new RangeError(`Bin index must be an integer in [0, ${n - 1}]: ${k}`);
    }
    return k === 0 ? Math.sqrt(1 / n) : Math.sqrt(2 / n);
  }

  /**
   * Input-domain cosine basis for bin k: cos(π/n * (i + 0.5) * k), i = 0..n-1
   *
   * Its DCT is zero everywhere except bin k, where it equals
   * sqrt(n) for k = 0 and sqrt(n/2) otherwise.
   */
  export function basisVector(k: number, n: number): Float64Array {
    // same argument checks as the scale factor
    orthoScale(k, n);

    const basis = new Float64Array(n);
    const angleStep = Math.PI / n;
    for (let i = 0; i < n; i++) {
      basis[i] = Math.cos(angleStep * (i + 0.5) * k);
    }
    return basis;
  }

  /**
   * Sum of squares, accumulated in double precision
   */
  export function energy(sequence: NumericSequence): number {
    let total = 0;
    for (let i = 0; i < sequence.length; i++) {
      total += sequence[i] * sequence[i];
    }
    return total;
  }
}
