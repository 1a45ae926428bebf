/**
 * Reference scenario: transform eight sample points and print the
 * orthonormal DCT-II coefficients.
 *
 * Run with: node --import tsx examples/dct-example.ts
 */

import { pathToFileURL } from "node:url";
import {
  dct,
  DctUtils,
  Logger,
  TextFormatter,
  createConsoleHandler,
  createLogCallback,
} from "../src/ts/index.js";

/**
 * Render a sequence as comma-separated values with a fixed number of decimals
 */
export function formatSequence(
  values: ArrayLike<number>,
  precision: number = 3
): string {
  return Array.from(values, (v) => v.toFixed(precision)).join(",");
}

async function main() {
  const logger = new Logger(
    [createConsoleHandler({ formatter: new TextFormatter() })],
    { minLevel: "info" }
  ).child("example");

  const points = [-1.0, 2.0, 3.0, 6.0, -3.0, -2.0, 0.0, 3.0];
  console.log(`Points: ${formatSequence(points)}`);

  const coeffs = dct(points, { onLog: createLogCallback(logger) });
  console.log(`DCT: ${formatSequence(coeffs)}`);

  // Orthonormal scaling preserves energy
  await logger.info("Energy check", "parseval", {
    input: DctUtils.energy(points),
    output: DctUtils.energy(coeffs),
  });

  await logger.flushAll();
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
