import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { formatSequence } from "../../../examples/dct-example.js";
import { dct } from "../index.js";

describe("dct-example formatting", () => {
  test("should join values with a fixed number of decimals", () => {
    assert.equal(formatSequence([1, -0.12345], 3), "1.000,-0.123");
    assert.equal(formatSequence(new Float64Array([2.5]), 1), "2.5");
    assert.equal(formatSequence([]), "");
  });

  test("should print the reference scenario", () => {
    const points = [-1.0, 2.0, 3.0, 6.0, -3.0, -2.0, 0.0, 3.0];

    assert.equal(
      formatSequence(points),
      "-1.000,2.000,3.000,6.000,-3.000,-2.000,0.000,3.000"
    );
    assert.equal(
      formatSequence(dct(points)),
      "2.828,1.137,-0.271,-6.810,0.707,2.137,-0.653,-3.281"
    );
  });
});
