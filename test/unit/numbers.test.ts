import assert from "node:assert/strict";
import test from "node:test";

import { errorMessage } from "../../src/modules/shared/errors.js";
import { deterministicUuidFromSeed } from "../../src/modules/shared/ids.js";
import { clamp, clampUnit, roundTo, sum } from "../../src/modules/shared/numbers.js";

test("clamp bounds values and maps non-finite input to the minimum", () => {
  assert.equal(clamp(5, 0, 3), 3);
  assert.equal(clamp(-1, 0, 3), 0);
  assert.equal(clamp(2, 0, 3), 2);
  assert.equal(clamp(Number.NaN, 1, 3), 1);
  assert.equal(clampUnit(1.4), 1);
  assert.equal(clampUnit(Number.POSITIVE_INFINITY), 0);
});

test("roundTo and sum", () => {
  assert.equal(roundTo(0.8431, 3), 0.843);
  assert.equal(roundTo(12.3456, 2), 12.35);
  assert.equal(sum([]), 0);
  assert.equal(sum([1.5, 2.5, 6]), 10);
});

test("deterministic ids are stable and uuid-shaped", () => {
  const first = deterministicUuidFromSeed("risk:event-1:risk-analysis-v1");
  const second = deterministicUuidFromSeed("risk:event-1:risk-analysis-v1");
  const other = deterministicUuidFromSeed("risk:event-2:risk-analysis-v1");

  assert.equal(first, second);
  assert.notEqual(first, other);
  assert.match(first, /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
});

test("errorMessage reads errors and stringifies anything else", () => {
  assert.equal(errorMessage(new Error("boom")), "boom");
  assert.equal(errorMessage("plain failure"), "plain failure");
});
