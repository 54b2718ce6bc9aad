import assert from "node:assert/strict";
import test from "node:test";

import { Pipeline, PipelineStages, countStageData } from "../../src/modules/orchestration/index.js";

function steppingClock(step: number): () => number {
  let current = 0;
  return () => {
    current += step;
    return current;
  };
}

const fixedNow = () => new Date("2026-03-01T10:00:00.000Z");

test("counts stage output", () => {
  assert.equal(countStageData([1, 2, 3]), 3);
  assert.equal(countStageData(null), 0);
  assert.equal(countStageData(undefined), 0);
  assert.equal(countStageData({ plan: 1 }), 1);
});

test("records timing and data counts for successful stages", async () => {
  const pipeline = new Pipeline({ clock: steppingClock(2.5), now: fixedNow });

  const outcome = await pipeline.executeStage(PipelineStages.EVENT_SENSING, () => ["a", "b"]);

  assert.equal(outcome.ok, true);
  assert.deepEqual(outcome.result, {
    stage: "event_sensing",
    success: true,
    error: null,
    duration_ms: 2.5,
    data_count: 2,
    completed_at_utc: "2026-03-01T10:00:00.000Z"
  });
  if (outcome.ok) {
    assert.deepEqual(outcome.data, ["a", "b"]);
  }
});

test("captures handler failures without throwing", async () => {
  const pipeline = new Pipeline({ name: "test-run", clock: steppingClock(1), now: fixedNow });

  await pipeline.executeStage(PipelineStages.EVENT_SENSING, async () => [1]);
  const failed = await pipeline.executeStage(PipelineStages.RISK_ANALYSIS, async () => {
    throw new Error("scorer offline");
  });

  assert.equal(failed.ok, false);
  assert.equal(failed.result.error, "scorer offline");
  assert.equal(failed.result.data_count, 0);

  assert.deepEqual(pipeline.getSummary(), {
    name: "test-run",
    stages_executed: 2,
    stages_successful: 1,
    total_duration_ms: 2,
    results: {
      event_sensing: {
        stage: "event_sensing",
        success: true,
        error: null,
        duration_ms: 1,
        data_count: 1,
        completed_at_utc: "2026-03-01T10:00:00.000Z"
      },
      risk_analysis: {
        stage: "risk_analysis",
        success: false,
        error: "scorer offline",
        duration_ms: 1,
        data_count: 0,
        completed_at_utc: "2026-03-01T10:00:00.000Z"
      }
    }
  });
});

test("a rerun stage replaces its earlier result", async () => {
  const pipeline = new Pipeline({ clock: steppingClock(1), now: fixedNow });

  await pipeline.executeStage(PipelineStages.RECOVERY_PLANNING, () => []);
  await pipeline.executeStage(PipelineStages.RECOVERY_PLANNING, () => [1, 2]);

  assert.equal(pipeline.getResults().length, 1);
  assert.equal(pipeline.getResults()[0]?.data_count, 2);
});
