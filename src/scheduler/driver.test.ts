import { describe, it } from "node:test";
import assert from "node:assert";
import { setTimeout as sleep } from "node:timers/promises";
import { createScheduler, ScheduledJob } from "./driver.js";
import { T0, silentLogger } from "../test-support.js";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("scheduler", () => {
  it("runs a triggered job with the clock's time", async () => {
    const seen: Date[] = [];
    const job: ScheduledJob<string> = {
      id: "ingest",
      name: "Process incoming emails",
      intervalMs: 60_000,
      run: async now => {
        seen.push(now);
        return "done";
      }
    };
    const scheduler = createScheduler({ jobs: [job], clock: () => T0, logger: silentLogger });

    assert.strictEqual(await scheduler.trigger("ingest"), "done");
    assert.deepStrictEqual(seen, [T0]);
    assert.deepStrictEqual(scheduler.status(), {
      running: false,
      jobs: [
        {
          id: "ingest",
          name: "Process incoming emails",
          intervalMs: 60_000,
          running: false,
          runs: 1,
          lastRunAt: T0.toISOString(),
          lastError: null,
          nextRunAt: null
        }
      ]
    });
  });

  it("joins a run already in progress instead of starting another", async () => {
    const gate = deferred<number>();
    let calls = 0;
    const scheduler = createScheduler({
      jobs: [{ id: "sla_sweep", name: "sweep", intervalMs: 60_000, run: () => { calls++; return gate.promise; } }],
      logger: silentLogger
    });

    const a = scheduler.trigger("sla_sweep");
    const b = scheduler.trigger("sla_sweep");
    assert.strictEqual(scheduler.status().jobs[0].running, true);
    gate.resolve(7);

    assert.deepStrictEqual(await Promise.all([a, b]), [7, 7]);
    assert.strictEqual(calls, 1);
  });

  it("never overlaps a job with itself on its interval", async () => {
    let active = 0;
    let maxActive = 0;
    let runs = 0;
    const scheduler = createScheduler({
      jobs: [
        {
          id: "slow",
          name: "slow",
          intervalMs: 2,
          run: async () => {
            active++;
            maxActive = Math.max(maxActive, active);
            await sleep(15);
            active--;
            runs++;
          }
        }
      ],
      logger: silentLogger
    });

    scheduler.start();
    await sleep(120);
    await scheduler.stop();

    assert.ok(runs >= 2, `expected at least two runs, got ${runs}`);
    assert.strictEqual(maxActive, 1);
    const after = runs;
    await sleep(30);
    assert.strictEqual(runs, after);
  });

  it("waits for the run in progress when stopped", async () => {
    const gate = deferred<void>();
    let finished = false;
    const scheduler = createScheduler({
      jobs: [{ id: "ingest", name: "ingest", intervalMs: 60_000, run: async () => { await gate.promise; finished = true; } }],
      logger: silentLogger
    });
    scheduler.start();
    const run = scheduler.trigger("ingest");

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await sleep(5);
    assert.strictEqual(stopped, false);

    gate.resolve();
    await Promise.all([run, stopping]);
    assert.strictEqual(finished, true);
    assert.strictEqual(scheduler.status().jobs[0].nextRunAt, null);
  });

  it("records the last failure and clears it on success", async () => {
    let fail = true;
    const scheduler = createScheduler({
      jobs: [{ id: "ingest", name: "ingest", intervalMs: 60_000, run: async () => { if (fail) throw new Error("source offline"); } }],
      logger: silentLogger
    });

    await assert.rejects(scheduler.trigger("ingest"), /source offline/);
    assert.strictEqual(scheduler.status().jobs[0].lastError, "source offline");
    fail = false;
    await scheduler.trigger("ingest");
    assert.strictEqual(scheduler.status().jobs[0].lastError, null);
    assert.strictEqual(scheduler.status().jobs[0].runs, 2);
  });

  it("rejects unknown jobs and duplicate ids", async () => {
    const job: ScheduledJob = { id: "a", name: "a", intervalMs: 1000, run: async () => undefined };
    await assert.rejects(createScheduler({ jobs: [job], logger: silentLogger }).trigger("b"), /unknown job: b/);
    assert.throws(() => createScheduler({ jobs: [job, job], logger: silentLogger }), /duplicate job id: a/);
  });
});
