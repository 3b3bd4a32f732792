import pino, { Logger } from "pino";
import { errorMessage } from "../core/errors.js";

export interface ScheduledJob<R = unknown> {
  id: string;
  name: string;
  intervalMs: number;
  run(now: Date): Promise<R>;
}

export interface JobStatus {
  id: string;
  name: string;
  intervalMs: number;
  running: boolean;
  runs: number;
  lastRunAt: string | null;
  lastError: string | null;
  nextRunAt: string | null;
}

interface JobState {
  job: ScheduledJob;
  timer: NodeJS.Timeout | null;
  inFlight: Promise<unknown> | null;
  runs: number;
  lastRunAt: string | null;
  lastError: string | null;
  nextRunAt: string | null;
}

/**
 * Runs each job on its own interval. A job never overlaps itself: a tick or
 * trigger that arrives mid-run joins the run in progress. The next tick is
 * armed only after a run settles.
 */
export function createScheduler(args: {
  jobs: ScheduledJob[];
  clock?: () => Date;
  logger?: Logger;
}) {
  const log = (args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "scheduler" });
  const clock = args.clock ?? (() => new Date());
  const states = new Map<string, JobState>();
  let started = false;

  for (const job of args.jobs) {
    if (states.has(job.id)) throw new Error(`duplicate job id: ${job.id}`);
    states.set(job.id, { job, timer: null, inFlight: null, runs: 0, lastRunAt: null, lastError: null, nextRunAt: null });
  }

  function arm(state: JobState) {
    if (!started) return;
    const at = clock();
    state.nextRunAt = new Date(at.getTime() + state.job.intervalMs).toISOString();
    state.timer = setTimeout(() => {
      state.timer = null;
      runJob(state).catch(err => log.error({ err, jobId: state.job.id }, "scheduler: job failed"));
    }, state.job.intervalMs);
  }

  function runJob(state: JobState): Promise<unknown> {
    if (state.inFlight) return state.inFlight;

    const now = clock();
    const p = (async () => {
      log.debug({ jobId: state.job.id }, "scheduler: job started");
      try {
        const result = await state.job.run(now);
        state.lastError = null;
        return result;
      } catch (err) {
        state.lastError = errorMessage(err);
        throw err;
      } finally {
        state.runs++;
        state.lastRunAt = now.toISOString();
      }
    })().finally(() => {
      state.inFlight = null;
      if (!state.timer) arm(state);
    });

    state.inFlight = p;
    return p;
  }

  function start() {
    if (started) return;
    started = true;
    for (const state of states.values()) arm(state);
    log.info(
      { jobs: [...states.values()].map(s => ({ id: s.job.id, intervalMs: s.job.intervalMs })) },
      "scheduler: started"
    );
  }

  /** Clears every timer and waits for runs in progress to settle. */
  async function stop() {
    started = false;
    const inFlight: Promise<unknown>[] = [];
    for (const state of states.values()) {
      if (state.timer) clearTimeout(state.timer);
      state.timer = null;
      state.nextRunAt = null;
      if (state.inFlight) inFlight.push(state.inFlight);
    }
    await Promise.allSettled(inFlight);
    log.info("scheduler: stopped");
  }

  /** Runs a job now, or joins its current run. The regular interval restarts afterwards. */
  function trigger(jobId: string): Promise<unknown> {
    const state = states.get(jobId);
    if (!state) return Promise.reject(new Error(`unknown job: ${jobId}`));
    if (!state.inFlight && state.timer) {
      clearTimeout(state.timer);
      state.timer = null;
    }
    return runJob(state);
  }

  function status(): { running: boolean; jobs: JobStatus[] } {
    return {
      running: started,
      jobs: [...states.values()].map(s => ({
        id: s.job.id,
        name: s.job.name,
        intervalMs: s.job.intervalMs,
        running: s.inFlight !== null,
        runs: s.runs,
        lastRunAt: s.lastRunAt,
        lastError: s.lastError,
        nextRunAt: s.nextRunAt
      }))
    };
  }

  return { start, stop, trigger, status };
}

export type Scheduler = ReturnType<typeof createScheduler>;
