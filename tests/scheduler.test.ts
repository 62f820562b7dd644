import { describe, it, expect, vi, afterEach } from "vitest";
import { nextRunAt, parseRunTime, PipelineScheduler } from "../src/pipeline/scheduler.js";
import type { RunReport } from "../src/pipeline/runner.js";
import { fakeLogger } from "./helpers.js";

const EMPTY_REPORT: RunReport = {
  mode: "enrich-unenriched",
  processed: 0,
  splitDone: 0,
  enrichedSingle: 0,
  failed: 0,
  stories: 0,
  costEstimate: 0,
  outcomes: [],
};

describe("run times", () => {
  it("parses HH:MM", () => {
    expect(parseRunTime("07:30")).toEqual({ hours: 7, minutes: 30 });
    expect(parseRunTime("24:00")).toBeNull();
    expect(parseRunTime("7pm")).toBeNull();
  });

  it("schedules later today or tomorrow", () => {
    const now = new Date(2026, 2, 2, 10, 0, 0);

    expect(nextRunAt({ hours: 13, minutes: 0 }, now)).toEqual(new Date(2026, 2, 2, 13, 0, 0));
    expect(nextRunAt({ hours: 7, minutes: 0 }, now)).toEqual(new Date(2026, 2, 3, 7, 0, 0));
    expect(nextRunAt({ hours: 10, minutes: 0 }, now)).toEqual(new Date(2026, 2, 3, 10, 0, 0));
  });
});

describe("PipelineScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("never runs two pipelines at once", async () => {
    let finish: (report: RunReport) => void = () => {};
    const run = vi.fn(
      () =>
        new Promise<RunReport>((resolve) => {
          finish = resolve;
        })
    );
    const scheduler = new PipelineScheduler({ run }, { runTimes: [], logger: fakeLogger() });

    const first = scheduler.trigger();
    expect(scheduler.isRunning()).toBe(true);
    expect(await scheduler.trigger()).toBeNull();

    finish(EMPTY_REPORT);
    expect(await first).toBe(EMPTY_REPORT);
    expect(scheduler.isRunning()).toBe(false);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("drains the run in progress before returning", async () => {
    let finish: (report: RunReport) => void = () => {};
    const run = vi.fn(
      () =>
        new Promise<RunReport>((resolve) => {
          finish = resolve;
        })
    );
    const scheduler = new PipelineScheduler({ run }, { runTimes: [], logger: fakeLogger() });

    await scheduler.drain();

    const first = scheduler.trigger();
    let drained = false;
    const draining = scheduler.drain().then(() => {
      drained = true;
    });
    await Promise.resolve();
    expect(drained).toBe(false);

    finish(EMPTY_REPORT);
    await draining;
    expect(drained).toBe(true);
    expect(await first).toBe(EMPTY_REPORT);
  });

  it("logs a run that fails while draining", async () => {
    let fail: (error: Error) => void = () => {};
    const run = vi.fn(
      () =>
        new Promise<RunReport>((_, reject) => {
          fail = reject;
        })
    );
    const logger = fakeLogger();
    const scheduler = new PipelineScheduler({ run }, { runTimes: [], logger });

    const first = scheduler.trigger().catch((error: unknown) => error);
    const draining = scheduler.drain();
    fail(new Error("overloaded"));

    await draining;
    expect(logger.error).toHaveBeenCalledWith(
      "Pipeline run failed while draining:",
      new Error("overloaded")
    );
    expect(await first).toEqual(new Error("overloaded"));
  });

  it("runs at the configured time and again the next day", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 2, 2, 6, 0, 0));
    const run = vi.fn(async () => EMPTY_REPORT);
    const scheduler = new PipelineScheduler({ run }, { runTimes: ["07:00"], logger: fakeLogger() });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(59 * 60 * 1000);
    expect(run).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(60 * 1000);
    expect(run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    expect(run).toHaveBeenCalledTimes(2);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(48 * 60 * 60 * 1000);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("logs a failed scheduled run and keeps the schedule", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 2, 2, 6, 0, 0));
    const logger = fakeLogger();
    const failure = new Error("database is locked");
    const run = vi.fn(async (): Promise<RunReport> => {
      throw failure;
    });
    const scheduler = new PipelineScheduler({ run }, { runTimes: ["07:00"], logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(60 * 60 * 1000);

    expect(logger.error).toHaveBeenCalledWith("Scheduled pipeline run failed:", failure);
    expect(scheduler.isRunning()).toBe(false);

    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    expect(run).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });
});
