import { consoleLogger, type Logger } from "../logger.js";
import type { RunReport } from "./runner.js";

export interface SchedulerConfig {
  runTimes: string[]; // ["07:00", "13:00", "19:00"]
  logger?: Logger;
}

export interface ScheduledPipeline {
  run(): Promise<RunReport>;
}

export function parseRunTime(time: string): { hours: number; minutes: number } | null {
  const match = time.match(/^(\d{1,2}):(\d{2})$/);
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;

  return { hours, minutes };
}

/** Next local occurrence of HH:MM strictly after `now`. */
export function nextRunAt(time: { hours: number; minutes: number }, now: Date): Date {
  const next = new Date(now);
  next.setHours(time.hours, time.minutes, 0, 0);
  if (next <= now) {
    next.setDate(next.getDate() + 1);
  }
  return next;
}

export class PipelineScheduler {
  private timers = new Map<string, NodeJS.Timeout>();
  private running = false;
  private inFlight: Promise<RunReport> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly pipeline: ScheduledPipeline,
    private readonly config: SchedulerConfig
  ) {
    this.logger = config.logger ?? consoleLogger;
  }

  start(): void {
    if (this.running) {
      this.logger.log("Pipeline scheduler already running");
      return;
    }

    this.running = true;
    for (const time of this.config.runTimes) {
      this.scheduleAt(time);
    }
    this.logger.log(`Pipeline scheduler started (times: ${this.config.runTimes.join(", ")})`);
  }

  stop(): void {
    this.running = false;
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.logger.log("Pipeline scheduler stopped");
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Start a run now. Resolves to null without starting anything when a run
   * is already in progress.
   */
  async trigger(): Promise<RunReport | null> {
    if (this.inFlight) {
      this.logger.warn("Pipeline run already in progress, skipping");
      return null;
    }

    this.inFlight = this.pipeline.run();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  /** Wait for the run in progress, if any, to finish. */
  async drain(): Promise<void> {
    if (!this.inFlight) return;

    this.logger.log("Waiting for the pipeline run in progress...");
    try {
      await this.inFlight;
    } catch (error) {
      this.logger.error("Pipeline run failed while draining:", error);
    }
  }

  private scheduleAt(time: string): void {
    if (!this.running) return;

    const parsed = parseRunTime(time);
    if (!parsed) {
      this.logger.error(`Invalid run time: ${time}`);
      return;
    }

    const now = new Date();
    const next = nextRunAt(parsed, now);
    this.logger.log(`Next pipeline run at ${time} scheduled for ${next.toLocaleString()}`);

    const timer = setTimeout(() => {
      void this.runScheduled().finally(() => this.scheduleAt(time));
    }, next.getTime() - now.getTime());

    this.timers.set(time, timer);
  }

  private async runScheduled(): Promise<void> {
    this.logger.log("Running scheduled pipeline...");
    try {
      await this.trigger();
    } catch (error) {
      this.logger.error("Scheduled pipeline run failed:", error);
    }
  }
}
