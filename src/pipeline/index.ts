export {
  PipelineRunner,
  DEFAULT_STALE_AFTER_MS,
  type RunMode,
  type RunOptions,
  type RunReport,
  type DocumentOutcome,
  type PipelineRunnerConfig,
} from "./runner.js";
export {
  PipelineScheduler,
  parseRunTime,
  nextRunAt,
  type SchedulerConfig,
  type ScheduledPipeline,
} from "./scheduler.js";
export { parsePipelineArgs, PIPELINE_USAGE, type PipelineCommand } from "./cli.js";
