export type PipelineCommand =
  | { mode: "enrich-unenriched"; limit?: number; since?: string }
  | { mode: "reenrich"; last: number }
  | { mode: "enrich-id"; id: string }
  | { mode: "stats" };

export const PIPELINE_USAGE = `Usage:
  run-pipeline --enrich-unenriched [--limit N] [--since ISO_DATE]
  run-pipeline --reenrich --last N
  run-pipeline --enrich-id ID
  run-pipeline --stats`;

function positiveInt(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (!value || !Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${flag} expects a positive integer, got "${value ?? ""}"`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (!value || value.startsWith("--")) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

function switchMode(
  current: PipelineCommand["mode"] | null,
  next: PipelineCommand["mode"]
): PipelineCommand["mode"] {
  if (current && current !== next) {
    throw new Error(`Conflicting modes: --${current} and --${next}`);
  }
  return next;
}

/** Parse the arguments after the script name. No mode means enrich-unenriched. */
export function parsePipelineArgs(args: readonly string[]): PipelineCommand {
  let mode: PipelineCommand["mode"] | null = null;
  let limit: number | undefined;
  let since: string | undefined;
  let last: number | undefined;
  let id: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--enrich-unenriched":
        mode = switchMode(mode, "enrich-unenriched");
        break;
      case "--reenrich":
        mode = switchMode(mode, "reenrich");
        break;
      case "--stats":
        mode = switchMode(mode, "stats");
        break;
      case "--enrich-id":
        mode = switchMode(mode, "enrich-id");
        id = requireValue(arg, args[++i]);
        break;
      case "--last":
        last = positiveInt(arg, args[++i]);
        break;
      case "--limit":
        limit = positiveInt(arg, args[++i]);
        break;
      case "--since": {
        since = requireValue(arg, args[++i]);
        if (Number.isNaN(new Date(since).getTime())) {
          throw new Error(`--since expects a date, got "${since}"`);
        }
        since = new Date(since).toISOString();
        break;
      }
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  switch (mode ?? "enrich-unenriched") {
    case "reenrich":
      if (last === undefined) {
        throw new Error("--reenrich requires --last N");
      }
      return { mode: "reenrich", last };
    case "enrich-id":
      if (id === undefined) {
        throw new Error("--enrich-id requires an id");
      }
      return { mode: "enrich-id", id };
    case "stats":
      return { mode: "stats" };
    default:
      return { mode: "enrich-unenriched", limit, since };
  }
}
