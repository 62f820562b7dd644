import { readFileSync } from "node:fs";
import { join } from "node:path";
import { config as loadDotenv } from "dotenv";
import { z, type ZodIssue } from "zod";
import { createRoutingTable, type RoutingTable } from "./enrichment/router.js";
import type { SenderConfig } from "./ingest/index.js";
import { exclusionSetFromCatalog, type ExclusionSet } from "./keywords/exclusions.js";
import type { AnthropicModelConfig } from "./llm/client.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join(", ");
}

// ============ Environment ============

const runTimesSchema = z
  .string()
  .default("07:00,13:00,19:00")
  .transform((value) =>
    value
      .split(",")
      .map((time) => time.trim())
      .filter(Boolean)
  )
  .pipe(z.array(z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM")).min(1));

const envSchema = z.object({
  database: z.object({
    url: z.string().min(1, "DATABASE_URL is required"),
    authToken: z.string().optional(),
  }),
  model: z.object({
    apiKey: z.string().optional(),
    modelId: z.string().min(1).default("claude-haiku-4-5"),
    timeoutMs: z.coerce.number().int().positive().default(60_000),
  }),
  pipeline: z.object({
    concurrency: z.coerce.number().int().min(1).max(16).default(1),
    batchLimit: z.coerce.number().int().positive().default(25),
    runTimes: runTimesSchema,
  }),
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535).default(3000),
    cronSecret: z.string().optional(),
  }),
  configDir: z.string().min(1).default("config"),
});

export type AppConfig = z.infer<typeof envSchema>;

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(options: { env?: NodeJS.ProcessEnv } = {}): AppConfig {
  if (!options.env) {
    loadDotenv();
  }
  const env = options.env ?? process.env;

  const result = envSchema.safeParse({
    database: {
      url: env.DATABASE_URL,
      authToken: blankToUndefined(env.DATABASE_AUTH_TOKEN),
    },
    model: {
      apiKey: blankToUndefined(env.ANTHROPIC_API_KEY),
      modelId: blankToUndefined(env.MODEL_ID),
      timeoutMs: blankToUndefined(env.MODEL_TIMEOUT_MS),
    },
    pipeline: {
      concurrency: blankToUndefined(env.PIPELINE_CONCURRENCY),
      batchLimit: blankToUndefined(env.PIPELINE_BATCH_LIMIT),
      runTimes: blankToUndefined(env.RUN_TIMES),
    },
    server: {
      port: blankToUndefined(env.PORT),
      cronSecret: blankToUndefined(env.CRON_SECRET),
    },
    configDir: blankToUndefined(env.CONFIG_DIR),
  });

  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error.issues)}`);
  }

  return result.data;
}

/** Model settings for a command that calls the model; the key is required there. */
export function modelConfig(config: AppConfig): AnthropicModelConfig {
  if (!config.model.apiKey) {
    throw new ConfigError("Invalid configuration: ANTHROPIC_API_KEY is required");
  }
  return {
    apiKey: config.model.apiKey,
    modelId: config.model.modelId,
    timeoutMs: config.model.timeoutMs,
  };
}

// ============ Pipeline files ============

const behaviorSchema = z.object({
  kind: z.enum(["digest", "single"]),
  language: z.enum(["en", "pt", "auto"]).default("auto"),
});

const routingFileSchema = z.object({
  default: behaviorSchema.default({ kind: "single", language: "auto" }),
  scores: z
    .object({
      digestStory: z.number().min(0).max(10).default(8),
      single: z.number().min(0).max(10).default(7.5),
    })
    .default({}),
  tags: z.record(z.string().min(1), behaviorSchema),
});

const sendersFileSchema = z.object({
  groups: z.array(
    z.object({
      senderTag: z.string().min(1),
      emailPatterns: z.array(z.string().min(1)).min(1),
      active: z.boolean().default(true),
    })
  ),
  rules: z
    .array(
      z.object({
        tag: z.string().min(1),
        group: z.string().min(1).optional(),
        sender: z.string().min(1).optional(),
        subjectContains: z.string().min(1).optional(),
        bodyContains: z.string().min(1).optional(),
        logic: z.enum(["AND", "OR"]).default("OR"),
      })
    )
    .default([]),
  blocked: z
    .object({
      emails: z.array(z.string().min(1)).default([]),
      patterns: z.array(z.string().min(1)).default([]),
    })
    .default({}),
});

const exclusionsFileSchema = z.record(z.string().min(1), z.array(z.string()));

export interface StoryScores {
  digestStory: number;
  single: number;
}

export interface PipelineConfig {
  routing: RoutingTable;
  scores: StoryScores;
  senders: SenderConfig;
  exclusions: ExclusionSet;
}

export interface PipelineFiles {
  routing: unknown;
  senders: unknown;
  exclusions: unknown;
}

function parseFile<S extends z.ZodTypeAny>(name: string, schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid ${name}: ${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

export function parsePipelineConfig(files: PipelineFiles): PipelineConfig {
  const routing = parseFile("routing.json", routingFileSchema, files.routing);
  const senders = parseFile("senders.json", sendersFileSchema, files.senders);
  const exclusions = parseFile("exclusions.json", exclusionsFileSchema, files.exclusions);

  return Object.freeze({
    routing: createRoutingTable(routing.tags, routing.default),
    scores: Object.freeze({ ...routing.scores }),
    senders: Object.freeze(senders),
    exclusions: exclusionSetFromCatalog(exclusions),
  });
}

function readJson(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/** Load and validate routing.json, senders.json and exclusions.json. */
export function loadPipelineConfig(dir: string): PipelineConfig {
  return parsePipelineConfig({
    routing: readJson(join(dir, "routing.json")),
    senders: readJson(join(dir, "senders.json")),
    exclusions: readJson(join(dir, "exclusions.json")),
  });
}
