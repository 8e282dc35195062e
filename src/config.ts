/**
 * Run configuration.
 * Built-in defaults, overlaid by a JSON file, overlaid by environment variables,
 * then validated as a whole.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { DEFAULT_ROTATE_EVERY } from "./credentials.js";
import { ConfigError, errorMessage } from "./errors.js";

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const CredentialSchema = z.object({
  email: z.string().min(1),
  apiKey: z.string().min(1),
});

const SinkConfigSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("filesystem"),
    dir: z.string().min(1),
  }),
  z.object({
    type: z.literal("s3"),
    bucket: z.string().min(1),
    prefix: z.string(),
    region: z.string().min(1).optional(),
  }),
]);

export const AppConfigSchema = z.object({
  subjects: z.array(z.string().trim().min(1)),
  credentials: z.array(CredentialSchema).min(1, "at least one credential is required"),
  tool: z.string().min(1),
  credentialSelection: z.enum(["per-request", "per-subject"]),
  rotateEvery: positiveInt,
  search: z.object({
    baseUrl: z.string().url(),
    db: z.string().min(1),
    pageSize: positiveInt,
    /** Upstream ceiling on the cumulative result offset */
    maxOffset: positiveInt,
    quoteTerm: z.boolean(),
  }),
  idMap: z.object({
    enabled: z.boolean(),
    baseUrl: z.string().url(),
    chunkSize: positiveInt,
    onMalformed: z.enum(["retry", "fail-chunk"]),
  }),
  download: z.object({
    baseUrl: z.string().url(),
    db: z.string().min(1),
    recordTag: z.string().min(1),
    chunkSize: positiveInt,
    concurrency: positiveInt,
    maxAttempts: positiveInt,
    timeoutMs: positiveInt,
  }),
  retryDelayMs: nonNegativeInt,
  retryJitterMs: nonNegativeInt,
  requestDelayMs: nonNegativeInt,
  requestTimeoutMs: positiveInt,
  subjectConcurrency: positiveInt.optional(),
  subjectCooldownMs: nonNegativeInt,
  sink: SinkConfigSchema,
  reportDir: z.string().min(1),
  fileExtension: z.string(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type SinkConfig = z.infer<typeof SinkConfigSchema>;

const DEFAULT_CONFIG = {
  subjects: [],
  credentials: [],
  tool: "pubmed-bulk-fetch",
  credentialSelection: "per-request",
  rotateEvery: DEFAULT_ROTATE_EVERY,
  search: {
    baseUrl: "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi",
    db: "pubmed",
    pageSize: 10_000,
    maxOffset: 9_999,
    quoteTerm: true,
  },
  idMap: {
    enabled: true,
    baseUrl: "https://www.ncbi.nlm.nih.gov/pmc/utils/idconv/v1.0/",
    chunkSize: 200,
    onMalformed: "retry",
  },
  download: {
    baseUrl: "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi",
    db: "pmc",
    recordTag: "article",
    chunkSize: 100,
    concurrency: 4,
    maxAttempts: 3,
    timeoutMs: 60_000,
  },
  retryDelayMs: 60_000,
  retryJitterMs: 0,
  requestDelayMs: 400,
  requestTimeoutMs: 30_000,
  subjectCooldownMs: 5_000,
  sink: { type: "filesystem", dir: "data/documents" },
  reportDir: "reports",
  fileExtension: ".xml",
} satisfies AppConfig;

type RawObject = Record<string, unknown>;
type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath?: string): RawObject {
  if (!configPath) return {};

  const absolutePath = resolve(configPath);
  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(absolutePath, "utf-8"));
  } catch (err) {
    const reason = errorMessage(err);
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, [reason]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

/** Unset stays unset; anything else becomes a number (NaN fails validation). */
function toInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function defined(entries: RawObject): RawObject {
  return Object.fromEntries(Object.entries(entries).filter(([, v]) => v !== undefined));
}

function mergeSection(...layers: unknown[]): RawObject {
  return layers.reduce<RawObject>((acc, layer) => (isRecord(layer) ? { ...acc, ...layer } : acc), {});
}

/**
 * Sink type from SINK_TYPE, else the file, else the default. The file's fields
 * are kept when its type matches; env fields for that type are laid over them.
 */
function mergeSink(fileSink: RawObject | undefined, env: Env): RawObject {
  const envType = env.SINK_TYPE?.trim().toLowerCase();
  const type = envType || (typeof fileSink?.type === "string" ? fileSink.type : DEFAULT_CONFIG.sink.type);

  let base: RawObject = {};
  if (fileSink && fileSink.type === type) base = fileSink;
  else if (type === DEFAULT_CONFIG.sink.type) base = DEFAULT_CONFIG.sink;
  if (type === "s3") base = { prefix: "", ...base };

  const overrides =
    type === "s3"
      ? defined({ bucket: env.S3_BUCKET, prefix: env.S3_PREFIX, region: env.AWS_REGION })
      : defined({ dir: env.SINK_DIR });
  return { ...base, ...overrides, type };
}

function credentialsFromEnv(env: Env): RawObject[] {
  if (!env.NCBI_EMAIL || !env.NCBI_API_KEY) return [];
  return [{ email: env.NCBI_EMAIL, apiKey: env.NCBI_API_KEY }];
}

/**
 * Load and validate the configuration.
 *
 * @param configPath - Optional JSON file merged over the defaults
 * @param env - Environment used for overrides (default: process.env)
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const file = readConfigFile(configPath);

  const fileCredentials = Array.isArray(file.credentials) ? file.credentials : [];
  const fileSink = isRecord(file.sink) ? file.sink : undefined;

  const merged: RawObject = {
    ...DEFAULT_CONFIG,
    ...file,
    ...defined({
      retryDelayMs: toInt(env.RETRY_DELAY_MS),
      requestDelayMs: toInt(env.REQUEST_DELAY_MS),
      subjectConcurrency: toInt(env.SUBJECT_CONCURRENCY),
      reportDir: env.REPORT_DIR,
    }),
    credentials: [...fileCredentials, ...credentialsFromEnv(env)],
    search: mergeSection(DEFAULT_CONFIG.search, file.search, defined({ pageSize: toInt(env.PAGE_SIZE) })),
    idMap: mergeSection(DEFAULT_CONFIG.idMap, file.idMap, defined({ chunkSize: toInt(env.IDMAP_CHUNK_SIZE) })),
    download: mergeSection(
      DEFAULT_CONFIG.download,
      file.download,
      defined({
        chunkSize: toInt(env.DOWNLOAD_CHUNK_SIZE),
        concurrency: toInt(env.DOWNLOAD_CONCURRENCY),
        maxAttempts: toInt(env.DOWNLOAD_MAX_ATTEMPTS),
      })
    ),
    sink: mergeSink(fileSink, env),
  };

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError("Invalid configuration", issues);
  }
  return result.data;
}

export { DEFAULT_CONFIG };
