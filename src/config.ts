import path from "node:path";
import { z } from "zod";

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value?.toLowerCase() === "true");

const envSchema = z.object({
  NODE_ENV: z.string().optional().default("development"),
  PORT: z.coerce.number().optional().default(8080),
  ADMIN_API_KEY: z.string().min(1),
  DATA_DIR: z.string().optional().default("./data"),
  PENDING_DIR: z.string().optional(),
  APPROVED_DIR: z.string().optional(),
  LEDGER_BACKEND: z.enum(["file", "postgres"]).optional().default("file"),
  LEDGER_FILE: z.string().optional(),
  PGHOST: z.string().optional().default("localhost"),
  PGPORT: z.coerce.number().default(5432),
  POSTGRES_USER: z.string().optional().default("postgres"),
  POSTGRES_PASSWORD: z.string().optional().default(""),
  POSTGRES_DB: z.string().optional().default("curation"),
  DATASET_ENDPOINT: z.string().url(),
  DATASET_REGION: z.string().optional().default("us-east-1"),
  DATASET_ACCESS_KEY: z.string(),
  DATASET_SECRET_KEY: z.string(),
  DATASET_BUCKET: z.string().optional().default("curated-datasets"),
  DATASET_USE_SSL: booleanFlag,
  DATASET_RAW_PREFIX: z.string().optional().default("raw-data"),
  DATASET_CLEANED_PREFIX: z.string().optional().default("cleaned-data"),
  DATASET_CHUNKED_PREFIX: z.string().optional().default("chunked-data"),
  PUSH_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(30000),
  PUSH_CONCURRENCY: z.coerce.number().int().min(1).max(32).optional().default(4),
  SIGNED_URL_TTL: z.coerce.number().optional().default(3600),
});

const env = envSchema.parse(process.env);
const dataDir = path.resolve(env.DATA_DIR);

export const config = {
  env: env.NODE_ENV,
  port: env.PORT,
  apiKey: env.ADMIN_API_KEY,
  storage: {
    dataDir,
    pendingDir: path.resolve(env.PENDING_DIR ?? path.join(dataDir, "pending")),
    approvedDir: path.resolve(env.APPROVED_DIR ?? path.join(dataDir, "approved")),
    journalDir: path.join(dataDir, ".journal"),
  },
  ledger: {
    backend: env.LEDGER_BACKEND,
    file: path.resolve(env.LEDGER_FILE ?? path.join(dataDir, "push-ledger.json")),
  },
  database: {
    host: env.PGHOST,
    port: env.PGPORT,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    database: env.POSTGRES_DB,
  },
  dataset: {
    endpoint: env.DATASET_ENDPOINT,
    region: env.DATASET_REGION,
    accessKey: env.DATASET_ACCESS_KEY,
    secretKey: env.DATASET_SECRET_KEY,
    bucket: env.DATASET_BUCKET,
    useSSL: env.DATASET_USE_SSL,
    prefixes: {
      raw: env.DATASET_RAW_PREFIX.replace(/\/+$/, ""),
      cleaned: env.DATASET_CLEANED_PREFIX.replace(/\/+$/, ""),
      chunked: env.DATASET_CHUNKED_PREFIX.replace(/\/+$/, ""),
    },
    signedUrlTTL: env.SIGNED_URL_TTL,
  },
  publish: {
    timeoutMs: env.PUSH_TIMEOUT_MS,
    concurrency: env.PUSH_CONCURRENCY,
  },
};

export type AppConfig = typeof config;
