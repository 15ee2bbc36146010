import Joi from "joi";
import { ConfigurationError } from "../errors/transfer.errors";
import type { TransferConfig } from "../models/transfer.model";

const MIB = 1024 * 1024;

interface EnvVars {
  NODE_ENV: string;
  SERVER_PORT: number;
  SERVER_API_KEY?: string;
  PUBLIC_BASE_URL: string;

  S3_ENDPOINT?: string;
  S3_PUBLIC_ENDPOINT?: string;
  S3_REGION: string;
  S3_ACCESS_KEY: string;
  S3_SECRET_KEY: string;
  S3_BUCKET: string;
  S3_FORCE_PATH_STYLE: boolean;
  S3_KEY_PREFIX: string;

  BACKUP_ENABLED: boolean;
  BACKUP_ENDPOINT: string;
  BACKUP_USE_SSL: boolean;
  BACKUP_ACCESS_KEY: string;
  BACKUP_SECRET_KEY: string;
  BACKUP_BUCKET: string;
  BACKUP_KEY_PREFIX: string;
  BACKUP_MANDATORY: boolean;

  CHUNK_SIZE_MB: number;
  MAX_IN_FLIGHT_CHUNKS: number;
  RETRY_MAX_ATTEMPTS: number;
  RETRY_BASE_DELAY_MS: number;
  RETRY_MAX_DELAY_MS: number;
  CHUNK_TIMEOUT_MS: number;
  VERIFY_CHECKSUMS: boolean;
  MAX_OBJECT_SIZE: number;
  PROGRESS_WINDOW_MS: number;
  PROGRESS_RETENTION_MS: number;
  SESSION_RETENTION_MS: number;
  PRESIGNED_EXPIRES_SEC: number;

  REDIS_URL?: string;
  PROGRESS_CHANNEL: string;
  EVENTS_CHANNEL: string;
  LOG_LEVEL: string;
}

const envSchema = Joi.object<EnvVars>({
  NODE_ENV: Joi.string().valid("development", "production", "test").default("development"),
  SERVER_PORT: Joi.number().port().default(8080),
  SERVER_API_KEY: Joi.string().min(8),
  PUBLIC_BASE_URL: Joi.string().uri().default("http://localhost:8080"),

  S3_ENDPOINT: Joi.string().uri(),
  S3_PUBLIC_ENDPOINT: Joi.string().uri(),
  S3_REGION: Joi.string().default("us-east-1"),
  S3_ACCESS_KEY: Joi.string().default("minioadmin"),
  S3_SECRET_KEY: Joi.string().default("minioadmin"),
  S3_BUCKET: Joi.string().min(3).max(63).default("chunkvault-primary"),
  S3_FORCE_PATH_STYLE: Joi.boolean().default(true),
  S3_KEY_PREFIX: Joi.string().allow("").default("objects/"),

  BACKUP_ENABLED: Joi.boolean().default(false),
  BACKUP_ENDPOINT: Joi.string()
    .pattern(/^[^:\s]+(:\d{1,5})?$/)
    .default("localhost:9000"),
  BACKUP_USE_SSL: Joi.boolean().default(false),
  BACKUP_ACCESS_KEY: Joi.string().default("minioadmin"),
  BACKUP_SECRET_KEY: Joi.string().default("minioadmin"),
  BACKUP_BUCKET: Joi.string().min(3).max(63).default("chunkvault-backup"),
  BACKUP_KEY_PREFIX: Joi.string().allow("").default("replicas/"),
  BACKUP_MANDATORY: Joi.boolean().default(false),

  // S3 rejects multipart parts under 5 MiB except the last one
  CHUNK_SIZE_MB: Joi.number().integer().min(5).max(512).default(16),
  MAX_IN_FLIGHT_CHUNKS: Joi.number().integer().min(1).max(64).default(4),
  RETRY_MAX_ATTEMPTS: Joi.number().integer().min(1).max(20).default(4),
  RETRY_BASE_DELAY_MS: Joi.number().integer().min(0).default(500),
  RETRY_MAX_DELAY_MS: Joi.number().integer().min(0).default(8000),
  CHUNK_TIMEOUT_MS: Joi.number().integer().min(0).default(60_000),
  VERIFY_CHECKSUMS: Joi.boolean().default(true),
  MAX_OBJECT_SIZE: Joi.number().integer().min(1).default(4 * 1024 * MIB),
  PROGRESS_WINDOW_MS: Joi.number().integer().min(1).default(10_000),
  PROGRESS_RETENTION_MS: Joi.number().integer().min(0).default(600_000),
  SESSION_RETENTION_MS: Joi.number().integer().min(0).default(600_000),
  PRESIGNED_EXPIRES_SEC: Joi.number().integer().min(1).max(604_800).default(86_400),

  REDIS_URL: Joi.string().uri({ scheme: ["redis", "rediss"] }),
  PROGRESS_CHANNEL: Joi.string().default("progress:transfers"),
  EVENTS_CHANNEL: Joi.string().default("events:transfers"),
  LOG_LEVEL: Joi.string().valid("error", "warn", "info", "http", "verbose", "debug", "silly").default("info"),
})
  .unknown(true)
  .custom((value: EnvVars, helpers) =>
    value.RETRY_MAX_DELAY_MS < value.RETRY_BASE_DELAY_MS
      ? helpers.message({ custom: "RETRY_MAX_DELAY_MS must not be below RETRY_BASE_DELAY_MS" })
      : value,
  );

export interface PrimaryStoreConfig {
  endpoint?: string;
  publicEndpoint?: string;
  region: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  forcePathStyle: boolean;
  keyPrefix: string;
}

export interface BackupStoreConfig {
  enabled: boolean;
  host: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
  keyPrefix: string;
  mandatory: boolean;
}

export interface AppConfig {
  env: string;
  server: {
    port: number;
    apiKey?: string;
    publicBaseUrl: string;
  };
  primary: PrimaryStoreConfig;
  backup: BackupStoreConfig;
  transfer: TransferConfig;
  presignedExpiresSec: number;
  redis: {
    url?: string;
    progressChannel: string;
    eventsChannel: string;
  };
  logLevel: string;
}

/**
 * Validates the environment and builds the typed configuration. Every
 * problem is reported at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.validate(env, { abortEarly: false, convert: true });
  if (result.error) {
    const problems = result.error.details.map((detail) => detail.message).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }
  const { value } = result;

  const [host, portStr] = value.BACKUP_ENDPOINT.split(":");

  return {
    env: value.NODE_ENV,
    server: {
      port: value.SERVER_PORT,
      apiKey: value.SERVER_API_KEY,
      publicBaseUrl: value.PUBLIC_BASE_URL.replace(/\/+$/, ""),
    },
    primary: {
      endpoint: value.S3_ENDPOINT,
      publicEndpoint: value.S3_PUBLIC_ENDPOINT,
      region: value.S3_REGION,
      accessKey: value.S3_ACCESS_KEY,
      secretKey: value.S3_SECRET_KEY,
      bucket: value.S3_BUCKET,
      forcePathStyle: value.S3_FORCE_PATH_STYLE,
      keyPrefix: value.S3_KEY_PREFIX,
    },
    backup: {
      enabled: value.BACKUP_ENABLED,
      host,
      port: parseInt(portStr || "9000", 10),
      useSSL: value.BACKUP_USE_SSL,
      accessKey: value.BACKUP_ACCESS_KEY,
      secretKey: value.BACKUP_SECRET_KEY,
      bucket: value.BACKUP_BUCKET,
      keyPrefix: value.BACKUP_KEY_PREFIX,
      mandatory: value.BACKUP_MANDATORY,
    },
    transfer: {
      chunkSize: value.CHUNK_SIZE_MB * MIB,
      maxInFlightChunks: value.MAX_IN_FLIGHT_CHUNKS,
      retry: {
        maxAttempts: value.RETRY_MAX_ATTEMPTS,
        baseDelayMs: value.RETRY_BASE_DELAY_MS,
        maxDelayMs: value.RETRY_MAX_DELAY_MS,
      },
      chunkTimeoutMs: value.CHUNK_TIMEOUT_MS,
      verifyChecksums: value.VERIFY_CHECKSUMS,
      maxObjectSize: value.MAX_OBJECT_SIZE,
      progressWindowMs: value.PROGRESS_WINDOW_MS,
      progressRetentionMs: value.PROGRESS_RETENTION_MS,
      sessionRetentionMs: value.SESSION_RETENTION_MS,
    },
    presignedExpiresSec: value.PRESIGNED_EXPIRES_SEC,
    redis: {
      url: value.REDIS_URL,
      progressChannel: value.PROGRESS_CHANNEL,
      eventsChannel: value.EVENTS_CHANNEL,
    },
    logLevel: value.LOG_LEVEL,
  };
}
