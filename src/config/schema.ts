/**
 * Zod schemas for service configuration (config.json).
 *
 * Validates what operators write in `~/.config/insightflow/config.json` or
 * `.insightflow/config.json`, after environment overrides are layered on.
 * Every field has a default, so an empty object parses to a runnable config.
 */

import { z } from 'zod';
import { getDefaultDatasetDir, getDefaultDbPath } from '../paths.js';

// =============================================================================
// SECTION SCHEMAS
// =============================================================================

const HOUR_MS = 60 * 60 * 1000;

export const OrchestratorSchema = z
  .object({
    /** Process-wide cap on agents in the Running state */
    maxConcurrency: z.number().int().positive().max(64).default(4),
    /** Per-agent budget covering generation and execution */
    agentTimeoutMs: z.number().int().positive().default(300_000),
    maxAgentsPerRun: z.number().int().positive().default(10),
  })
  .strict();

export const CacheSchema = z
  .object({
    ttlMs: z.number().int().positive().default(24 * HOUR_MS),
    sweepIntervalMs: z.number().int().nonnegative().default(HOUR_MS),
    /** 0 disables the capacity bound */
    maxEntries: z.number().int().nonnegative().default(0),
  })
  .strict();

export const BroadcasterSchema = z
  .object({
    subscriberBufferSize: z.number().int().positive().default(256),
    heartbeatMs: z.number().int().positive().default(15_000),
  })
  .strict();

export const LlmSchema = z
  .object({
    provider: z.enum(['anthropic', 'mock']).default('anthropic'),
    model: z.string().min(1).default('claude-sonnet-4-20250514'),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().default('https://api.anthropic.com'),
    maxTokens: z.number().int().positive().default(4096),
    timeoutMs: z.number().int().positive().default(120_000),
  })
  .strict();

export const SandboxSchema = z
  .object({
    interpreter: z.string().min(1).default('python3'),
    /** Hard wall-clock limit for one script; the agent timeout may cut it shorter */
    timeoutMs: z.number().int().positive().default(120_000),
    workDir: z.string().min(1).optional(),
    maxOutputBytes: z.number().int().positive().default(1024 * 1024),
  })
  .strict();

export const UploadSchema = z
  .object({
    maxFileBytes: z.number().int().positive().default(100 * 1024 * 1024),
    allowedExtensions: z.array(z.string().regex(/^\.[a-z0-9]+$/)).min(1).default(['.csv', '.tsv', '.json', '.txt']),
  })
  .strict();

export const RateLimitSchema = z
  .object({
    maxRequests: z.number().int().positive().default(5),
    windowMs: z.number().int().positive().default(60_000),
  })
  .strict();

export const CircuitBreakerSchema = z
  .object({
    failureThreshold: z.number().int().positive().default(5),
    resetTimeoutMs: z.number().int().positive().default(60_000),
    halfOpenRequests: z.number().int().positive().default(2),
  })
  .strict();

export const ServerSchema = z
  .object({
    port: z.number().int().min(0).max(65535).default(8000),
    hostname: z.string().min(1).default('0.0.0.0'),
    corsOrigins: z.array(z.string()).default(['http://localhost:3000', 'http://localhost:5173']),
  })
  .strict();

export const StorageSchema = z
  .object({
    dbPath: z.string().min(1).default(getDefaultDbPath()),
    datasetDir: z.string().min(1).default(getDefaultDatasetDir()),
  })
  .strict();

export const LoggingSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
    format: z.enum(['pretty', 'json']).default('pretty'),
    file: z.string().min(1).optional(),
  })
  .strict();

// =============================================================================
// ROOT SCHEMA
// =============================================================================

export const AppConfigSchema = z
  .object({
    orchestrator: OrchestratorSchema.default({}),
    cache: CacheSchema.default({}),
    broadcaster: BroadcasterSchema.default({}),
    llm: LlmSchema.default({}),
    sandbox: SandboxSchema.default({}),
    upload: UploadSchema.default({}),
    rateLimit: RateLimitSchema.default({}),
    circuitBreaker: CircuitBreakerSchema.default({}),
    server: ServerSchema.default({}),
    storage: StorageSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type OrchestratorConfig = AppConfig['orchestrator'];
export type CacheConfig = AppConfig['cache'];
export type LlmConfig = AppConfig['llm'];
export type SandboxConfig = AppConfig['sandbox'];
export type UploadConfig = AppConfig['upload'];

/**
 * Fully defaulted config, optionally with overrides. Used by tests and
 * embedders that skip file loading.
 */
export function defineConfig(overrides: AppConfigInput = {}): AppConfig {
  return AppConfigSchema.parse(overrides);
}
