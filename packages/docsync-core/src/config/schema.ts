/**
 * @module @docsync/core/config/schema
 * Configuration schema, validated when the config file is loaded
 */

import { z } from 'zod';

// ============================================================================
// Assistants
// ============================================================================

export const AssistantConfigSchema = z.object({
  /** Remote assistant id */
  id: z.string().min(1),
  title: z.string().min(1),
  icon: z.string().default('💬'),
  description: z.string().default(''),
  /** Text document listing the markdown files to index as [label](url) links */
  manifestUrl: z.string().url().optional(),
});

export type AssistantConfig = z.infer<typeof AssistantConfigSchema>;

// ============================================================================
// Sync
// ============================================================================

export const SyncSettingsSchema = z.object({
  scratchRoot: z.string().default('tmp'),
  concurrency: z.number().int().positive().default(5),
  batchSize: z.number().int().positive().max(500).default(100),
  maxAttempts: z.number().int().positive().default(3),
  pollIntervalMs: z.number().int().nonnegative().default(1000),
  pollTimeoutMs: z.number().int().positive().default(10 * 60 * 1000),
  keepScratch: z.boolean().default(false),
});

export type SyncSettings = z.infer<typeof SyncSettingsSchema>;

// ============================================================================
// Schedule / feedback / logging
// ============================================================================

export const ScheduleSettingsSchema = z.object({
  dailyAt: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM (24h)')
    .default('03:00'),
});

export type ScheduleSettings = z.infer<typeof ScheduleSettingsSchema>;

export const FeedbackSettingsSchema = z.object({
  dir: z.string().default('.docsync/feedback'),
  maxRecordsPerFile: z.number().int().positive().default(1000),
  maxFiles: z.number().int().positive().default(30),
});

export type FeedbackSettings = z.infer<typeof FeedbackSettingsSchema>;

export const LoggingSettingsSchema = z.object({
  dir: z.string().optional(),
});

export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;

// ============================================================================
// Root
// ============================================================================

export const DocSyncConfigSchema = z.object({
  assistants: z.record(z.string().min(1), AssistantConfigSchema),
  sync: SyncSettingsSchema.default({}),
  schedule: ScheduleSettingsSchema.default({}),
  feedback: FeedbackSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
});

export type DocSyncConfig = z.infer<typeof DocSyncConfigSchema>;
export type DocSyncConfigInput = z.input<typeof DocSyncConfigSchema>;

export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_PROJECT: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  LOG_LEVEL: z.string().optional(),
});

export type DocSyncEnv = z.infer<typeof EnvSchema>;
