/**
 * tidings — Core Type Definitions
 *
 * Shared types, schemas, and validation for the kernel.
 * Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 * @version 1.0.0
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const DomainNameSchema = z.enum(['budget', 'bins', 'trains']);
export type DomainName = z.infer<typeof DomainNameSchema>;

export const AlertSeveritySchema = z.enum(['info', 'warning', 'critical']);
export type AlertSeverity = z.infer<typeof AlertSeveritySchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// ALERTS
// ═══════════════════════════════════════════════════════════════════════════

export const AlertSchema = z.object({
  id: z.string().uuid(),
  domain: DomainNameSchema,
  severity: AlertSeveritySchema.optional(),
  renderedPayload: z.string().min(1),
  recipientId: z.string().optional(),
  createdAt: z.string().datetime(),
});
export type Alert = z.infer<typeof AlertSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const ClockTimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:mm');

const ChatIdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const ConfigSchema = z.object({
  dataDir: z.string().default('~/.tidings'),
  logging: z.object({
    level: LogLevelSchema.default('info'),
  }).default({}),
  store: z.object({
    backend: z.enum(['file', 'sqlite']).default('file'),
    writeAttempts: z.number().int().min(1).max(10).default(3),
  }).default({}),
  dispatch: z.object({
    maxAttempts: z.number().int().min(1).max(20).default(4),
    initialDelayMs: z.number().int().nonnegative().default(1000),
    maxDelayMs: z.number().int().positive().default(30_000),
  }).default({}),
  scheduler: z.object({
    retryDelayMs: z.number().int().positive().default(60 * 60 * 1000),
    maxSleepMs: z.number().int().positive().default(6 * 60 * 60 * 1000),
  }).default({}),
  telegram: z.object({
    botToken: z.string().min(1).optional(),
    allowedUserIds: z.array(z.number().int()).default([]),
    routes: z.object({
      budget: ChatIdSchema.optional(),
      bins: ChatIdSchema.optional(),
      trains: ChatIdSchema.optional(),
    }).default({}),
  }).default({}),
  budget: z.object({
    enabled: z.boolean().default(true),
    weeklyAmount: z.number().nonnegative().default(1),
    historyLimit: z.number().int().min(1).max(100).default(10),
    currencySymbol: z.string().min(1).default('£'),
  }).default({}),
  bins: z.object({
    enabled: z.boolean().default(true),
    feedUrl: z.string().url().optional(),
    nightBefore: ClockTimeSchema.default('18:00'),
    morningOf: ClockTimeSchema.default('07:00'),
    refreshAt: ClockTimeSchema.default('09:00'),
    staleGraceMinutes: z.number().int().nonnegative().default(120),
    ignoreTypes: z.array(z.string()).default(['Bulky']),
  }).default({}),
  trains: z.object({
    enabled: z.boolean().default(true),
    apiUrl: z.string().url().optional(),
    accessToken: z.string().min(1).optional(),
    defaultStation: z.string().min(1).optional(),
    pollIntervalSeconds: z.number().int().min(5).max(600).default(30),
    boardSize: z.number().int().min(1).max(50).default(10),
  }).default({}),
});
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
