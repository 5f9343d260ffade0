/**
 * Zod schemas for configuration validation
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const DebugConfigSchema = z.object({
  enabled: z.boolean().optional().default(false),
  log_file: z.string().optional(),
});

export const DataConfigSchema = z.object({
  /** CSV with columns country, payment_method_type, payment_method_type_name */
  payment_methods_csv: z.string().optional(),
  /** Directory holding `<dataset>/<table>.csv` transaction tables */
  transactions_dir: z.string().optional(),
});

/** Global config schema (~/.labgraph/config.yaml) */
export const GlobalConfigSchema = z.object({
  model: z.string().min(1).optional(),
  max_tokens: z.number().int().positive().optional().default(1024),
  temperature: z.number().min(0).max(1).optional().default(0.7),
  timeout_ms: z.number().int().positive().optional(),
  log_level: LogLevelSchema.optional().default('info'),
  anthropic_api_key: z.string().min(1).optional(),
  max_iterations: z.number().int().positive().optional().default(25),
  max_retries: z.number().int().nonnegative().optional().default(3),
  debug: DebugConfigSchema.optional(),
  data: DataConfigSchema.optional(),
});

export type GlobalConfigRaw = z.infer<typeof GlobalConfigSchema>;
