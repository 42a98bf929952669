import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const ConfigSchema = z.object({
  gemini: z.object({
    /** Only required by commands that call the model */
    api_key: z.string().min(1).optional(),
    base_url: z.string().url(),
    /** Used for resolve, validate and compose */
    model: z.string().min(1),
    /** Used for the search-grounded gather stage */
    research_model: z.string().min(1),
    timeout_ms: z.number().int().positive(),
    max_retries: z.number().int().min(0).max(10),
    retry_base_delay_ms: z.number().int().min(0),
  }),
  storage: z.object({
    driver: z.enum(['file', 'memory']),
    dir: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
  }),
  engine: z.object({
    max_steps: z.number().int().positive(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration validation failed:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigValidationError';
  }
}
