import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export const endpointEntrySchema = z.object({
  url: z.string().min(1),
  timeoutSec: z.number().int().nonnegative().optional()
});

export const waitSchema = z.object({
  timeoutSec: z.number().int().nonnegative().default(30),
  intervalMs: z.number().int().positive().default(1_000),
  probeTimeoutMs: z.number().int().positive().default(3_000),
  udpSettleMs: z.number().int().nonnegative().default(250)
});

export const configSchema = z.object({
  wait: waitSchema.default({ timeoutSec: 30, intervalMs: 1_000, probeTimeoutMs: 3_000, udpSettleMs: 250 }),
  logging: z
    .object({
      level: logLevelSchema.default('info'),
      debug: z.boolean().default(false),
      quiet: z.boolean().default(false)
    })
    .default({ level: 'info', debug: false, quiet: false }),
  discovery: z
    .object({
      envPattern: z
        .string()
        .default('^[A-Z0-9_]+_[0-9]+_PORT$')
        .refine(
          (value) => {
            try {
              new RegExp(value);
              return true;
            } catch {
              return false;
            }
          },
          { message: 'must be a valid regular expression' }
        )
    })
    .default({ envPattern: '^[A-Z0-9_]+_[0-9]+_PORT$' }),
  endpoints: z.array(endpointEntrySchema).default([]),
  metrics: z
    .object({
      textfilePath: z.string().min(1).optional()
    })
    .default({})
});

export type LogLevel = z.infer<typeof logLevelSchema>;
export type EndpointEntry = z.infer<typeof endpointEntrySchema>;
export type ReadygateConfig = z.infer<typeof configSchema>;
