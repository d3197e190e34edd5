import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import { hasWildcard, subjectProblem } from './subject.js';

// ── Mode ────────────────────────────────────────────────────

export const MODES = ['pub', 'sub'] as const;

export const modeSchema = z.enum(MODES, {
  errorMap: (_issue, ctx) => ({
    message:
      ctx.data === undefined
        ? '-mode flag is required'
        : `-mode must be "pub" or "sub", got ${JSON.stringify(ctx.data)}`,
  }),
});

export type Mode = z.infer<typeof modeSchema>;

// ── Broker provider ─────────────────────────────────────────

export const brokerProviderSchema = z.enum(['nats', 'memory']);

export type BrokerProvider = z.infer<typeof brokerProviderSchema>;

// ── Field schemas ───────────────────────────────────────────

export const subjectSchema = z
  .string({ required_error: '-subject flag is required' })
  .superRefine((value, ctx) => {
    const problem = subjectProblem(value);
    if (problem !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });

function millisSchema(flag: string) {
  const message = `-${flag} must be a positive integer (milliseconds)`;
  return z
    .number({ invalid_type_error: message })
    .int(message)
    .positive(message)
    .max(
      TIMEOUTS.MAX_TIMER_DELAY,
      `-${flag} must not exceed ${String(TIMEOUTS.MAX_TIMER_DELAY)} (milliseconds)`,
    );
}

// ── Invocation config ───────────────────────────────────────

export const invocationSchema = z
  .object({
    mode: modeSchema,
    subject: subjectSchema,
    payload: z.string().optional(),
    url: z.string().min(1, '-url must not be empty'),
    name: z.string().min(1, '-name must not be empty'),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    broker: brokerProviderSchema,
    flushTimeoutMs: millisSchema('flush-timeout'),
    drainTimeoutMs: millisSchema('drain-timeout'),
  })
  .superRefine((config, ctx) => {
    if (config.mode !== 'pub') return;

    if (config.payload === undefined || config.payload.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['payload'],
        message: '-msg flag is required when using -mode "pub"',
      });
    }
    if (hasWildcard(config.subject)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['subject'],
        message: `cannot publish to wildcard subject ${JSON.stringify(config.subject)}`,
      });
    }
  });

export type InvocationConfig = Readonly<z.infer<typeof invocationSchema>>;

// ── Config file ─────────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    url: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    broker: brokerProviderSchema.optional(),
    flushTimeoutMs: z.number().int().positive().max(TIMEOUTS.MAX_TIMER_DELAY).optional(),
    drainTimeoutMs: z.number().int().positive().max(TIMEOUTS.MAX_TIMER_DELAY).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;
