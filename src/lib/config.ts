// src/lib/config.ts
import { z } from 'zod';
import { MalformedInputError } from '@/lib/errors';

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v === '') return fallback;
      const n = Number(v);
      if (!Number.isFinite(n)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${v}` });
        return z.NEVER;
      }
      return n;
    });

export const envSchema = z.object({
  DEFAULT_TZ: z.string().trim().min(1).default('America/New_York'),
  DEFAULT_FIXED_UTC_OFFSET: numberFromEnv(-5).pipe(z.number().min(-18).max(18)),
  DEFAULT_CENTER: z.enum(['geo', 'helio']).default('geo'),
  DEFAULT_HOUSE_SYSTEM: z.string().trim().min(1).default('equal-cusp'),
  DEFAULT_ZODIAC: z.enum(['tropical', 'sidereal']).default('tropical'),
  DEFAULT_NODE_TYPE: z.enum(['true', 'mean']).default('true'),
  DEFAULT_ORB: numberFromEnv(6).pipe(z.number().min(0).max(180)),
  DEFAULT_ORB_LIST: z.string().default(''),
  SIDEREAL_FRAME: z.enum(['fagan_bradley', 'lahiri', 'raman', 'krishnamurti']).default('fagan_bradley'),
  AYANAMSA_EXTRA_OFFSET: numberFromEnv(0),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type EngineConfig = z.infer<typeof envSchema>;

/** Reads the engine defaults from an environment map (process.env by default). */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => i.path.join('.'));
    throw new MalformedInputError(`Invalid configuration: ${keys.join(', ')}`, parsed.error.issues);
  }
  return parsed.data;
}
