import type { LevelWithSilent } from 'pino';
import { z } from 'zod';

const serviceEnvSchema = z.object({
  HEXLINE_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  HEXLINE_RULES_PATH: z.string().min(1).optional(),
  HEXLINE_DEFAULT_SEED: z.coerce.number().int().optional()
});

export interface ServiceConfig {
  logLevel: LevelWithSilent;
  // bundled rules when unset
  rulesPath?: string;
  defaultSeed?: number;
}

export function loadServiceConfig(env: Record<string, string | undefined> = process.env): ServiceConfig {
  const parsed = serviceEnvSchema.parse(env);
  return {
    logLevel: parsed.HEXLINE_LOG_LEVEL,
    rulesPath: parsed.HEXLINE_RULES_PATH,
    defaultSeed: parsed.HEXLINE_DEFAULT_SEED
  };
}
