// packages/core/src/config.ts
import { z } from 'zod';

export const ConfigSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  approximations: z.enum(['allow', 'warn', 'error']).default('warn'),
});

export type FrameBridgeConfig = z.infer<typeof ConfigSchema>;

let cached: FrameBridgeConfig | undefined;

/** Read FRAMEBRIDGE_* environment knobs; an invalid value throws ZodError. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FrameBridgeConfig {
  return ConfigSchema.parse({
    logLevel: env.FRAMEBRIDGE_LOG_LEVEL?.trim() || undefined,
    approximations: env.FRAMEBRIDGE_APPROXIMATIONS?.trim() || undefined,
  });
}

export function getConfig(): FrameBridgeConfig {
  if (cached === undefined) cached = loadConfig();
  return cached;
}

/** Test helper: forget the cached config so the next getConfig() re-reads env. */
export function _resetConfig(): void {
  cached = undefined;
}
