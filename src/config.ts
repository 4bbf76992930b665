// Runtime configuration for the command-line tool, read from the environment.
// loadEnvFiles() pulls .env, .env.local and .env.<NODE_ENV> in through dotenv-flow;
// readAppConfig() validates what ends up in process.env.

import dotenvFlow from 'dotenv-flow';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';
import type { OutputFormat, TemperatureUnit } from './types';

export interface AppConfig {
  temperatureUnit: TemperatureUnit;
  outputFormat: OutputFormat;
  outputDir: string;
  sessionGapSecs: number;
  logLevel: LogLevel;
}

const EnvSchema = z.object({
  AEROTRACE_TEMPERATURE_UNIT: z.enum(['original', 'celsius', 'fahrenheit']).default('fahrenheit'),
  AEROTRACE_OUTPUT_FORMAT: z.enum(['csv', 'json', 'zip']).default('csv'),
  AEROTRACE_OUTPUT_DIR: z.string().min(1).default('.'),
  AEROTRACE_SESSION_GAP_SECS: z.coerce.number().int().positive().default(300),
  AEROTRACE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export function loadEnvFiles(): void {
  dotenvFlow.config({ silent: true });
}

export function readAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(
    Object.keys(EnvSchema.shape)
      .filter(name => (env[name] ?? '').trim() !== '')
      .map(name => [name, (env[name] ?? '').trim()])
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
  }

  const parsed = result.data;
  return {
    temperatureUnit: parsed.AEROTRACE_TEMPERATURE_UNIT,
    outputFormat: parsed.AEROTRACE_OUTPUT_FORMAT,
    outputDir: parsed.AEROTRACE_OUTPUT_DIR,
    sessionGapSecs: parsed.AEROTRACE_SESSION_GAP_SECS,
    logLevel: parsed.AEROTRACE_LOG_LEVEL,
  };
}
