import { z } from 'zod';
import { DEFAULT_MAX_ITERATIONS } from './agent.js';
import { AgentError, Failures } from './errors.js';
import { configureLogger, Logger } from './logger.js';
import { formatIssues } from './schema/decoder.js';

/**
 * Treats blank environment values as unset.
 */
const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  TOOLWRIGHT_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
  TOOLWRIGHT_MODEL: optionalText,
  TOOLWRIGHT_BASE_URL: optionalText.pipe(z.string().url().optional()),
  TOOLWRIGHT_API_KEY: optionalText,
  OPENAI_API_KEY: optionalText,
  TOOLWRIGHT_MAX_ITERATIONS: optionalText.pipe(
    z.coerce.number().int().positive().optional(),
  ),
  TOOLWRIGHT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type Provider = 'openai' | 'ollama';

export type ToolwrightConfig = {
  provider: Provider;
  model: string;
  baseUrl?: string;
  apiKey?: string;
  maxIterations: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
};

export const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * Reads settings from the environment and applies the console log level.
 * Throws `AgentError(invalid_configuration)`
 * when a value is present but malformed.
 */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): ToolwrightConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AgentError(Failures.invalidConfiguration(formatIssues(parsed.error.issues)));
  }

  const values = parsed.data;
  const config: ToolwrightConfig = {
    provider: values.TOOLWRIGHT_PROVIDER,
    model: values.TOOLWRIGHT_MODEL ?? DEFAULT_MODEL,
    baseUrl: values.TOOLWRIGHT_BASE_URL,
    apiKey: values.TOOLWRIGHT_API_KEY ?? values.OPENAI_API_KEY,
    maxIterations: values.TOOLWRIGHT_MAX_ITERATIONS ?? DEFAULT_MAX_ITERATIONS,
    logLevel: values.TOOLWRIGHT_LOG_LEVEL,
  };

  configureLogger({ consoleLevel: config.logLevel });
  Logger.debug('config', 'Configuration loaded', {
    provider: config.provider,
    model: config.model,
    maxIterations: config.maxIterations,
  });
  return config;
};
