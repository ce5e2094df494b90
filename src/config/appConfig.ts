import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger';

export const MEMORY_URI = 'memory:';
export const DEFAULT_CONFIG_FILE = 'config.json';
export const DEFAULT_PORT = 8000;

const storeUri = z
  .string()
  .trim()
  .refine((uri) => uri === MEMORY_URI || uri.startsWith('mysql://'), {
    message: `expected a mysql:// URI or "${MEMORY_URI}"`,
  });

const port = z.number().int().min(0).max(65535);

const configSchema = z.object({
  database: z.object({
    pb: storeUri,
    log: storeUri,
  }),
  server: z.object({ port: port.default(DEFAULT_PORT) }).default({}),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

const envSchema = z.object({
  PORT: z.coerce.number().pipe(port).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type AppConfig = z.infer<typeof configSchema>;
export type DatabaseConfig = AppConfig['database'];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function describeIssues(source: string, error: z.ZodError): string {
  const details = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return `Invalid ${source}: ${details.join('; ')}`;
}

function nonBlank(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** Validates a parsed config document and applies PORT / LOG_LEVEL overrides. */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env, source = 'config'): AppConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(describeIssues(source, parsed.error));

  const overrides = envSchema.safeParse({
    PORT: nonBlank(env, 'PORT'),
    LOG_LEVEL: nonBlank(env, 'LOG_LEVEL'),
  });
  if (!overrides.success) throw new ConfigError(describeIssues('environment', overrides.error));

  return {
    ...parsed.data,
    server: { port: overrides.data.PORT ?? parsed.data.server.port },
    logLevel: overrides.data.LOG_LEVEL ?? parsed.data.logLevel,
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const file = path.resolve(nonBlank(env, 'PHONEBOOK_CONFIG') ?? DEFAULT_CONFIG_FILE);

  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(raw, env, `config file ${file}`);
}
