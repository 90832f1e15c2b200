import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ValidationError, type DatabaseConfig, type LlmConfig, type RuleOrdering } from '@dataherd/core';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
const ORDERINGS = ['priority_then_recency', 'recency'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  ruleOrdering: RuleOrdering;
  /** Directory of seed rule files; null means the bundled rules/ directory. */
  rulesDir: string | null;
  database: DatabaseConfig;
  llm: LlmConfig;
}

/** Shape of the optional YAML file named by DATAHERD_CONFIG. */
const fileSchema = z
  .object({
    port: z.number().int().optional(),
    log_level: z.enum(LOG_LEVELS).optional(),
    rule_ordering: z.enum(ORDERINGS).optional(),
    rules_dir: z.string().optional(),
    database: z
      .object({
        host: z.string(),
        port: z.number().int(),
        name: z.string(),
        user: z.string(),
        password: z.string(),
        max_connections: z.number().int(),
      })
      .partial()
      .strict()
      .optional(),
    llm: z
      .object({
        base_url: z.string(),
        model: z.string(),
        timeout_ms: z.number().int(),
        max_retries: z.number().int(),
        temperature: z.number(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  ruleOrdering: z.enum(ORDERINGS).default('priority_then_recency'),
  rulesDir: z.string().nullable().default(null),
  database: z.object({
    host: z.string().default('localhost'),
    port: z.coerce.number().int().positive().default(5432),
    database: z.string().default('dataherd'),
    user: z.string().default('dataherd'),
    password: z.string().default('dataherd'),
    max: z.coerce.number().int().positive().default(10),
  }),
  llm: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    model: z.string().default('claude-3-5-haiku-latest'),
    timeoutMs: z.coerce.number().int().positive().default(10_000),
    maxRetries: z.coerce.number().int().min(0).default(1),
    temperature: z.coerce.number().min(0).max(1).default(0),
  }),
});

type ConfigFile = z.infer<typeof fileSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function loadConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot read config file ${path}: ${message}`, 'DATAHERD_CONFIG');
  }
  const parsed = fileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ValidationError(`Invalid config file ${path}: ${describeIssues(parsed.error)}`, 'DATAHERD_CONFIG');
  }
  return parsed.data;
}

/**
 * Resolve configuration: environment variables over the YAML file named by
 * DATAHERD_CONFIG over defaults. Blank variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value;
  };

  const configPath = read('DATAHERD_CONFIG');
  const file: ConfigFile = configPath ? loadConfigFile(configPath) : {};

  const parsed = configSchema.safeParse({
    port: read('PORT') ?? file.port,
    logLevel: read('LOG_LEVEL') ?? file.log_level,
    ruleOrdering: read('RULE_ORDERING') ?? file.rule_ordering,
    rulesDir: read('RULES_DIR') ?? file.rules_dir,
    database: {
      host: read('DB_HOST') ?? file.database?.host,
      port: read('DB_PORT') ?? file.database?.port,
      database: read('DB_NAME') ?? file.database?.name,
      user: read('DB_USER') ?? file.database?.user,
      password: read('DB_PASSWORD') ?? file.database?.password,
      max: read('DB_MAX_CONNECTIONS') ?? file.database?.max_connections,
    },
    llm: {
      apiKey: read('LLM_API_KEY'),
      baseUrl: read('LLM_BASE_URL') ?? file.llm?.base_url,
      model: read('LLM_MODEL') ?? file.llm?.model,
      timeoutMs: read('LLM_TIMEOUT_MS') ?? file.llm?.timeout_ms,
      maxRetries: read('LLM_MAX_RETRIES') ?? file.llm?.max_retries,
      temperature: read('LLM_TEMPERATURE') ?? file.llm?.temperature,
    },
  });
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
