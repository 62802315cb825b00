import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';

export const CONFIG_DIR = '.diffscribe';
export const CONFIG_FILE = 'config.yaml';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const configSchema = z
  .object({
    ai: z
      .object({
        enabled: z.boolean().default(false),
        model: z.string().min(1).default('claude-3-5-haiku-latest'),
        timeoutMs: z.number().int().positive().default(5000),
        maxDiffLines: z.number().int().positive().default(500),
        /** Name of the environment variable holding the API key. */
        apiKeyEnv: z.string().min(1).default('ANTHROPIC_API_KEY'),
      })
      .strict()
      .default({}),
    analysis: z
      .object({
        breakingLineThreshold: z.number().int().positive().default(100),
        breakingDeletionRatio: z.number().gt(0).max(1).default(0.4),
        /** Smallest commit (changed lines) the deletion ratio applies to; 0 applies it to every commit. */
        breakingRatioMinLines: z.number().int().nonnegative().default(20),
      })
      .strict()
      .default({}),
    changelog: z
      .object({
        file: z.string().min(1).default('CHANGELOG.md'),
        grouping: z.enum(['day', 'batch']).default('day'),
        order: z.enum(['chronological', 'newest-first']).default('chronological'),
        maxMessageLength: z.number().int().min(10).default(72),
        showAuthor: z.boolean().default(false),
      })
      .strict()
      .default({}),
    cache: z
      .object({
        enabled: z.boolean().default(true),
        path: z.string().min(1).default(`${CONFIG_DIR}/cache.db`),
      })
      .strict()
      .default({}),
    log: z
      .object({
        level: logLevelSchema.default('info'),
      })
      .strict()
      .default({}),
  })
  .strict();

export type DiffscribeConfig = z.infer<typeof configSchema>;

export type ConfigOverrides = { [K in keyof DiffscribeConfig]?: Partial<DiffscribeConfig[K]> };

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

function validate(source: string, raw: unknown): DiffscribeConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

function readConfigFile(path: string): unknown {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(path, [errorMessage(err)]);
  }
  return raw ?? {};
}

function parseFlag(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(name, [`expected true or false, got "${value}"`]);
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const ai: Partial<DiffscribeConfig['ai']> = {};

  if (env.DIFFSCRIBE_AI !== undefined && env.DIFFSCRIBE_AI !== '') {
    ai.enabled = parseFlag('DIFFSCRIBE_AI', env.DIFFSCRIBE_AI);
  }
  if (env.DIFFSCRIBE_AI_MODEL) ai.model = env.DIFFSCRIBE_AI_MODEL;
  if (Object.keys(ai).length > 0) overrides.ai = ai;

  if (env.DIFFSCRIBE_LOG_LEVEL) {
    const level = logLevelSchema.safeParse(env.DIFFSCRIBE_LOG_LEVEL);
    if (!level.success) {
      throw new ConfigError('DIFFSCRIBE_LOG_LEVEL', [`unknown level "${env.DIFFSCRIBE_LOG_LEVEL}"`]);
    }
    overrides.log = { level: level.data };
  }

  return overrides;
}

export function applyOverrides(config: DiffscribeConfig, overrides: ConfigOverrides): DiffscribeConfig {
  return {
    ai: { ...config.ai, ...overrides.ai },
    analysis: { ...config.analysis, ...overrides.analysis },
    changelog: { ...config.changelog, ...overrides.changelog },
    cache: { ...config.cache, ...overrides.cache },
    log: { ...config.log, ...overrides.log },
  };
}

export function configPath(root: string): string {
  return resolve(root, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Loads configuration with precedence:
 * 1. explicit overrides (CLI flags)
 * 2. environment variables
 * 3. .diffscribe/config.yaml
 * 4. defaults
 */
export function loadConfig(root: string, options: LoadConfigOptions = {}): DiffscribeConfig {
  const path = configPath(root);
  const fromFile = validate(path, existsSync(path) ? readConfigFile(path) : {});

  const withEnv = applyOverrides(fromFile, envOverrides(options.env ?? process.env));
  const merged = options.overrides ? applyOverrides(withEnv, options.overrides) : withEnv;

  return validate('command-line options', merged);
}

export function defaultConfig(): DiffscribeConfig {
  return configSchema.parse({});
}

export function defaultConfigYaml(): string {
  return `# diffscribe configuration\n${yaml.dump(defaultConfig(), { lineWidth: 100 })}`;
}
