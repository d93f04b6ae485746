import fs from 'node:fs/promises';
import {err, errAsync, ok, okAsync, type Result, ResultAsync} from 'neverthrow';
import YAML from 'yaml';
import {z} from 'zod';
import {log} from '../services/logger';
import type {UnitCategory} from '../types/domain';
import {CONFIG_PATH} from './paths';

export const appConfigSchema = z.object({
  scope: z.enum(['system', 'user']).default('system'),
  category: z.enum(['service', 'timer', 'socket', 'target', 'path']).default('service'),
  logLimit: z.number().int().positive().default(1000),
  tailIntervalMs: z.number().int().positive().default(2000),
  blinkIntervalMs: z.number().int().positive().default(500),
  actionTimeoutMs: z.number().int().positive().default(120_000),
  systemctl: z.string().min(1).default('systemctl'),
  journalctl: z.string().min(1).default('journalctl'),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = appConfigSchema.parse({});

export type ConfigError = {path: string; message: string};

export function parseConfig(text: string, path = CONFIG_PATH): Result<AppConfig, ConfigError> {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (e) {
    return err({path, message: e instanceof Error ? e.message : String(e)});
  }
  const parsed = appConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return err({path, message: issues.join('; ')});
  }
  return ok(parsed.data);
}

const isMissing = (e: unknown) =>
  e instanceof Error && 'code' in e && e.code === 'ENOENT';

/** A missing file is not an error: it means defaults. */
export function readConfig(path = CONFIG_PATH): ResultAsync<AppConfig, ConfigError> {
  return ResultAsync.fromPromise(fs.readFile(path, 'utf8'), e => e)
    .map(text => parseConfig(text, path))
    .orElse(e =>
      isMissing(e)
        ? okAsync<Result<AppConfig, ConfigError>, ConfigError>(ok(DEFAULT_CONFIG))
        : errAsync<Result<AppConfig, ConfigError>, ConfigError>({
            path,
            message: e instanceof Error ? e.message : String(e),
          }),
    )
    .andThen(result => result);
}

export async function loadConfig(path = CONFIG_PATH): Promise<AppConfig> {
  return readConfig(path).match(
    config => {
      log.info('Configuration loaded', 'config', {path});
      return config;
    },
    error => {
      log.warn(`Ignoring config file: ${error.message}`, 'config', {path: error.path});
      return DEFAULT_CONFIG;
    },
  );
}

export type CliOverrides = {user?: boolean; category?: UnitCategory};

export function applyOverrides(config: AppConfig, overrides: CliOverrides): AppConfig {
  return {
    ...config,
    scope: overrides.user ? 'user' : config.scope,
    category: overrides.category ?? config.category,
  };
}
