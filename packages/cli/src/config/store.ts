/**
 * Config loading and validation.
 */
import * as fs from 'node:fs';
import type { ZodError } from 'zod';
import { ConfigError } from '../errors.js';
import { findConfigPath } from './paths.js';
import { tocmarkConfigSchema, type LoadedConfig, type TocmarkConfig } from './types.js';

function describeIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Load config from a specific file path.
 */
export function loadConfigFromPath(configPath: string): TocmarkConfig {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not read config file ${configPath}`, configPath, { cause: err });
  }

  const parsed = tocmarkConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configPath}: ${describeIssues(parsed.error)}`, configPath);
  }
  return parsed.data;
}

/**
 * Load the first config file found, or null when there is none.
 */
export function loadConfig(): LoadedConfig | null {
  const configPath = findConfigPath();
  if (configPath == null) {
    return null;
  }
  return { path: configPath, config: loadConfigFromPath(configPath) };
}
