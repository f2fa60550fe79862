import { readFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { ConvoyConfigSchema, type ConvoyConfig } from '@convoy/types';

export const CONFIG_FILENAME = 'convoy.config.json';

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(message: string, readonly path: string) {
    super(message);
  }
}

export interface LoadedConfig {
  config: ConvoyConfig;
  path: string;
  /** False when defaults were used because no file exists */
  found: boolean;
}

export function defaultConfig(): ConvoyConfig {
  return ConvoyConfigSchema.parse({});
}

export function configPathFor(dir: string): string {
  return join(dir, CONFIG_FILENAME);
}

export async function fileExists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

/**
 * Read and validate a config file. A missing file yields the defaults
 * unless `required` is set.
 */
export async function loadConfig(path: string, options?: { required?: boolean }): Promise<LoadedConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error) && !options?.required) {
      return { config: defaultConfig(), path, found: false };
    }
    throw new ConfigError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`, path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`, path);
  }

  const result = ConvoyConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid config in ${path}: ${issues.join('; ')}`, path);
  }
  return { config: result.data, path, found: true };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
