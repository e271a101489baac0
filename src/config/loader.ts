import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { ConfigError } from '../core/errors.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.taskpilot.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}`, { cause: err });
  }

  return parseConfig(raw, configPath.endsWith('.json') ? 'json' : 'yaml');
}

/**
 * Parse config text. An empty YAML document yields the all-defaults config.
 */
export function parseConfig(raw: string, format: 'json' | 'yaml'): FileConfig {
  let parsed: unknown;
  try {
    parsed = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Config is not valid ${format.toUpperCase()}`, { cause: err });
  }

  try {
    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Invalid config: ${formatIssues(err)}`, { cause: err });
    }
    throw err;
  }
}

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return `${path ? `${path}: ` : ''}${issue.message}`;
    })
    .join('; ');
}
