import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_CONFIG, type CssAstConfig, type SelectorMode } from './core/index.js';

/**
 * Supported config file names
 */
export const CONFIG_FILES = [
  '.cssastrc',
  '.cssastrc.json',
  'cssast.config.json',
  '.cssastrc.yaml',
  '.cssastrc.yml',
];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isSelectorMode(value: unknown): value is SelectorMode {
  return value === 'folded' || value === 'structured';
}

/**
 * Keep the known, well-typed keys of a parsed config file
 */
export function validateConfig(raw: unknown, source: string = 'config'): CssAstConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid ${source}: expected an object`);
  }

  const config: CssAstConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'include':
      case 'exclude':
        if (!isStringArray(value)) {
          throw new Error(`Invalid ${source}: "${key}" must be an array of strings`);
        }
        config[key] = value;
        break;
      case 'maxDepth':
      case 'maxFailures':
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
          throw new Error(`Invalid ${source}: "${key}" must be a non-negative integer`);
        }
        config[key] = value;
        break;
      case 'selectorMode':
        if (!isSelectorMode(value)) {
          throw new Error(`Invalid ${source}: "selectorMode" must be "folded" or "structured"`);
        }
        config.selectorMode = value;
        break;
      case 'typedUnits':
        if (typeof value !== 'boolean') {
          throw new Error(`Invalid ${source}: "typedUnits" must be a boolean`);
        }
        config.typedUnits = value;
        break;
      default:
        // unknown keys are ignored
        break;
    }
  }

  return config;
}

/**
 * Load configuration from a file
 */
export async function loadConfigFile(filePath: string): Promise<CssAstConfig> {
  const content = await fs.readFile(filePath, 'utf-8');
  const ext = path.extname(filePath).toLowerCase();

  if (ext === '.yaml' || ext === '.yml') {
    return parseSimpleYaml(content);
  }

  return validateConfig(JSON.parse(content), path.basename(filePath));
}

function unquote(value: string): string {
  return value.replace(/^['"]|['"]$/g, '');
}

/**
 * Simple YAML parser for flat config files: scalars and string lists
 */
export function parseSimpleYaml(content: string): CssAstConfig {
  const raw: Record<string, unknown> = {};
  let currentArray: string[] | null = null;

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    if (trimmed.startsWith('- ')) {
      currentArray?.push(unquote(trimmed.substring(2).trim()));
      continue;
    }

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex <= 0) {
      continue;
    }

    const key = trimmed.substring(0, colonIndex).trim();
    const value = trimmed.substring(colonIndex + 1).trim();

    if (!value) {
      currentArray = [];
      raw[key] = currentArray;
      continue;
    }

    currentArray = null;
    if (value === 'true' || value === 'false') {
      raw[key] = value === 'true';
    } else if (/^\d+$/.test(value)) {
      raw[key] = parseInt(value, 10);
    } else {
      raw[key] = unquote(value);
    }
  }

  return validateConfig(raw, 'YAML config');
}

/**
 * Find and load config file from directory
 */
export async function findConfig(directory: string): Promise<CssAstConfig | null> {
  const dir = path.resolve(directory);

  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(dir, configFile);
    try {
      await fs.access(configPath);
    } catch {
      continue;
    }
    return loadConfigFile(configPath);
  }

  const parentDir = path.dirname(dir);
  if (parentDir !== dir) {
    return findConfig(parentDir);
  }

  return null;
}

/**
 * Generate a default config file
 */
export function generateDefaultConfig(): string {
  const config: Required<CssAstConfig> = { ...DEFAULT_CONFIG };
  return JSON.stringify(config, null, 2);
}

/**
 * Write config file to disk
 */
export async function writeConfigFile(
  directory: string,
  filename: string = '.cssastrc.json'
): Promise<string> {
  const configPath = path.join(directory, filename);
  await fs.writeFile(configPath, generateDefaultConfig(), 'utf-8');
  return configPath;
}
