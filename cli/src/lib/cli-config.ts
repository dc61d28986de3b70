import process from 'node:process';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  createParserError,
  isMissingFileError,
  ParserErrorCode,
  resolveConfig,
  type LookbackSeconds,
  type TrackmarkConfig,
  type TrackmarkConfigOverrides,
} from '@trackmark/core';

export const CONFIG_ENV_VAR = 'TRACKMARK_CONFIG';

const LOOKBACK_KEYS = ['SHORT_NOTE', 'LONG_NOTE', 'PROJECT_IDEA'] as const;

const CONFIG_KEYS = [
  'gapThresholdSeconds',
  'lookbackSeconds',
  'audioExtension',
  'markerExtension',
  'outputRoot',
  'concurrency',
  'retainMerged',
  'ffmpegPath',
] as const;

/** Command line values that override the config file. */
export interface CliConfigFlags {
  output?: string;
  gap?: number;
  concurrency?: number;
  retainMerged?: boolean;
}

export function getConfigPath(flagPath: string | undefined, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const candidate = flagPath ?? env[CONFIG_ENV_VAR];
  return candidate ? resolve(candidate) : undefined;
}

/**
 * Reads and validates a YAML config file. Relative `outputRoot` paths are
 * taken from the file's own directory.
 */
export async function loadConfigFile(filePath: string): Promise<TrackmarkConfigOverrides> {
  let contents: string;
  try {
    contents = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw configError(filePath, `Config file not found: ${filePath}`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    throw configError(filePath, 'Config file must be YAML.', error instanceof Error ? error.message : String(error));
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw configError(filePath, 'Config file must contain a YAML mapping.');
  }

  for (const key of Object.keys(parsed)) {
    if (!isConfigKey(key)) {
      throw configError(filePath, `Unknown config key '${key}'.`);
    }
  }

  const outputRoot = readString(filePath, parsed, 'outputRoot');
  return {
    gapThresholdSeconds: readNonNegativeNumber(filePath, parsed, 'gapThresholdSeconds'),
    lookbackSeconds: readLookbackSeconds(filePath, parsed.lookbackSeconds),
    audioExtension: readExtension(filePath, parsed, 'audioExtension'),
    markerExtension: readExtension(filePath, parsed, 'markerExtension'),
    outputRoot: outputRoot === undefined ? undefined : resolve(dirname(filePath), outputRoot),
    concurrency: readConcurrency(filePath, parsed.concurrency),
    retainMerged: readBoolean(filePath, parsed, 'retainMerged'),
    ffmpegPath: readString(filePath, parsed, 'ffmpegPath'),
  };
}

/**
 * Layers defaults, the config file and command line flags, in that order.
 */
export async function resolveCliConfig(options: {
  configPath?: string;
  flags?: CliConfigFlags;
}): Promise<TrackmarkConfig> {
  const fromFile = options.configPath ? await loadConfigFile(options.configPath) : {};
  const flags = options.flags ?? {};
  if (flags.gap !== undefined && (!Number.isFinite(flags.gap) || flags.gap < 0)) {
    throw new Error('--gap must be a non-negative number of seconds.');
  }
  if (flags.concurrency !== undefined && !isPositiveInteger(flags.concurrency)) {
    throw new Error('--concurrency must be a positive integer.');
  }
  return resolveConfig(fromFile, {
    outputRoot: flags.output === undefined ? undefined : resolve(flags.output),
    gapThresholdSeconds: flags.gap,
    concurrency: flags.concurrency,
    retainMerged: flags.retainMerged,
  });
}

type ConfigKey = (typeof CONFIG_KEYS)[number];

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function readNonNegativeNumber(filePath: string, source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw configError(filePath, `'${key}' must be a non-negative number.`);
  }
  return value;
}

function readString(filePath: string, source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw configError(filePath, `'${key}' must be a non-empty string.`);
  }
  return value;
}

function readExtension(filePath: string, source: Record<string, unknown>, key: string): string | undefined {
  const value = readString(filePath, source, key);
  if (value !== undefined && !/^\.[^./\\]+$/.test(value)) {
    throw configError(filePath, `'${key}' must be a file extension starting with a dot, like ".mp3".`);
  }
  return value;
}

function readBoolean(filePath: string, source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw configError(filePath, `'${key}' must be a boolean.`);
  }
  return value;
}

function readConcurrency(filePath: string, value: unknown): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !isPositiveInteger(value)) {
    throw configError(filePath, `'concurrency' must be a positive integer.`);
  }
  return value;
}

function readLookbackSeconds(filePath: string, value: unknown): Partial<LookbackSeconds> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw configError(filePath, `'lookbackSeconds' must be an object.`);
  }
  const lookback: Partial<LookbackSeconds> = {};
  for (const key of Object.keys(value)) {
    if (!LOOKBACK_KEYS.some((known) => known === key)) {
      throw configError(filePath, `'lookbackSeconds.${key}' is not a lookback pattern. Use ${LOOKBACK_KEYS.join(', ')}.`);
    }
  }
  for (const key of LOOKBACK_KEYS) {
    const seconds = value[key];
    if (seconds === undefined) {
      continue;
    }
    if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds < 0) {
      throw configError(filePath, `'lookbackSeconds.${key}' must be a non-negative number.`);
    }
    lookback[key] = seconds;
  }
  return lookback;
}

function configError(filePath: string, message: string, context?: string) {
  return createParserError(ParserErrorCode.INVALID_CONFIG_FILE, message, { filePath, context });
}
