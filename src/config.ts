import os from 'os';
import path from 'path';
import fs from 'fs';
import YAML from 'yaml';
import { z } from 'zod';

import type { BuoytermConfig } from './types.js';

export const APP_NAME = 'buoyterm';
export const VERSION = '0.1.0';

// Data directory - config and log file
export const DATA_DIR = path.join(os.homedir(), '.buoyterm');
export const CONFIG_PATH = path.join(DATA_DIR, 'config.yaml');
export const LOG_PATH = process.env.BUOYTERM_LOG_PATH || path.join(DATA_DIR, 'buoyterm.log');

export const DEFAULT_CONFIG: BuoytermConfig = {
  feeds: {
    observationsUrl: 'https://www.ndbc.noaa.gov/data/latest_obs/latest_obs.txt',
    stationsUrl: 'https://www.ndbc.noaa.gov/activestations.xml',
  },
  requestTimeoutMs: 30000, // 30 seconds
  mouse: true,
  margin: 2,
  theme: {
    selectedColor: 'cyanBright',
    normalColor: 'white',
  },
};

export class ConfigError extends Error {
  constructor(message: string, public configPath?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const ConfigSchema = z.object({
  feeds: z.object({
    observationsUrl: z.string().url(),
    stationsUrl: z.string().url(),
  }),
  requestTimeoutMs: z.number().int().positive(),
  mouse: z.boolean(),
  margin: z.number().int().min(0).max(10),
  theme: z.object({
    selectedColor: z.string().min(1),
    normalColor: z.string().min(1),
  }),
});

// Partial shape accepted from config.yaml
const FileConfigSchema = z
  .object({
    feeds: ConfigSchema.shape.feeds.partial(),
    requestTimeoutMs: z.unknown(),
    mouse: z.unknown(),
    margin: z.unknown(),
    theme: ConfigSchema.shape.theme.partial(),
  })
  .partial()
  .passthrough();

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return error.message;
  return `${issue.path.join('.') || '<root>'}: ${issue.message}`;
}

function readConfigFile(configPath: string): z.infer<typeof FileConfigSchema> {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${configPath}: ${reason}`, configPath);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = FileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config value at ${describeIssue(result.error)}`, configPath);
  }
  return result.data;
}

/**
 * Load configuration: defaults, then config.yaml (when present), then environment overrides.
 */
export function loadConfig(
  configPath: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): BuoytermConfig {
  const fileConfig = readConfigFile(configPath);

  const merged = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    feeds: {
      ...DEFAULT_CONFIG.feeds,
      ...fileConfig.feeds,
      ...(env.BUOYTERM_OBSERVATIONS_URL ? { observationsUrl: env.BUOYTERM_OBSERVATIONS_URL } : {}),
      ...(env.BUOYTERM_STATIONS_URL ? { stationsUrl: env.BUOYTERM_STATIONS_URL } : {}),
    },
    theme: { ...DEFAULT_CONFIG.theme, ...fileConfig.theme },
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid config value at ${describeIssue(result.error)}`, configPath);
  }
  return result.data;
}
