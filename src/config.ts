/**
 * Connector configuration schema using Zod.
 * Validated from environment variables at startup.
 *
 * The Home Assistant token can be given directly (HA_TOKEN) or read from a
 * file (HA_TOKEN_FILE, e.g. a Docker secret). The file wins when both are set.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { LogLevel } from './logger.ts';

/** Raised when the environment does not describe a valid configuration. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function envBoolean(defaultValue: boolean) {
  return z
    .string()
    .trim()
    .toLowerCase()
    .refine((v) => TRUE_VALUES.includes(v) || FALSE_VALUES.includes(v), {
      message: `must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`,
    })
    .transform((v) => TRUE_VALUES.includes(v))
    .optional()
    .transform((v) => v ?? defaultValue);
}

function envSeconds(defaultValue: number) {
  return z.coerce.number().min(0, 'must not be negative').default(defaultValue);
}

/**
 * Raw environment schema. Unknown variables are ignored.
 */
export const ConnectorEnvSchema = z
  .object({
    HA_URL: z
      .string()
      .url('must be a valid URL')
      .refine((url) => /^https?:\/\//.test(url), { message: 'must use http or https' }),
    HA_TOKEN: z.string().min(1).optional(),
    HA_TOKEN_FILE: z.string().min(1).optional(),
    SCENES_FILE: z.string().min(1).default('scenes.yaml'),
    ATTRIBUTES_FILE: z.string().min(1).optional(),
    NUMBER_TOLERANCE: z.coerce.number().min(0, 'must not be negative').default(3),
    TRANSITION_TIME: envSeconds(0),
    DEBOUNCE_TIME: envSeconds(0),
    RESTORE_ON_DEACTIVATE: envBoolean(true),
    IGNORE_UNAVAILABLE: envBoolean(false),
    EXTERNAL_SCENES: z
      .string()
      .optional()
      .transform((v) =>
        (v ?? '')
          .split(',')
          .map((p) => p.trim())
          .filter((p) => p.length > 0),
      ),
    COMMAND_EVENT: z
      .string()
      .trim()
      .regex(/^[a-z0-9_]+$/, 'must be a lowercase event type')
      .default('stateful_scenes_command'),
    HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(9001),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .strip();

export type ConnectorEnv = z.infer<typeof ConnectorEnvSchema>;

export interface ConnectorConfig {
  haUrl: string;
  haToken: string;
  scenesFile: string;
  attributesFile?: string;
  numberTolerance: number;
  transitionTime: number;
  debounceTime: number;
  restoreOnDeactivate: boolean;
  ignoreUnavailable: boolean;
  /** Glob patterns of host scene entities tracked as learned scenes. */
  externalScenes: string[];
  /** Home Assistant event type carrying scene commands. */
  commandEvent: string;
  healthPort: number;
  logLevel: LogLevel;
}

function readTokenFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8').trim();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`HA_TOKEN_FILE: cannot read ${path}: ${message}`]);
  }
}

/**
 * Validate the environment and resolve the access token.
 *
 * @throws ConfigError listing every failing variable
 */
export function loadConnectorConfig(env: NodeJS.ProcessEnv = process.env): ConnectorConfig {
  const result = ConnectorEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const raw = result.data;
  const haToken = raw.HA_TOKEN_FILE ? readTokenFile(raw.HA_TOKEN_FILE) : raw.HA_TOKEN;
  if (!haToken) {
    throw new ConfigError(['HA_TOKEN: HA_TOKEN or HA_TOKEN_FILE is required']);
  }

  return {
    haUrl: raw.HA_URL,
    haToken,
    scenesFile: raw.SCENES_FILE,
    attributesFile: raw.ATTRIBUTES_FILE,
    numberTolerance: raw.NUMBER_TOLERANCE,
    transitionTime: raw.TRANSITION_TIME,
    debounceTime: raw.DEBOUNCE_TIME,
    restoreOnDeactivate: raw.RESTORE_ON_DEACTIVATE,
    ignoreUnavailable: raw.IGNORE_UNAVAILABLE,
    externalScenes: raw.EXTERNAL_SCENES,
    commandEvent: raw.COMMAND_EVENT,
    healthPort: raw.HEALTH_PORT,
    logLevel: raw.LOG_LEVEL,
  };
}

/**
 * Create a safe-to-log version of config with the token redacted.
 */
export function redactConfig(config: ConnectorConfig): ConnectorConfig {
  return { ...config, haToken: '[REDACTED]' };
}
