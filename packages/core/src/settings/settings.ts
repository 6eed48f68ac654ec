/**
 * Engine settings: file locations and the time limits for adapters and
 * external commands.
 *
 * Resolution order: zod defaults < settings.yaml < environment.
 */

import fs from 'graceful-fs';
import { YAMLParseError, parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { FileSystemError, ParseError, ValidationError, describeError } from '../errors.js';
import { formatPath } from '../model/decode.js';
import { hasErrnoCode } from '../utils/errno.js';
import { DEFAULT_CONFIG_PATH, DEFAULT_SETTINGS_PATH, DEFAULT_STATE_DIR } from '../utils/paths.js';

export const WatchclockSettingsSchema = z.object({
  /** Clock jump (either direction) that counts as a jump */
  thresholdDays: z.number().positive().default(7),
  intervalSeconds: z.number().int().positive().default(30),
  /** Service restarted after a jump while it is running */
  service: z.string().min(1).default('meshtasticd'),
});

export const EngineSettingsSchema = z.object({
  configPath: z.string().min(1).default(DEFAULT_CONFIG_PATH),
  stateDir: z.string().min(1).default(DEFAULT_STATE_DIR),
  /** Prefix for every system file the adapters touch ("/" on a device) */
  systemRoot: z.string().min(1).default('/'),
  adapterTimeoutMs: z.number().int().positive().default(15_000),
  commandTimeoutMs: z.number().int().positive().default(10_000),
  lockRetries: z.number().int().nonnegative().default(10),
  watchclock: WatchclockSettingsSchema.default({}),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type WatchclockSettings = z.infer<typeof WatchclockSettingsSchema>;

export type SettingsInput = z.input<typeof EngineSettingsSchema>;

/** Environment variables that override file settings. */
export const SETTINGS_ENV = {
  settingsPath: 'NODECONF_SETTINGS',
  configPath: 'NODECONF_CONFIG_PATH',
  stateDir: 'NODECONF_STATE_DIR',
  adapterTimeoutMs: 'NODECONF_ADAPTER_TIMEOUT_MS',
} as const;

function parseSettings(input: unknown, source: string): EngineSettings {
  const parsed = EngineSettingsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw ValidationError.fromViolations(
      parsed.error.issues.map((issue) => ({
        path: formatPath(issue.path),
        message: `${issue.message} (in ${source})`,
      })),
    );
  }
  return parsed.data;
}

/** Settings with every default applied, plus explicit overrides. */
export function resolveSettings(overrides: SettingsInput = {}): EngineSettings {
  return parseSettings(overrides, 'overrides');
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const configPath = env[SETTINGS_ENV.configPath];
  if (configPath) out['configPath'] = configPath;
  const stateDir = env[SETTINGS_ENV.stateDir];
  if (stateDir) out['stateDir'] = stateDir;
  const timeout = env[SETTINGS_ENV.adapterTimeoutMs];
  if (timeout) out['adapterTimeoutMs'] = Number(timeout);
  return out;
}

async function readSettingsFile(filePath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return {};
    throw new FileSystemError(`Failed to read settings ${filePath}: ${describeError(err)}`, filePath, err);
  }

  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (err) {
    const pos = err instanceof YAMLParseError ? err.linePos?.[0] : undefined;
    throw new ParseError(
      `Malformed settings in ${filePath}: ${describeError(err)}`,
      filePath,
      pos?.line ?? 1,
      pos?.col ?? 1,
    );
  }

  const mapping = z.record(z.unknown()).safeParse(doc ?? {});
  if (!mapping.success) {
    throw new ValidationError(`Settings in ${filePath} must be a mapping`, [
      { path: '(root)', message: 'expected a mapping' },
    ]);
  }
  return mapping.data;
}

/**
 * Load engine settings from the YAML settings file (NODECONF_SETTINGS,
 * default /etc/nodeconf/settings.yaml; a missing file means defaults)
 * and apply environment overrides.
 */
export async function loadSettings(
  options: { settingsPath?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<EngineSettings> {
  const env = options.env ?? process.env;
  const settingsPath = options.settingsPath ?? env[SETTINGS_ENV.settingsPath] ?? DEFAULT_SETTINGS_PATH;
  const fromFile = await readSettingsFile(settingsPath);
  return parseSettings({ ...fromFile, ...envOverrides(env) }, settingsPath);
}
