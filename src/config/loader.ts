// Config loader — built-in defaults, then an optional YAML file named by
// ENTRYPOINT_CONFIG, then ENTRYPOINT_* environment overrides. The merged result
// is validated against EntrypointConfigSchema (src/types/config.ts).
// The loader never writes a config file: the image is read-only to us.
import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { EntrypointConfigSchema, type EntrypointConfig } from '../types/config.js';
import { EntrypointError, EntrypointErrorCode } from '../shared/errors.js';

export const CONFIG_PATH_ENV = 'ENTRYPOINT_CONFIG';

export interface ConfigResult {
  config: EntrypointConfig;
  configPath: string | null;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): ConfigResult {
  const configPath = nonEmpty(env[CONFIG_PATH_ENV]) ?? null;
  const fileLayer = configPath ? readConfigFile(configPath) : {};
  const merged = deepMerge(fileLayer, envLayer(env));

  const parsed = EntrypointConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new EntrypointError(EntrypointErrorCode.CONFIG_INVALID, 'Invalid entrypoint configuration', {
      configPath,
      issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    });
  }
  return { config: parsed.data, configPath };
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new EntrypointError(EntrypointErrorCode.CONFIG_INVALID, `Cannot read config file: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    throw new EntrypointError(EntrypointErrorCode.CONFIG_INVALID, `Cannot parse config file: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  // An empty document parses to null.
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new EntrypointError(EntrypointErrorCode.CONFIG_INVALID, `Config file must contain a mapping: ${configPath}`);
  }
  return doc;
}

/** Only variables that are set and non-empty take part. */
function envLayer(env: Env): Record<string, unknown> {
  const provisioner: Record<string, unknown> = {};
  const command = nonEmpty(env['ENTRYPOINT_PROVISIONER']);
  const inventory = nonEmpty(env['ENTRYPOINT_INVENTORY']);
  const playbook = nonEmpty(env['ENTRYPOINT_PLAYBOOK']);
  const extraArgs = nonEmpty(env['ENTRYPOINT_PROVISION_ARGS']);
  if (command) provisioner['command'] = command;
  if (inventory) provisioner['inventory'] = inventory;
  if (playbook) provisioner['playbook'] = playbook;
  if (extraArgs) provisioner['extra_args'] = extraArgs.split(/\s+/);

  const layer: Record<string, unknown> = {};
  if (Object.keys(provisioner).length > 0) layer['provisioner'] = provisioner;
  const logLevel = nonEmpty(env['LOG_LEVEL']);
  if (logLevel) layer['log_level'] = logLevel;
  return layer;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
