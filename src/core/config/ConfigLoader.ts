// ---------------------------------------------------------------------------
// Mail2SMS — Configuration Loader
// ---------------------------------------------------------------------------
// Loads YAML config from disk, applies environment variable overrides,
// and returns a typed GatewayConfig. Shape validation is the job of
// ConfigValidator.
// ---------------------------------------------------------------------------

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { GatewayConfig, ModuleConfig } from '../types/config';
import { ConfigError } from '../../shared/errors';

const DEFAULTS: GatewayConfig = {
  system: {
    name: 'mail2sms',
    environment: 'development',
  },
  modules: {},
  logging: {
    level: 'info',
    format: 'text',
    output: 'console',
  },
};

/**
 * Environment variable → (section, key) it overrides.
 * Numeric keys are coerced with `parseInt`; values that do not parse are
 * kept as strings so the validator reports them.
 */
const MODULE_ENV_OVERRIDES: ReadonlyArray<{
  env: string;
  moduleId: string;
  key: string;
  numeric?: boolean;
}> = [
  { env: 'MAIL2SMS_SMTP_HOST', moduleId: 'connector.smtp', key: 'host' },
  { env: 'MAIL2SMS_SMTP_PORT', moduleId: 'connector.smtp', key: 'port', numeric: true },
  { env: 'MAIL2SMS_SMS_BASE_URL', moduleId: 'gateway.sms', key: 'baseUrl' },
  { env: 'MAIL2SMS_SMS_USERNAME', moduleId: 'gateway.sms', key: 'username' },
  { env: 'MAIL2SMS_SMS_PASSWORD', moduleId: 'gateway.sms', key: 'password' },
  { env: 'MAIL2SMS_SMS_SENDER', moduleId: 'gateway.sms', key: 'sender' },
];

export class ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load configuration from a YAML file.
   *
   * @param configPath  Absolute or relative path to the YAML file.
   * @returns Merged configuration (defaults ← file ← env overrides).
   * @throws ConfigError if the file cannot be read or parsed.
   */
  load(configPath: string): GatewayConfig {
    const resolvedPath = path.resolve(configPath);

    if (!fs.existsSync(resolvedPath)) {
      // No config file is a valid scenario: everything may come from env
      return this.applyEnvOverrides(structuredClone(DEFAULTS));
    }

    let raw: string;
    try {
      raw = fs.readFileSync(resolvedPath, 'utf-8');
    } catch (err) {
      throw new ConfigError(
        `Failed to read config file: ${resolvedPath}`,
        err instanceof Error ? err : undefined,
      );
    }

    return this.loadFromString(raw, resolvedPath);
  }

  /**
   * Parse YAML text and merge it over the defaults.
   *
   * @param origin  Used in error messages only.
   */
  loadFromString(raw: string, origin = '<inline>'): GatewayConfig {
    let parsed: unknown;
    try {
      parsed = parseYaml(raw);
    } catch (err) {
      throw new ConfigError(
        `Failed to parse YAML in config file: ${origin}`,
        err instanceof Error ? err : undefined,
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file is empty or not an object: ${origin}`);
    }

    const merged = deepMerge(toRecord(structuredClone(DEFAULTS)), parsed);
    // Shape is checked by ConfigValidator before anything reads it
    return this.applyEnvOverrides(merged as unknown as GatewayConfig);
  }

  // ── Internal ───────────────────────────────────────────────────────────

  /**
   * Environment variable overrides:
   *   MAIL2SMS_SYSTEM_NAME, MAIL2SMS_SYSTEM_ENVIRONMENT,
   *   MAIL2SMS_LOGGING_LEVEL, MAIL2SMS_LOGGING_FORMAT,
   *   plus the module keys in MODULE_ENV_OVERRIDES.
   */
  private applyEnvOverrides(config: GatewayConfig): GatewayConfig {
    const env = this.env;

    if (env.MAIL2SMS_SYSTEM_NAME) {
      config.system.name = env.MAIL2SMS_SYSTEM_NAME;
    }
    if (env.MAIL2SMS_SYSTEM_ENVIRONMENT) {
      const value: string = env.MAIL2SMS_SYSTEM_ENVIRONMENT;
      Object.assign(config.system, { environment: value });
    }

    const logging = config.logging ?? { level: 'info', format: 'text', output: 'console' };
    if (env.MAIL2SMS_LOGGING_LEVEL) {
      Object.assign(logging, { level: env.MAIL2SMS_LOGGING_LEVEL });
    }
    if (env.MAIL2SMS_LOGGING_FORMAT) {
      Object.assign(logging, { format: env.MAIL2SMS_LOGGING_FORMAT });
    }
    config.logging = logging;

    for (const override of MODULE_ENV_OVERRIDES) {
      const value = env[override.env];
      if (value === undefined || value === '') continue;

      const section: ModuleConfig = config.modules[override.moduleId] ?? { enabled: true };
      const parsed = override.numeric ? Number.parseInt(value, 10) : NaN;
      section[override.key] = override.numeric && !Number.isNaN(parsed) ? parsed : value;
      config.modules[override.moduleId] = section;
    }

    return config;
  }
}

// ── Helpers ────────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toRecord(config: GatewayConfig): Record<string, unknown> {
  return { ...config };
}

/**
 * Recursively merge `source` into `target`, with `source` winning.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = target[key];

    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      target[key] = deepMerge(tgtVal, srcVal);
    } else {
      target[key] = srcVal;
    }
  }
  return target;
}
