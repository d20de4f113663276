// ---------------------------------------------------------------------------
// Mail2SMS — Configuration Types
// ---------------------------------------------------------------------------

/**
 * Root configuration shape loaded from YAML.
 */
export interface GatewayConfig {
  /** Top-level system settings. */
  system: SystemConfig;

  /** Per-module configuration keyed by module ID. */
  modules: Record<string, ModuleConfig>;

  /** Logging preferences. */
  logging?: LoggingConfig;
}

export type Environment = 'development' | 'staging' | 'production';

export interface SystemConfig {
  /** Display name for this gateway instance. */
  name: string;

  /** Deployment environment. */
  environment: Environment;
}

/**
 * Every module config section must at minimum contain `enabled`.
 * Additional keys are module-specific and validated via JSON Schema.
 */
export interface ModuleConfig {
  enabled: boolean;
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'text';

export interface LoggingConfig {
  /** Minimum severity to emit. */
  level: LogLevel;

  format: LogFormat;

  output: 'console' | 'file';

  /** File path when `output` is `'file'`. */
  file?: string;
}
