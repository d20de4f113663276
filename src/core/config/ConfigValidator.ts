// ---------------------------------------------------------------------------
// Mail2SMS — Configuration Validator
// ---------------------------------------------------------------------------
// Validates the root config shape and per-module config sections using
// JSON Schema (via Ajv). Results carry readable error lines; callers decide
// whether a failure is fatal.
// ---------------------------------------------------------------------------

import Ajv, { ValidateFunction, ErrorObject } from 'ajv';
import { GatewayConfig } from '../types/config';
import { ModuleManifest } from '../types/module';
import { ConfigError } from '../../shared/errors';

const ROOT_SCHEMA = {
  type: 'object',
  required: ['system', 'modules'],
  properties: {
    system: {
      type: 'object',
      required: ['name', 'environment'],
      properties: {
        name: { type: 'string', minLength: 1 },
        environment: { type: 'string', enum: ['development', 'staging', 'production'] },
      },
      additionalProperties: false,
    },
    modules: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['enabled'],
        properties: {
          enabled: { type: 'boolean' },
        },
      },
    },
    logging: {
      type: 'object',
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
        format: { type: 'string', enum: ['json', 'text'] },
        output: { type: 'string', enum: ['console', 'file'] },
        file: { type: 'string' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export class ConfigValidator {
  private readonly ajv: Ajv;
  private readonly rootValidator: ValidateFunction;
  /** Compiled module schemas, keyed by module ID. */
  private readonly moduleValidators = new Map<string, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({ allErrors: true, strict: false, useDefaults: false });
    this.rootValidator = this.ajv.compile(ROOT_SCHEMA);
  }

  validateRoot(config: GatewayConfig): ValidationResult {
    if (this.rootValidator(config)) {
      return { valid: true, errors: [] };
    }
    return {
      valid: false,
      errors: this.formatErrors(this.rootValidator.errors ?? []),
    };
  }

  /**
   * Validate a single module's config section against its declared JSON Schema.
   * A module without a `configSchema` always passes.
   *
   * @throws ConfigError only when the schema itself does not compile.
   */
  validateModuleConfig(
    manifest: ModuleManifest,
    moduleConfig: Record<string, unknown>,
  ): ValidationResult {
    if (!manifest.configSchema) {
      return { valid: true, errors: [] };
    }

    const validate = this.compileModuleSchema(manifest.id, manifest.configSchema);
    if (validate(moduleConfig)) {
      return { valid: true, errors: [] };
    }

    return {
      valid: false,
      errors: this.formatErrors(validate.errors ?? []).map((e) => `[${manifest.id}] ${e}`),
    };
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private compileModuleSchema(moduleId: string, schema: Record<string, unknown>): ValidateFunction {
    const cached = this.moduleValidators.get(moduleId);
    if (cached) return cached;

    try {
      const validate = this.ajv.compile(schema);
      this.moduleValidators.set(moduleId, validate);
      return validate;
    } catch (err) {
      throw new ConfigError(
        `Module "${moduleId}" has an invalid config schema: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined,
      );
    }
  }

  private formatErrors(errors: ErrorObject[]): string[] {
    return errors.map((e) => {
      const where = e.instancePath || '/';
      return `${where}: ${e.message ?? 'unknown error'}`;
    });
  }
}
