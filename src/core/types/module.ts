// ---------------------------------------------------------------------------
// Mail2SMS — Core Module Types
// ---------------------------------------------------------------------------
// The contract between the core and every module. The core hands each
// module a `ModuleContext` at initialization so modules never reach into
// core internals.
// ---------------------------------------------------------------------------

import { IEventBus } from './events';

// ── Module Classification ──────────────────────────────────────────────────

export enum ModuleType {
  /** Accepts traffic from the outside world (the SMTP listener). */
  Connector = 'connector',
  /** Bridges accepted traffic to a remote service. */
  Gateway = 'gateway',
}

// ── Lifecycle State Machine ────────────────────────────────────────────────

/**
 * ```
 * Registered → Initializing → Initialized → Starting → Running
 *                                                         │
 *                                          Stopping ← ────┘
 *                                             │
 *                                          Stopped → Destroyed
 *
 * Any state may transition to → Error
 * ```
 */
export enum ModuleState {
  Registered = 'registered',
  Initializing = 'initializing',
  Initialized = 'initialized',
  Starting = 'starting',
  Running = 'running',
  Stopping = 'stopping',
  Stopped = 'stopped',
  Destroyed = 'destroyed',
  Error = 'error',
}

// ── Module Manifest ────────────────────────────────────────────────────────

export interface ModuleManifest {
  /** Unique identifier using `<type>.<name>` convention, e.g. `connector.smtp`. */
  readonly id: string;

  readonly name: string;

  readonly version: string;

  readonly type: ModuleType;

  readonly description?: string;

  /**
   * IDs of modules that must be initialized and started before this one.
   * Stop order is the reverse.
   */
  readonly dependencies?: readonly string[];

  /** JSON Schema for the module's config section, applied before `initialize()`. */
  readonly configSchema?: Record<string, unknown>;
}

// ── Module Health ──────────────────────────────────────────────────────────

export interface ModuleHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  message?: string;
  details?: Record<string, unknown>;
  lastCheck: Date;
}

// ── Logger Interface ───────────────────────────────────────────────────────

/**
 * Structured logger. Modules receive a child logger prefixed with their ID.
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  child(prefix: string): ILogger;
}

// ── Module Context ─────────────────────────────────────────────────────────

export interface ModuleContext {
  readonly moduleId: string;

  /** Module-specific configuration, already validated against the schema. */
  readonly config: Readonly<Record<string, unknown>>;

  readonly bus: IEventBus;

  readonly logger: ILogger;
}

// ── Module Interface ───────────────────────────────────────────────────────

/**
 * Lifecycle methods are called in strict order by the `ModuleRegistry`:
 *
 * 1. `initialize(context)`: receive context, build internal state
 * 2. `start()`: begin active work (bind sockets)
 * 3. `stop()`: cease active work
 * 4. `destroy()`: release all resources
 *
 * Errors thrown from any step move the module to `Error` state.
 */
export interface IModule {
  readonly manifest: ModuleManifest;

  initialize(context: ModuleContext): Promise<void>;

  start(): Promise<void>;

  stop(): Promise<void>;

  destroy(): Promise<void>;

  health(): ModuleHealth;
}

export type ModuleFactory = () => IModule;
