// ---------------------------------------------------------------------------
// Mail2SMS — Module Registry & Lifecycle Manager
// ---------------------------------------------------------------------------
// Owns the lifecycle of all active modules and moves them through the state
// machine in dependency order: init/start forward, stop/destroy in reverse.
// ---------------------------------------------------------------------------

import {
  IModule,
  ModuleState,
  ModuleContext,
  ModuleHealth,
  ILogger,
} from '../types/module';
import { IEventBus, GatewayEvent } from '../types/events';
import { GatewayConfig } from '../types/config';
import { ConfigValidator } from '../config/ConfigValidator';
import { DependencyResolver } from './DependencyResolver';
import { ModuleError, toError } from '../../shared/errors';

interface ModuleEntry {
  module: IModule;
  state: ModuleState;
  error?: Error;
}

/** Payload of the `module.lifecycle` event emitted on every transition. */
export interface ModuleLifecyclePayload {
  moduleId: string;
  from: ModuleState;
  state: ModuleState;
  error?: string;
}

export class ModuleRegistry {
  private readonly entries = new Map<string, ModuleEntry>();
  private readonly logger: ILogger;
  private readonly configValidator = new ConfigValidator();
  private readonly dependencyResolver = new DependencyResolver();
  private startupOrder: string[] = [];

  constructor(
    logger: ILogger,
    private readonly bus: IEventBus,
  ) {
    this.logger = logger.child('ModuleRegistry');
  }

  /**
   * Register an instantiated module. Does NOT initialize or start it.
   */
  register(module: IModule): void {
    const id = module.manifest.id;
    if (this.entries.has(id)) {
      throw new ModuleError(`Module already registered: "${id}"`, id);
    }

    this.entries.set(id, { module, state: ModuleState.Registered });

    this.logger.info('Module registered', {
      moduleId: id,
      type: module.manifest.type,
      version: module.manifest.version,
    });
  }

  // ── Bulk lifecycle ───────────────────────────────────────────────────────

  /**
   * Resolve dependencies, validate each module's config section and
   * initialize all registered modules in order.
   */
  async initializeAll(config: GatewayConfig): Promise<void> {
    const manifests = [...this.entries.values()].map((e) => e.module.manifest);
    this.startupOrder = this.dependencyResolver.resolve(manifests).order;

    this.logger.info('Dependency order resolved', { order: this.startupOrder });

    for (const id of this.startupOrder) {
      await this.initializeOne(id, config);
    }
  }

  async startAll(): Promise<void> {
    for (const id of this.startupOrder) {
      if (this.getState(id) !== ModuleState.Initialized) continue;
      await this.startOne(id);
    }
  }

  /** Stop all running modules in REVERSE dependency order. */
  async stopAll(): Promise<void> {
    for (const id of [...this.startupOrder].reverse()) {
      if (this.getState(id) !== ModuleState.Running) continue;
      await this.stopOne(id);
    }
  }

  async destroyAll(): Promise<void> {
    for (const id of [...this.startupOrder].reverse()) {
      const state = this.getState(id);
      if (state !== ModuleState.Stopped && state !== ModuleState.Error) continue;
      await this.destroyOne(id);
    }
  }

  // ── Individual transitions ───────────────────────────────────────────────

  private async initializeOne(id: string, config: GatewayConfig): Promise<void> {
    const { module } = this.entry(id);
    const { enabled: _enabled, ...moduleConfig } = config.modules[id] ?? { enabled: true };

    const result = this.configValidator.validateModuleConfig(module.manifest, moduleConfig);
    if (!result.valid) {
      const err = new ModuleError(
        `Config validation failed for "${id}": ${result.errors.join('; ')}`,
        id,
      );
      this.transition(id, ModuleState.Error, err);
      throw err;
    }

    const context: ModuleContext = {
      moduleId: id,
      config: moduleConfig,
      bus: this.bus,
      logger: this.logger.child(id),
    };

    this.transition(id, ModuleState.Initializing);
    try {
      await module.initialize(context);
      this.transition(id, ModuleState.Initialized);
    } catch (err) {
      const error = toError(err);
      this.transition(id, ModuleState.Error, error);
      throw new ModuleError(`Module "${id}" failed to initialize: ${error.message}`, id, error);
    }
  }

  private async startOne(id: string): Promise<void> {
    const { module } = this.entry(id);
    this.transition(id, ModuleState.Starting);
    try {
      await module.start();
      this.transition(id, ModuleState.Running);
    } catch (err) {
      const error = toError(err);
      this.transition(id, ModuleState.Error, error);
      throw new ModuleError(`Module "${id}" failed to start: ${error.message}`, id, error);
    }
  }

  private async stopOne(id: string): Promise<void> {
    const { module } = this.entry(id);
    this.transition(id, ModuleState.Stopping);
    try {
      await module.stop();
    } catch (err) {
      // Shutdown continues regardless
      this.logger.error(`Module "${id}" failed to stop cleanly`, toError(err));
    }
    this.transition(id, ModuleState.Stopped);
  }

  private async destroyOne(id: string): Promise<void> {
    const { module } = this.entry(id);
    try {
      await module.destroy();
    } catch (err) {
      this.logger.error(`Module "${id}" failed to destroy cleanly`, toError(err));
    }
    this.transition(id, ModuleState.Destroyed);
  }

  // ── State machine ────────────────────────────────────────────────────────

  private transition(id: string, state: ModuleState, error?: Error): void {
    const entry = this.entry(id);
    const from = entry.state;
    entry.state = state;
    entry.error = error;

    this.logger.info('Module state transition', {
      moduleId: id,
      from,
      to: state,
      ...(error ? { error: error.message } : {}),
    });

    const event: GatewayEvent<ModuleLifecyclePayload> = {
      type: 'module.lifecycle',
      source: 'core.registry',
      timestamp: new Date(),
      payload: {
        moduleId: id,
        from,
        state,
        ...(error ? { error: error.message } : {}),
      },
    };

    // Lifecycle events are best-effort; not awaited
    this.bus.publish(event).catch((e) => {
      this.logger.error('Failed to emit lifecycle event', toError(e));
    });
  }

  private entry(id: string): ModuleEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new ModuleError(`Module not registered: "${id}"`, id);
    }
    return entry;
  }

  // ── Queries ──────────────────────────────────────────────────────────────

  getState(id: string): ModuleState | undefined {
    return this.entries.get(id)?.state;
  }

  getHealth(id: string): ModuleHealth | undefined {
    return this.entries.get(id)?.module.health();
  }

  getRegisteredIds(): string[] {
    return [...this.entries.keys()];
  }

  isRunning(id: string): boolean {
    return this.entries.get(id)?.state === ModuleState.Running;
  }
}
