// ---------------------------------------------------------------------------
// Mail2SMS — Application Bootstrap
// ---------------------------------------------------------------------------
// The Application class is the single composition root. It loads config,
// builds the logger and event bus, instantiates the enabled modules and
// drives the startup/shutdown lifecycle.
//
// Usage:
//   const app = new Application();
//   app.registerModule('gateway.sms', () => gateway);
//   await app.start('config/default.yaml');
//   // ... running ...
//   await app.stop();
// ---------------------------------------------------------------------------

import { GatewayConfig } from './types/config';
import { ILogger, ModuleFactory } from './types/module';
import { IEventBus } from './types/events';
import { ConfigLoader } from './config/ConfigLoader';
import { ConfigValidator } from './config/ConfigValidator';
import { EventBus } from './bus/EventBus';
import { ModuleLoader } from './modules/ModuleLoader';
import { ModuleRegistry } from './modules/ModuleRegistry';
import { Logger } from '../shared/logger';
import { ConfigError, GatewayError, toError } from '../shared/errors';

export enum ApplicationState {
  Created = 'created',
  Starting = 'starting',
  Running = 'running',
  Stopping = 'stopping',
  Stopped = 'stopped',
  Error = 'error',
}

export interface ApplicationOptions {
  /** Environment used for config overrides. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Install SIGINT/SIGTERM handlers once running. Defaults to `true`. */
  handleSignals?: boolean;
  /** Use this logger instead of building one from the logging config. */
  logger?: ILogger;
}

export class Application {
  private state: ApplicationState = ApplicationState.Created;
  private config!: GatewayConfig;

  // Core subsystems, constructed during start()
  private logger!: ILogger;
  private bus!: IEventBus;
  private moduleLoader!: ModuleLoader;
  private moduleRegistry!: ModuleRegistry;

  // Factories registered before start()
  private readonly pendingFactories: Array<{ id: string; factory: ModuleFactory }> = [];

  // Callbacks invoked after modules are instantiated but before they initialize
  private readonly preInitHooks: Array<() => void> = [];

  constructor(private readonly options: ApplicationOptions = {}) {}

  // ── Public API ───────────────────────────────────────────────────────────

  /**
   * Register a module factory. Can be called before `start()`.
   * The factory is only invoked if the module is enabled.
   */
  registerModule(id: string, factory: ModuleFactory): void {
    this.pendingFactories.push({ id, factory });
  }

  /**
   * Register a callback that runs once the bus exists and modules are
   * instantiated, before any of them initialize. Used to wire modules
   * to each other.
   */
  onPreInit(hook: () => void): void {
    this.preInitHooks.push(hook);
  }

  /**
   * Boot the gateway:
   *   1. Load & validate config
   *   2. Construct logger and event bus
   *   3. Instantiate enabled modules
   *   4. Run pre-init hooks
   *   5. Initialize, then start, modules in dependency order
   *   6. Register shutdown hooks
   *
   * @param configPath  Path to the YAML config file.
   */
  async start(configPath: string = 'config/default.yaml'): Promise<void> {
    if (this.state !== ApplicationState.Created) {
      throw new GatewayError(
        `Cannot start: application is in "${this.state}" state`,
        'LIFECYCLE_ERROR',
      );
    }

    this.state = ApplicationState.Starting;

    try {
      // ── 1. Configuration ───────────────────────────────────────────────
      const configLoader = new ConfigLoader(this.options.env);
      this.config = configLoader.load(configPath);

      // ── 2. Logger (needs config first) ─────────────────────────────────
      this.logger = this.options.logger ?? new Logger({
        level: this.config.logging?.level ?? 'info',
        format: this.config.logging?.format ?? 'text',
        prefix: 'mail2sms',
        output: this.config.logging?.output ?? 'console',
        filePath: this.config.logging?.file,
      });

      this.logger.info('Starting gateway', {
        name: this.config.system.name,
        environment: this.config.system.environment,
      });

      const configValidator = new ConfigValidator();
      const rootValidation = configValidator.validateRoot(this.config);
      if (!rootValidation.valid) {
        throw new ConfigError(
          `Invalid configuration:\n  ${rootValidation.errors.join('\n  ')}`,
        );
      }

      this.logger.info('Configuration validated');

      // ── 3. Core Subsystems ─────────────────────────────────────────────
      this.bus = new EventBus(this.logger);

      // ── 4. Modules ─────────────────────────────────────────────────────
      this.moduleLoader = new ModuleLoader(this.logger);
      for (const { id, factory } of this.pendingFactories) {
        this.moduleLoader.registerFactory(id, factory);
      }

      const enabledIds = this.resolveEnabledModules();
      this.logger.info('Enabled modules', { modules: [...enabledIds] });

      const modules = this.moduleLoader.instantiateAll(enabledIds);

      // ── 5. Pre-Init Hooks ──────────────────────────────────────────────
      for (const hook of this.preInitHooks) {
        hook();
      }

      // ── 6. Module Registry ─────────────────────────────────────────────
      this.moduleRegistry = new ModuleRegistry(this.logger, this.bus);
      for (const mod of modules) {
        this.moduleRegistry.register(mod);
      }

      // ── 7. Initialize & Start ──────────────────────────────────────────
      await this.moduleRegistry.initializeAll(this.config);
      this.logger.info('All modules initialized');

      await this.moduleRegistry.startAll();
      this.logger.info('All modules started');

      // ── 8. Shutdown Hooks ──────────────────────────────────────────────
      if (this.options.handleSignals ?? true) {
        this.registerShutdownHooks();
      }

      this.state = ApplicationState.Running;
      this.logger.info('Gateway is running', {
        name: this.config.system.name,
        moduleCount: modules.length,
      });
    } catch (err) {
      this.state = ApplicationState.Error;
      const error = toError(err);
      if (this.logger) {
        this.logger.error('Failed to start gateway', error);
      } else {
        console.error('Failed to start gateway:', error);
      }
      throw err;
    }
  }

  /**
   * Gracefully shut down:
   *   1. Stop modules in reverse dependency order
   *   2. Destroy modules
   *   3. Clean up event bus
   */
  async stop(): Promise<void> {
    if (this.state !== ApplicationState.Running) {
      this.logger?.warn('Stop called but application is not running', {
        state: this.state,
      });
      return;
    }

    this.state = ApplicationState.Stopping;
    this.logger.info('Shutting down gateway...');

    try {
      await this.moduleRegistry.stopAll();
      this.logger.info('All modules stopped');

      await this.moduleRegistry.destroyAll();
      this.logger.info('All modules destroyed');

      this.bus.unsubscribeAll();

      this.state = ApplicationState.Stopped;
      this.logger.info('Gateway shutdown complete');
    } catch (err) {
      this.state = ApplicationState.Error;
      this.logger.error('Error during shutdown', toError(err));
      throw err;
    }
  }

  // ── Accessors (for testing / advanced use) ───────────────────────────────

  getState(): ApplicationState {
    return this.state;
  }

  getConfig(): GatewayConfig {
    return this.config;
  }

  getBus(): IEventBus {
    return this.bus;
  }

  getModuleRegistry(): ModuleRegistry {
    return this.moduleRegistry;
  }

  getLogger(): ILogger {
    return this.logger;
  }

  // ── Internal ───────────────────────────────────────────────────────────

  /**
   * A registered module is enabled unless its config section says
   * `enabled: false`. A module without a config section is enabled.
   */
  private resolveEnabledModules(): Set<string> {
    const enabled = new Set<string>();

    for (const id of this.moduleLoader.registeredIds()) {
      const moduleConfig = this.config.modules[id];
      if (moduleConfig && moduleConfig.enabled === false) {
        this.logger.info('Module disabled by configuration', { moduleId: id });
        continue;
      }
      enabled.add(id);
    }

    return enabled;
  }

  /**
   * Register process-level signal handlers for graceful shutdown.
   */
  private registerShutdownHooks(): void {
    const shutdown = async (signal: string): Promise<void> => {
      this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
      try {
        await this.stop();
        process.exit(0);
      } catch {
        process.exit(1);
      }
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
  }
}
