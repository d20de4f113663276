// ---------------------------------------------------------------------------
// Mail2SMS — Module Loader
// ---------------------------------------------------------------------------
// Holds module factories registered by the entry point and instantiates the
// ones the configuration leaves enabled.
// ---------------------------------------------------------------------------

import { IModule, ModuleFactory, ILogger } from '../types/module';
import { ModuleError } from '../../shared/errors';

export class ModuleLoader {
  private readonly factories = new Map<string, ModuleFactory>();
  private readonly logger: ILogger;

  constructor(logger: ILogger) {
    this.logger = logger.child('ModuleLoader');
  }

  /**
   * @param id       Module ID; must match the manifest ID of the produced module.
   */
  registerFactory(id: string, factory: ModuleFactory): void {
    if (this.factories.has(id)) {
      throw new ModuleError(`Module factory already registered: "${id}"`, id);
    }
    this.factories.set(id, factory);
    this.logger.debug('Factory registered', { moduleId: id });
  }

  /**
   * @throws ModuleError if no factory is registered, the factory throws, or
   *         the produced manifest ID does not match.
   */
  instantiate(id: string): IModule {
    const factory = this.factories.get(id);
    if (!factory) {
      throw new ModuleError(`No factory registered for module: "${id}"`, id);
    }

    let mod: IModule;
    try {
      mod = factory();
    } catch (err) {
      throw new ModuleError(
        `Failed to instantiate module "${id}": ${err instanceof Error ? err.message : String(err)}`,
        id,
        err instanceof Error ? err : undefined,
      );
    }

    if (mod.manifest.id !== id) {
      throw new ModuleError(
        `Module factory for "${id}" produced a module with mismatched manifest ID "${mod.manifest.id}"`,
        id,
      );
    }

    this.logger.info('Module instantiated', {
      moduleId: id,
      version: mod.manifest.version,
      type: mod.manifest.type,
    });
    return mod;
  }

  /** Instantiate every registered module whose ID is in `enabledIds`. */
  instantiateAll(enabledIds: ReadonlySet<string>): IModule[] {
    const modules: IModule[] = [];
    for (const id of this.factories.keys()) {
      if (!enabledIds.has(id)) {
        this.logger.info('Module skipped (disabled)', { moduleId: id });
        continue;
      }
      modules.push(this.instantiate(id));
    }
    return modules;
  }

  registeredIds(): string[] {
    return [...this.factories.keys()];
  }
}
