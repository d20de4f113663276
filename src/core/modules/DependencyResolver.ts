// ---------------------------------------------------------------------------
// Mail2SMS — Dependency Resolver
// ---------------------------------------------------------------------------
// Topological sort over manifest dependencies. Modules with no ordering
// constraint between them come out in ID order so startup is deterministic.
// ---------------------------------------------------------------------------

import { ModuleManifest } from '../types/module';
import { DependencyError } from '../../shared/errors';

export interface DependencyGraph {
  /** Module IDs in safe startup order (dependencies before dependents). */
  order: string[];

  /** moduleId → IDs it depends on. */
  edges: Map<string, string[]>;
}

type Mark = 'visiting' | 'done';

export class DependencyResolver {
  /**
   * @throws DependencyError on missing dependencies, self-references or cycles.
   */
  resolve(manifests: ModuleManifest[]): DependencyGraph {
    const edges = new Map<string, string[]>();
    for (const manifest of manifests) {
      edges.set(manifest.id, [...(manifest.dependencies ?? [])].sort());
    }

    for (const [id, deps] of edges) {
      for (const dep of deps) {
        if (dep === id) {
          throw new DependencyError(`Module "${id}" lists itself as a dependency.`);
        }
        if (!edges.has(dep)) {
          throw new DependencyError(
            `Module "${id}" depends on "${dep}", which is not registered or not enabled.`,
          );
        }
      }
    }

    const marks = new Map<string, Mark>();
    const order: string[] = [];

    const visit = (id: string, path: string[]): void => {
      const mark = marks.get(id);
      if (mark === 'done') return;
      if (mark === 'visiting') {
        const cycle = [...path.slice(path.indexOf(id)), id];
        throw new DependencyError(`Circular dependency detected: ${cycle.join(' → ')}`);
      }

      marks.set(id, 'visiting');
      for (const dep of edges.get(id) ?? []) {
        visit(dep, [...path, id]);
      }
      marks.set(id, 'done');
      order.push(id);
    };

    for (const id of [...edges.keys()].sort()) {
      visit(id, []);
    }

    return { order, edges };
  }
}
