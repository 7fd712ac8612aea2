/**
 * @arch hexgraph.core.engine
 *
 * Explicit rebuild entry point: re-runs registration and graph construction
 * on demand. Nothing here refreshes automatically.
 */
import { buildGraph } from '../graph/builder.js';
import type { ArchitectureGraph } from '../graph/graph.js';
import { composeRegistry } from '../registry/registration.js';
import type { ComponentModule } from '../registry/types.js';
import { ValidationEngine } from '../validation/engine.js';
import type { Finding, ValidationOptions, ValidationReport } from '../validation/types.js';

/**
 * Result of one rebuild. The graph owns its data independently of the
 * registry it was built from.
 */
export interface ArchitectureSnapshot {
  readonly graph: ArchitectureGraph;
  /** Findings observed while building */
  readonly findings: readonly Finding[];
  /** Number of entry candidates collected */
  readonly entryCount: number;
}

export interface ArchitectureEngineOptions {
  /** Description carried by every built graph */
  description?: string;
  validation?: ValidationOptions;
}

export class ArchitectureEngine {
  private readonly modules: readonly ComponentModule[];
  private readonly description?: string;
  private readonly validator: ValidationEngine;
  private snapshot: ArchitectureSnapshot | undefined;

  constructor(modules: Iterable<ComponentModule>, options: ArchitectureEngineOptions = {}) {
    this.modules = Object.freeze([...modules]);
    this.description = options.description;
    this.validator = new ValidationEngine(options.validation);
  }

  /**
   * Compose a fresh registry from every module, build a new graph from it and
   * make that the current snapshot. Earlier snapshots stay valid for readers
   * that still hold them.
   */
  rebuild(): ArchitectureSnapshot {
    const registry = composeRegistry(this.modules);
    const { graph, findings } = buildGraph(registry.collectAll(), { description: this.description });
    this.snapshot = Object.freeze({ graph, findings, entryCount: registry.size });
    return this.snapshot;
  }

  /**
   * The latest snapshot, or undefined before the first rebuild.
   */
  current(): ArchitectureSnapshot | undefined {
    return this.snapshot;
  }

  /**
   * Validate the current snapshot, building it first if needed.
   */
  validate(): ValidationReport {
    const snapshot = this.snapshot ?? this.rebuild();
    return this.validator.validate(snapshot.graph, snapshot.findings);
  }
}
