/**
 * @arch hexgraph.core.domain
 *
 * Component registry - accumulates entry candidates during startup.
 * Write-once-then-read-many: registration happens in a single-writer phase
 * ended by seal(); collection may run any number of times afterwards.
 */
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import type { EntryCandidate } from './types.js';

/**
 * Shallow-copy and freeze a candidate so later mutation by the caller
 * cannot reach registered data. Array fields are copied too.
 */
function freezeCandidate(candidate: EntryCandidate): EntryCandidate {
  const copy: Record<string, unknown> = { ...candidate };
  for (const [key, value] of Object.entries(copy)) {
    if (Array.isArray(value)) {
      copy[key] = Object.freeze([...value]);
    }
  }
  return Object.freeze(copy);
}

export class ComponentRegistry {
  private readonly entries: EntryCandidate[] = [];
  private sealed = false;

  /**
   * Append one entry. Duplicate type names are accepted here and resolved
   * when the graph is built.
   */
  register(entry: EntryCandidate): this {
    if (this.sealed) {
      throw new RegistryError(
        ErrorCodes.REGISTRY_SEALED,
        'Cannot register components after the registry has been sealed',
        { registered: this.entries.length }
      );
    }
    this.entries.push(freezeCandidate(entry));
    return this;
  }

  registerAll(entries: Iterable<EntryCandidate>): this {
    for (const entry of entries) {
      this.register(entry);
    }
    return this;
  }

  /**
   * End the registration phase. Idempotent.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Lazy, restartable view of every entry registered so far.
   * Each iteration starts over from the first entry.
   */
  collectAll(): Iterable<EntryCandidate> {
    const entries = this.entries;
    return {
      *[Symbol.iterator](): Iterator<EntryCandidate> {
        yield* entries;
      },
    };
  }
}
