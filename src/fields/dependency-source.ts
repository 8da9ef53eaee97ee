/**
 * Dependency resolution for derived values
 *
 * A DependencySource holds one slot per declared argument of a derivation.
 * A slot is either a direct reference to a Field or a path expression
 * resolved against the path node (normally the node that owns the derived
 * value's field). Resolved references are handles: a reference whose field
 * was disposed, moved out of the container it was found in, or whose tree
 * changed shape since resolution is re-resolved from its path on the next
 * read.
 *
 * The DependencySource is also the provenance of its derived value: it is
 * what `DerivedValue.source()` returns.
 */

import { CatalogError, UnresolvedDependencyError } from '../core/errors.js';
import { Handle } from '../core/handle.js';
import { currentStructureGeneration } from '../tree/node.js';
import type { CatalogNode } from '../tree/node.js';
import type { Field, InvalidationChain, NotifierHandle } from './field.js';
import { parsePath, resolvePath } from './path.js';
import type { ParsedPath } from './path.js';

/**
 * A dependency: a path expression or the Field itself
 */
export type DependencySpec = string | Field;

interface DependencyLink {
  readonly field: Handle<Field>;
  readonly subscription: NotifierHandle;
  /** Node the field was attached to when the path resolved */
  readonly container: CatalogNode | undefined;
  /** Structure generation the path resolved in */
  generation: number;
}

interface DependencySlot {
  readonly declared: DependencySpec;
  readonly path: ParsedPath | undefined;
  link: DependencyLink | undefined;
}

let dependentCounter = 0;

export class DependencySource {
  /** Unique identifier, `dependent<N>` */
  readonly id: string;
  private readonly slots: DependencySlot[];
  private pathNodeHandle: Handle<CatalogNode> | undefined;
  private readonly onChange: (chain: InvalidationChain) => void;

  constructor(
    dependencies: readonly DependencySpec[],
    onChange: (chain: InvalidationChain) => void,
    pathNode?: CatalogNode
  ) {
    this.id = `dependent${dependentCounter++}`;
    this.onChange = onChange;
    this.pathNodeHandle = pathNode === undefined ? undefined : new Handle(pathNode);
    this.slots = dependencies.map((declared) =>
      typeof declared === 'string' ? { declared, path: parsePath(declared), link: undefined } : { declared, path: undefined, link: undefined }
    );

    for (const slot of this.slots) {
      if (typeof slot.declared !== 'string') {
        slot.link = this.link(slot.declared);
      }
    }
  }

  /** Number of declared dependencies */
  get length(): number {
    return this.slots.length;
  }

  /** The dependencies as declared */
  get declarations(): readonly DependencySpec[] {
    return this.slots.map((slot) => slot.declared);
  }

  /** Dependency sources carry no citation */
  get location(): undefined {
    return undefined;
  }

  get isDefault(): false {
    return false;
  }

  get pathNode(): CatalogNode | undefined {
    return this.pathNodeHandle?.deref();
  }

  /**
   * Change the origin of path resolution. Path-resolved references are
   * released and resolved again on the next read.
   */
  setPathNode(node: CatalogNode | undefined): void {
    if (node !== undefined && this.pathNodeHandle?.refersTo(node) === true) {
      return;
    }
    this.pathNodeHandle?.release();
    this.pathNodeHandle = node === undefined ? undefined : new Handle(node);
    for (const slot of this.slots) {
      if (slot.path !== undefined) {
        this.unlink(slot);
      }
    }
  }

  /**
   * Whether every slot holds a live reference
   */
  get resolved(): boolean {
    return this.slots.every((slot) => this.isLive(slot));
  }

  /**
   * Resolve every slot whose reference is missing or dead. Slots that
   * resolve are linked even when others fail.
   *
   * @throws UnresolvedDependencyError listing the positions that failed
   */
  populateReferences(): void {
    const indices: number[] = [];
    const reasons: string[] = [];

    this.slots.forEach((slot, index) => {
      if (this.isLive(slot)) {
        return;
      }
      const reason = this.resolveSlot(slot);
      if (reason !== undefined) {
        indices.push(index);
        reasons.push(reason);
      }
    });

    if (indices.length > 0) {
      throw new UnresolvedDependencyError(
        `Could not resolve dependencies [${indices.join(', ')}] of ${this.id}: ${reasons.join('; ')}`,
        indices,
        reasons
      );
    }
  }

  /**
   * Resolve stale references again. True when every slot is live and still
   * refers to the field it referred to before.
   */
  refreshReferences(): boolean {
    const before = this.slots.map((slot) => slot.link?.field.deref());
    try {
      this.populateReferences();
    } catch (error) {
      if (error instanceof UnresolvedDependencyError) {
        return false;
      }
      throw error;
    }
    return this.slots.every((slot, index) => {
      const field = slot.link?.field.deref();
      return field !== undefined && field === before[index];
    });
  }

  /**
   * Current value of each dependency, in declaration order
   */
  getDependencyValues(): unknown[] {
    this.populateReferences();
    return this.slots.map((slot, index) => {
      const field = slot.link?.field.deref();
      if (field === undefined) {
        throw new UnresolvedDependencyError(`Dependency ${index} of ${this.id} was released`, [index]);
      }
      return field.value();
    });
  }

  /**
   * Drop every reference and its change subscription
   */
  release(): void {
    for (const slot of this.slots) {
      this.unlink(slot);
    }
  }

  toString(): string {
    return this.id;
  }

  private isLive(slot: DependencySlot): boolean {
    const link = slot.link;
    const field = link?.field.deref();
    if (link === undefined || field === undefined || field.disposed) {
      return false;
    }
    if (slot.path === undefined) {
      return true;
    }
    return field.node === link.container && link.generation === currentStructureGeneration();
  }

  /**
   * Returns the failure reason, or undefined once the slot is linked
   */
  private resolveSlot(slot: DependencySlot): string | undefined {
    if (slot.path === undefined) {
      this.unlink(slot);
      return 'referenced field is no longer available';
    }

    const origin = this.pathNode;
    if (origin === undefined) {
      return `no path node to resolve "${slot.path.source}" from`;
    }

    let field: Field;
    try {
      field = resolvePath(slot.path, origin);
    } catch (error) {
      if (error instanceof CatalogError) {
        return error.message;
      }
      throw error;
    }

    const previous = slot.link;
    if (previous !== undefined && previous.field.refersTo(field) && field.node === previous.container) {
      previous.generation = currentStructureGeneration();
      return undefined;
    }

    this.unlink(slot);
    slot.link = this.link(field);
    return undefined;
  }

  private link(field: Field): DependencyLink {
    const subscription = field.registerNotifier((_previous, _next, chain) => this.onChange(chain));
    return {
      field: new Handle(field),
      subscription,
      container: field.node,
      generation: currentStructureGeneration(),
    };
  }

  private unlink(slot: DependencySlot): void {
    if (slot.link !== undefined) {
      slot.link.subscription.dispose();
      slot.link.field.release();
      slot.link = undefined;
    }
  }
}
