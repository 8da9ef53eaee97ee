/**
 * Non-owning references
 *
 * Parent pointers, field ownership, dependency links and notifier
 * subscriptions never keep their target alive on their own terms: each is a
 * Handle that can be released, after which every dereference sees it as dead.
 * Callers check `alive` (or the result of `deref`) on each access.
 */

export class Handle<T extends object> {
  private target: T | undefined;

  constructor(target: T) {
    this.target = target;
  }

  get alive(): boolean {
    return this.target !== undefined;
  }

  /**
   * The target, or undefined once released
   */
  deref(): T | undefined {
    return this.target;
  }

  /**
   * Whether this handle is alive and points at the given object
   */
  refersTo(candidate: object): boolean {
    return this.target !== undefined && this.target === candidate;
  }

  release(): void {
    this.target = undefined;
  }
}
