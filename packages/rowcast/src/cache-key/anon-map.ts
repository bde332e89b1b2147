/**
 * Identity-interning table for one cache key computation.
 *
 * Objects are assigned short, counter-derived ids in the order they are first
 * seen, so two traversals of structurally equal trees assign equal ids.
 */
export class AnonMap {
  readonly #ids = new Map<object, string>();
  #nextIndex = 0;
  #uncacheable = false;

  /**
   * Returns the id already assigned to `target`, or assigns the next one.
   */
  idFor(target: object): string {
    const existing = this.#ids.get(target);
    if (existing !== undefined) return existing;
    const id = String(this.#nextIndex++);
    this.#ids.set(target, id);
    return id;
  }

  /**
   * Returns `[id, seenBefore]` for `target`, assigning an id if needed.
   */
  intern(target: object): readonly [string, boolean] {
    const existing = this.#ids.get(target);
    if (existing !== undefined) return [existing, true];
    return [this.idFor(target), false];
  }

  /**
   * A copy that shares the ids assigned so far and numbers new objects from
   * the same point. Ids assigned by the copy are not seen here.
   */
  fork(): AnonMap {
    const copy = new AnonMap();
    for (const [target, id] of this.#ids) copy.#ids.set(target, id);
    copy.#nextIndex = this.#nextIndex;
    return copy;
  }

  /** Marks the whole computation as uncacheable. */
  markUncacheable(): void {
    this.#uncacheable = true;
  }

  get uncacheable(): boolean {
    return this.#uncacheable;
  }

  get size(): number {
    return this.#ids.size;
  }
}
