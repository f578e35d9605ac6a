/**
 * Lazily initialised slot that runs its factory at most once
 */
export class OnceCell<T> {
  private slot: { value: T } | null = null;

  get(): T | undefined {
    return this.slot?.value;
  }

  isInitialized(): boolean {
    return this.slot !== null;
  }

  getOrInit(factory: () => T): T {
    const existing = this.slot;
    if (existing) {
      return existing.value;
    }

    const created = factory();
    // factory may have filled the cell re-entrantly; first writer wins
    if (this.slot) {
      return this.slot.value;
    }
    this.slot = { value: created };
    return created;
  }

  /**
   * Empty the cell and hand back what it held, if anything
   */
  take(): T | undefined {
    const slot = this.slot;
    this.slot = null;
    return slot?.value;
  }
}
