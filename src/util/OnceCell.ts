// src/util/OnceCell.ts
/**
 * Initialize-once, read-many cell.
 * A second `set` throws; `get` before any `set` throws.
 */
export class OnceCell<T> {
  private state: { set: false } | { set: true; value: T } = { set: false };

  constructor(private readonly label: string) {}

  set(value: T): void {
    if (this.state.set) {
      throw new Error(`${this.label}_ALREADY_SET: value can only be set once`);
    }
    this.state = { set: true, value };
  }

  get(): T {
    if (!this.state.set) {
      throw new Error(`${this.label}_NOT_SET: value has not been set`);
    }
    return this.state.value;
  }

  tryGet(): T | undefined {
    return this.state.set ? this.state.value : undefined;
  }

  isSet(): boolean {
    return this.state.set;
  }
}
