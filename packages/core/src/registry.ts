/**
 * Generic registry for named values (alphabets, output modes).
 */

export class Registry<T> {
  private readonly _map = new Map<string, () => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: () => T): this {
    this._map.set(name.toUpperCase(), factory);
    return this;
  }

  /** Case-insensitive lookup; throws listing the known names. */
  get(name: string): T {
    const factory = this._map.get(name.toUpperCase());
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      throw new Error(
        `[${this.subsystem}] Unknown name "${name}". Available: ${avail}`
      );
    }
    return factory();
  }

  find(name: string): T | undefined {
    return this._map.get(name.toUpperCase())?.();
  }

  has(name: string): boolean {
    return this._map.has(name.toUpperCase());
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
