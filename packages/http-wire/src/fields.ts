// Ordered HTTP header fields.
//
// Names compare case-insensitively; the original spelling and the order in
// which fields arrived are preserved for serialization.

/** A single header line. */
export interface Field {
  name: string;
  value: string;
}

/**
 * Ordered, case-insensitive collection of header fields.
 *
 * Repeated names are kept as separate entries, the way they appeared on the wire.
 */
export class Fields implements Iterable<Field> {
  private entries: Field[] = [];

  constructor(init?: Iterable<readonly [string, string]>) {
    if (init) {
      for (const [name, value] of init) {
        this.append(name, value);
      }
    }
  }

  /** Number of field lines (not distinct names). */
  get size(): number {
    return this.entries.length;
  }

  /** First value for `name`, or `null` if absent. */
  get(name: string): string | null {
    const key = name.toLowerCase();
    for (const entry of this.entries) {
      if (entry.name.toLowerCase() === key) return entry.value;
    }
    return null;
  }

  /** All values for `name`, in arrival order. */
  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.entries.filter((e) => e.name.toLowerCase() === key).map((e) => e.value);
  }

  has(name: string): boolean {
    return this.get(name) !== null;
  }

  /**
   * Replace every value of `name` with a single one.
   *
   * The field keeps the position of its first occurrence; a new name is appended.
   */
  set(name: string, value: string): void {
    const key = name.toLowerCase();
    const idx = this.entries.findIndex((e) => e.name.toLowerCase() === key);
    if (idx < 0) {
      this.entries.push({ name, value });
      return;
    }
    this.entries[idx] = { name: this.entries[idx].name, value };
    this.entries = this.entries.filter((e, i) => i <= idx || e.name.toLowerCase() !== key);
  }

  append(name: string, value: string): void {
    this.entries.push({ name, value });
  }

  /** Remove every occurrence of `name`. Returns whether anything was removed. */
  delete(name: string): boolean {
    const key = name.toLowerCase();
    const before = this.entries.length;
    this.entries = this.entries.filter((e) => e.name.toLowerCase() !== key);
    return this.entries.length !== before;
  }

  /**
   * Comma-separated list values across all occurrences of `name`,
   * trimmed and lower-cased (e.g. `Connection: Keep-Alive, Upgrade`).
   */
  tokens(name: string): string[] {
    const out: string[] = [];
    for (const value of this.getAll(name)) {
      for (const part of value.split(",")) {
        const token = part.trim().toLowerCase();
        if (token.length > 0) out.push(token);
      }
    }
    return out;
  }

  [Symbol.iterator](): Iterator<Field> {
    return this.entries.map((e) => ({ ...e }))[Symbol.iterator]();
  }
}
