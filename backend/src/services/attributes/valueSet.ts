/**
 * Case-insensitive value set
 * Values compare on their trimmed, upper-cased form; the first spelling seen is kept
 */

/**
 * Trim a raw value; empty strings are absent
 */
export function normalizeValue(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export function valueKey(value: string): string {
  return value.trim().toUpperCase();
}

export class ValueSet implements Iterable<string> {
  private readonly entries = new Map<string, string>();

  constructor(values: Iterable<string | null | undefined> = []) {
    for (const value of values) {
      this.add(value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  add(value: string | null | undefined): this {
    const normalized = normalizeValue(value);
    if (normalized !== null) {
      const key = valueKey(normalized);
      if (!this.entries.has(key)) {
        this.entries.set(key, normalized);
      }
    }
    return this;
  }

  has(value: string | null | undefined): boolean {
    const normalized = normalizeValue(value);
    return normalized !== null && this.entries.has(valueKey(normalized));
  }

  values(): string[] {
    return [...this.entries.values()];
  }

  /**
   * The single value of a one-element set, null otherwise
   */
  single(): string | null {
    if (this.entries.size !== 1) {
      return null;
    }
    return this.values()[0] ?? null;
  }

  isSubsetOf(other: ValueSet): boolean {
    for (const value of this.entries.values()) {
      if (!other.has(value)) {
        return false;
      }
    }
    return true;
  }

  difference(other: ValueSet): ValueSet {
    return new ValueSet(this.values().filter((value) => !other.has(value)));
  }

  [Symbol.iterator](): Iterator<string> {
    return this.entries.values();
  }
}
