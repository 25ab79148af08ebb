/**
 * Case-insensitive name lookups. Workflow authors may spell input, global,
 * stage and output names in any case; the last spelling written is kept
 * for iteration.
 */

export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Exact key first, then the first key that differs only in case
 */
export function lookupIgnoreCase<T>(record: Readonly<Record<string, T>> | undefined, key: string): T | undefined {
  if (!record) {
    return undefined;
  }
  if (Object.hasOwn(record, key)) {
    return record[key];
  }
  const match = Object.entries(record).find(([name]) => equalsIgnoreCase(name, key));
  return match?.[1];
}

export function hasIgnoreCase(record: Readonly<Record<string, unknown>>, key: string): boolean {
  return Object.hasOwn(record, key) || Object.keys(record).some((name) => equalsIgnoreCase(name, key));
}

export class CaseInsensitiveMap<V> extends Map<string, V> {
  private readonly spellings = new Map<string, string>();

  constructor(entries?: Iterable<readonly [string, V]>) {
    super();
    for (const [key, value] of entries ?? []) {
      this.set(key, value);
    }
  }

  get(key: string): V | undefined {
    const stored = this.spellings.get(key.toLowerCase());
    return stored === undefined ? undefined : super.get(stored);
  }

  has(key: string): boolean {
    return this.spellings.has(key.toLowerCase());
  }

  set(key: string, value: V): this {
    const normalized = key.toLowerCase();
    const previous = this.spellings.get(normalized);
    if (previous !== undefined && previous !== key) {
      super.delete(previous);
    }
    this.spellings.set(normalized, key);
    return super.set(key, value);
  }

  delete(key: string): boolean {
    const normalized = key.toLowerCase();
    const stored = this.spellings.get(normalized);
    if (stored === undefined) {
      return false;
    }
    this.spellings.delete(normalized);
    return super.delete(stored);
  }

  clear(): void {
    this.spellings.clear();
    super.clear();
  }
}
