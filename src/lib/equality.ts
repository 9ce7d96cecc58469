// =============================================================================
// Dialog State — Value Equality & Hashing
// =============================================================================
// Structural equality over action payloads, plus a hasher whose output is
// consistent with it: isEqual(a, b) implies hashValue(a) === hashValue(b).
//
// Values that implement Equatable / Hashable take over their own comparison,
// from either side of isEqual (the left operand is asked first).
// Everything else:
//   - primitives        → Object.is
//   - arrays            → element-wise, ordered
//   - plain objects     → key-by-key, key order ignored
//   - Date              → by timestamp
//   - any other object  → by identity
// =============================================================================

// ---------------------------------------------------------------------------
// Protocols
// ---------------------------------------------------------------------------

export interface Equatable<T = unknown> {
  equals(other: T): boolean;
}

export interface Hashable {
  hash(hasher: Hasher): void;
}

// ---------------------------------------------------------------------------
// Hasher (32-bit FNV-1a)
// ---------------------------------------------------------------------------

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export class Hasher {
  private state = FNV_OFFSET_BASIS;

  /** Mixes any value in, following the same rules as isEqual. */
  combine(value: unknown): this {
    hashInto(this, value);
    return this;
  }

  /** Length-prefixed so that ("ab", "c") and ("a", "bc") differ. */
  combineString(value: string): this {
    this.writeRaw(`${value.length}:`);
    this.writeRaw(value);
    return this;
  }

  finalize(): number {
    return this.state >>> 0;
  }

  private writeRaw(value: string): void {
    for (let i = 0; i < value.length; i++) {
      this.state ^= value.charCodeAt(i);
      this.state = Math.imul(this.state, FNV_PRIME);
    }
  }
}

export function hashValue(value: unknown): number {
  return new Hasher().combine(value).finalize();
}

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}

export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'hash' in value &&
    typeof value.hash === 'function'
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function entriesOf(value: object): Map<string, unknown> {
  const entries: [string, unknown][] = Object.entries(value);
  return new Map(entries);
}

// ---------------------------------------------------------------------------
// Equality
// ---------------------------------------------------------------------------

export function isEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (isEquatable(a)) return a.equals(b);
  if (isEquatable(b)) return b.equals(a);

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => isEqual(item, b[i]));
  }

  if (a instanceof Date) {
    return b instanceof Date && Object.is(a.getTime(), b.getTime());
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const left = entriesOf(a);
    const right = entriesOf(b);
    if (left.size !== right.size) return false;
    for (const [key, value] of left) {
      if (!right.has(key)) return false;
      if (!isEqual(value, right.get(key))) return false;
    }
    return true;
  }

  return false;
}

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

function hashInto(hasher: Hasher, value: unknown): void {
  if (value === null) {
    hasher.combineString('null');
    return;
  }

  switch (typeof value) {
    case 'undefined':
      hasher.combineString('undefined');
      return;
    case 'string':
      hasher.combineString('s').combineString(value);
      return;
    case 'number':
    case 'boolean':
    case 'bigint':
      hasher.combineString(typeof value).combineString(String(value));
      return;
    case 'symbol':
      hasher.combineString('symbol').combineString(value.description ?? '');
      return;
    case 'function':
      hasher.combineString('function');
      return;
  }
  if (typeof value !== 'object') return;

  if (isHashable(value)) {
    value.hash(hasher);
    return;
  }

  if (Array.isArray(value)) {
    hasher.combineString('array').combineString(String(value.length));
    for (const item of value) hashInto(hasher, item);
    return;
  }

  if (value instanceof Date) {
    hasher.combineString('date').combineString(String(value.getTime()));
    return;
  }

  if (isPlainObject(value)) {
    const entries = [...entriesOf(value)].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    hasher.combineString('object').combineString(String(entries.length));
    for (const [key, item] of entries) {
      hasher.combineString(key);
      hashInto(hasher, item);
    }
    return;
  }

  // Identity-compared: only the kind of object goes in.
  hasher.combineString('instance').combineString(value.constructor?.name ?? '');
}
