/**
 * Equality, hashing and ordering typeclasses.
 *
 * The structural instances are what distinct, except, groupBy and countBy
 * use when the caller does not pass their own: primitives compare by value,
 * arrays and tuples element-wise, Dates by time and plain objects key by key.
 * Any other object (class instances, Maps, functions) compares by identity.
 */

// ============================================================================
// Eq
// ============================================================================

/**
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
}

/**
 * Values that are equal must hash to the same number.
 */
export interface Hash<A> {
  hash(a: A): number;
}

export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b || (Number.isNaN(a) && Number.isNaN(b)),
};

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
};

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(equals: (a: A, b: A) => boolean): Eq<A> {
  return { equals };
}

/**
 * Create an Eq instance by mapping to a comparable value.
 */
export function eqBy<A, B>(f: (a: A) => B, E: Eq<B> = eqStructural<B>()): Eq<A> {
  return { equals: (a, b) => E.equals(f(a), f(b)) };
}

/**
 * Eq using strict equality (===).
 */
export function eqStrict<A>(): Eq<A> {
  return { equals: (a, b) => a === b };
}

// ============================================================================
// Hash
// ============================================================================

// Simple hash functions (not cryptographic, just for hash tables)

export const hashString: Hash<string> = {
  hash: (a) => {
    // djb2 hash
    let hash = 5381;
    for (let i = 0; i < a.length; i++) {
      hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
    }
    return hash >>> 0;
  },
};

export const hashNumber: Hash<number> = {
  hash: (a) => {
    if (Number.isNaN(a)) return 0x7fc00000;
    if (!Number.isFinite(a)) return a > 0 ? 0x7f800000 : 0xff800000;
    // 0 and -0 both land here
    if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) {
      return a | 0;
    }
    return hashString.hash(String(a));
  },
};

function combine(seed: number, value: number): number {
  return (((seed << 5) + seed) ^ value) >>> 0;
}

const identityIds = new WeakMap<object, number>();
let nextIdentityId = 1;

function identityHash(value: object): number {
  let id = identityIds.get(value);
  if (id === undefined) {
    id = nextIdentityId++;
    identityIds.set(value, id);
  }
  return id;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ============================================================================
// Structural instances
// ============================================================================

export function structuralEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") return Number.isNaN(a) && Number.isNaN(b);
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!structuralEquals(a[i], b[i])) return false;
    }
    return true;
  }

  if (a instanceof Date) {
    return b instanceof Date && a.getTime() === b.getTime();
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    for (const key of keys) {
      if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
      if (!structuralEquals(a[key], b[key])) return false;
    }
    return true;
  }

  return false;
}

export function structuralHash(value: unknown): number {
  switch (typeof value) {
    case "number":
      return hashNumber.hash(value);
    case "string":
      return hashString.hash(value);
    case "boolean":
      return value ? 1 : 0;
    case "bigint":
      return hashString.hash(value.toString());
    case "undefined":
      return 1;
    case "symbol":
      return hashString.hash(value.toString());
    case "function":
      return identityHash(value);
  }

  if (value === null) return 0;

  if (Array.isArray(value)) {
    let hash = value.length;
    for (const x of value) {
      hash = combine(hash, structuralHash(x));
    }
    return hash;
  }

  if (value instanceof Date) {
    return hashNumber.hash(value.getTime());
  }

  if (isPlainObject(value)) {
    // Key order must not matter, so fold the per-key hashes with xor
    let hash = 0x345678;
    for (const key of Object.keys(value)) {
      hash ^= combine(hashString.hash(key), structuralHash(value[key]));
    }
    return hash >>> 0;
  }

  return identityHash(value);
}

export function eqStructural<A>(): Eq<A> {
  return { equals: structuralEquals };
}

export function hashStructural<A>(): Hash<A> {
  return { hash: structuralHash };
}

// ============================================================================
// Ord
// ============================================================================

/**
 * Create an Ord instance from a compare function. Any negative or positive
 * result is normalized to an Ordering.
 */
export function makeOrd<A>(compare: (a: A, b: A) => number): Ord<A> {
  const cmp = (a: A, b: A): Ordering => {
    const c = compare(a, b);
    return c < 0 ? LT : c > 0 ? GT : EQ_ORD;
  };
  return {
    equals: (a, b) => cmp(a, b) === EQ_ORD,
    compare: cmp,
  };
}

/**
 * Create an Ord instance by mapping to a comparable value.
 */
export function ordBy<A, B>(f: (a: A) => B, O: Ord<B> = ordNatural<B>()): Ord<A> {
  return {
    equals: (a, b) => O.equals(f(a), f(b)),
    compare: (a, b) => O.compare(f(a), f(b)),
  };
}

/**
 * Reverse an Ord instance.
 */
export function reverseOrd<A>(O: Ord<A>): Ord<A> {
  return {
    equals: O.equals,
    compare: (a, b) => O.compare(b, a),
  };
}

function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "Date";
  return typeof value;
}

function compareNumbers(a: number, b: number): Ordering {
  if (a < b) return LT;
  if (a > b) return GT;
  if (a === b) return EQ_ORD;
  // NaN sorts before every other number
  if (Number.isNaN(a)) return Number.isNaN(b) ? EQ_ORD : LT;
  return GT;
}

/**
 * Compares two values of the same comparable kind. Throws a `TypeError` for
 * values of different kinds, or of a kind with no natural order (plain
 * objects, Maps, functions, symbols), unless they are the same value.
 */
export function naturalCompare(a: unknown, b: unknown): Ordering {
  if (a === b) return EQ_ORD;
  if (Array.isArray(a) && Array.isArray(b)) {
    const len = Math.min(a.length, b.length);
    for (let i = 0; i < len; i++) {
      const c = naturalCompare(a[i], b[i]);
      if (c !== EQ_ORD) return c;
    }
    return a.length < b.length ? LT : a.length > b.length ? GT : EQ_ORD;
  }
  if (a instanceof Date && b instanceof Date) {
    return compareNumbers(a.getTime(), b.getTime());
  }
  if (typeof a === "number" && typeof b === "number") {
    return compareNumbers(a, b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? LT : a > b ? GT : EQ_ORD;
  }
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? LT : a > b ? GT : EQ_ORD;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a ? GT : LT;
  }
  throw new TypeError(`Cannot compare ${kindOf(a)} with ${kindOf(b)}`);
}

/**
 * `<` / `>` on numbers, strings, bigints and booleans, time order on Dates,
 * lexicographic on arrays. NaN sorts first. Any other pairing throws.
 */
export function ordNatural<A>(): Ord<A> {
  return {
    equals: (a, b) => naturalCompare(a, b) === EQ_ORD,
    compare: naturalCompare,
  };
}

export const ordNumber: Ord<number> = ordNatural<number>();
export const ordString: Ord<string> = ordNatural<string>();
