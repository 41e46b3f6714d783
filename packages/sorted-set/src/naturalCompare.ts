enum KindRank {
  Undefined,
  Null,
  Boolean,
  Numeric,
  String,
  Symbol,
  Reference,
}

const objectOrdinals = new WeakMap<object, number>();
// Registered symbols cannot be held weakly
const symbolOrdinals = new Map<symbol, number>();
let nextOrdinal = 0;

function kindRank(value: unknown): KindRank {
  switch (typeof value) {
    case "undefined":
      return KindRank.Undefined;
    case "boolean":
      return KindRank.Boolean;
    case "number":
    case "bigint":
      return KindRank.Numeric;
    case "string":
      return KindRank.String;
    case "symbol":
      return KindRank.Symbol;
    case "object":
      return value === null ? KindRank.Null : KindRank.Reference;
    case "function":
    default:
      return KindRank.Reference;
  }
}

/**
 * Ordinal assigned to a reference the first time it is compared, stable for its lifetime
 */
function identityOrdinal(value: object): number {
  let ordinal = objectOrdinals.get(value);
  if (ordinal === undefined) {
    ordinal = nextOrdinal++;
    objectOrdinals.set(value, ordinal);
  }
  return ordinal;
}

function symbolOrdinal(value: symbol): number {
  let ordinal = symbolOrdinals.get(value);
  if (ordinal === undefined) {
    ordinal = nextOrdinal++;
    symbolOrdinals.set(value, ordinal);
  }
  return ordinal;
}

function compareNumeric(a: number | bigint, b: number | bigint): number {
  const aNaN = typeof a === "number" && Number.isNaN(a);
  const bNaN = typeof b === "number" && Number.isNaN(b);
  if (aNaN || bNaN) return aNaN === bNaN ? 0 : aNaN ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Default ordering when no comparator is given.
 *
 * Values of different kinds are ordered `undefined < null < boolean < number|bigint < string < symbol < object`.
 * Primitives compare by value, objects, functions and symbols by identity. Two distinct objects never compare
 * equal, mirroring a comparison of references.
 */
export function naturalCompare(a: unknown, b: unknown): number {
  if (a === b) return 0;

  const rankA = kindRank(a);
  const rankB = kindRank(b);
  if (rankA !== rankB) return rankA - rankB;

  if ((typeof a === "number" || typeof a === "bigint") && (typeof b === "number" || typeof b === "bigint")) {
    return compareNumeric(a, b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  if (typeof a === "symbol" && typeof b === "symbol") {
    return symbolOrdinal(a) - symbolOrdinal(b);
  }
  if ((typeof a === "object" || typeof a === "function") && a !== null) {
    if ((typeof b === "object" || typeof b === "function") && b !== null) {
      return identityOrdinal(a) - identityOrdinal(b);
    }
  }

  // undefined and null only equal themselves, handled above
  return 0;
}
