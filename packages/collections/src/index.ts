// Typeclasses
export type { Eq, Hash, Ord, Ordering } from "./typeclasses.js";
export {
  LT,
  EQ_ORD,
  GT,
  eqNumber,
  eqString,
  eqStrict,
  eqBy,
  makeEq,
  hashNumber,
  hashString,
  structuralEquals,
  structuralHash,
  eqStructural,
  hashStructural,
  makeOrd,
  ordBy,
  reverseOrd,
  naturalCompare,
  ordNatural,
  ordNumber,
  ordString,
} from "./typeclasses.js";

// Data structures
export { HashSet } from "./hash-set.js";
export { HashMap } from "./hash-map.js";
