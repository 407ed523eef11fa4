export {
  type Sym,
  type Flo,
  type Vec,
  type Datum,
  type PrefixHead,
  PREFIXES,
  sym,
  flo,
  vec,
  isSym,
  isFlo,
  isVec,
  isPrefixHead,
} from "./datum";
export { type Tok, tokenize } from "./tokenize";
export { type ReadResult, Reader, readForm, readAll, parseNumber } from "./read";
