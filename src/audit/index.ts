export { canonicalJson, compareStrings, toSortedValue } from "./canonical.js";

export {
  sha256,
  sha256Bytes,
  SHA256_HEX_LENGTH,
  SHA256_HEX_RE,
} from "./hashing.js";
