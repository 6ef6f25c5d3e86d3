export { canonicalize, sha256, computeCanonicalFingerprint, compareStrings } from './checksum';
