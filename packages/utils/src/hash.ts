// packages/utils/src/hash.ts
import { ripemd160 } from '@noble/hashes/legacy.js';
import { sha256 } from '@noble/hashes/sha2.js';

export { ripemd160, sha256 };

/** Contract and account identifiers: RIPEMD160 over SHA256. */
export const hash160 = (data: Uint8Array): Uint8Array => ripemd160(sha256(data));

// Double SHA256, as used for encrypted-key address hashes.
export const hash256 = (data: Uint8Array): Uint8Array => sha256(sha256(data));
