// packages/crypto/src/constants.ts

/** Leading byte of a base58check account address. */
export const ADDRESS_VERSION = 0x35;

export const PRIVATE_KEY_SIZE = 32;

export const WIF_VERSION = 0x80;
export const WIF_COMPRESSED_FLAG = 0x01;

/** Encrypted key layout: prefix(2) | flag(1) | address hash(4) | ciphertext(32). */
export const NEP2_PREFIX_1 = 0x01;
export const NEP2_PREFIX_2 = 0x42;
export const NEP2_FLAG = 0xe0;
export const NEP2_ENCRYPTED_SIZE = 39;
