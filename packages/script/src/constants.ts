// packages/script/src/constants.ts

/** Upper bound on public keys in a multi-signature verification script. */
export const MAX_PUBLIC_KEYS_PER_MULTISIG = 1024;

/** Widest integer a PUSHINT instruction carries (PUSHINT256). */
export const MAX_PUSHINT_BYTES = 32;

export const PUBLIC_KEY_SIZE = 33;
export const SIGNATURE_SIZE = 64;

/** Limits applied when decoding contract parameters. */
export const MAX_PARAM_ITEMS = 1024;
export const MAX_PARAM_NESTING = 16;

/** Length of a single-signature verification script: PUSHDATA1 33 <key> SYSCALL <tag>. */
export const SINGLE_SIG_SCRIPT_SIZE = 40;

/** Decode limits for witness scripts. */
export const MAX_INVOCATION_SCRIPT_SIZE = 1024;
export const MAX_VERIFICATION_SCRIPT_SIZE = 1024;
