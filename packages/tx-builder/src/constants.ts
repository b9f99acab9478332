// packages/tx-builder/src/constants.ts

/** Cap on allowed contracts, allowed groups and rules per signer, and on And/Or children. */
export const MAX_SIGNER_SUBITEMS = 16;

/** Signers and attributes share one budget. */
export const MAX_TRANSACTION_ATTRIBUTES = 16;

export const MAX_TRANSACTION_SIZE = 102400;

export const MAX_VALID_UNTIL_BLOCK_INCREMENT = 5760;

export const MAX_WITNESS_CONDITION_NESTING = 2;

export const MAX_TRANSACTION_SCRIPT_SIZE = 0xffff;

export const MAX_ORACLE_RESULT_SIZE = 0xffff;

export const TRANSACTION_VERSION = 0;

/** Native GAS token contract. */
export const GAS_TOKEN_HASH = 'd2a4cff31913016155e38e474a2c06d08be276cf';
