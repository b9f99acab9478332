// packages/script/src/call_flags.ts

/** Permissions granted to a called contract. */
export const CallFlags = {
  None: 0x00,
  ReadStates: 0x01,
  WriteStates: 0x02,
  AllowCall: 0x04,
  AllowNotify: 0x08,
  States: 0x03,
  ReadOnly: 0x05,
  All: 0x0f,
} as const;

export type CallFlags = (typeof CallFlags)[keyof typeof CallFlags];
