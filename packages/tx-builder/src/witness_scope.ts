// packages/tx-builder/src/witness_scope.ts
import { FormatError } from '@n3tx/utils';

export const WitnessScope = {
  None: 0x00,
  CalledByEntry: 0x01,
  CustomContracts: 0x10,
  CustomGroups: 0x20,
  WitnessRules: 0x40,
  Global: 0x80,
} as const;

export type WitnessScope = (typeof WitnessScope)[keyof typeof WitnessScope];

export type WitnessScopeName = keyof typeof WitnessScope;

const FLAGS: Array<[WitnessScopeName, WitnessScope]> = [
  ['CalledByEntry', WitnessScope.CalledByEntry],
  ['CustomContracts', WitnessScope.CustomContracts],
  ['CustomGroups', WitnessScope.CustomGroups],
  ['WitnessRules', WitnessScope.WitnessRules],
  ['Global', WitnessScope.Global],
];

const ALL_FLAGS = FLAGS.reduce((acc, [, f]) => acc | f, 0);

export function combineScopes(scopes: readonly WitnessScope[]): number {
  return scopes.reduce<number>((acc, s) => acc | s, 0);
}

/** Splits a scope byte into its flags; None for 0. Unknown bits or Global mixed with others fail. */
export function extractScopes(byte: number): WitnessScope[] {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff || (byte & ~ALL_FLAGS) !== 0) {
    throw new FormatError(`extractScopes: invalid scope byte 0x${byte.toString(16)}`);
  }
  if (byte === WitnessScope.None) return [WitnessScope.None];
  if ((byte & WitnessScope.Global) !== 0 && byte !== WitnessScope.Global) {
    throw new FormatError('extractScopes: Global cannot be combined with other scopes');
  }
  return FLAGS.filter(([, f]) => (byte & f) !== 0).map(([, f]) => f);
}

export function scopeName(scope: WitnessScope): WitnessScopeName {
  if (scope === WitnessScope.None) return 'None';
  const hit = FLAGS.find(([, f]) => f === scope);
  if (!hit) throw new FormatError(`scopeName: unknown scope ${scope}`);
  return hit[0];
}

/** RPC form: comma-separated names, e.g. "CalledByEntry,CustomContracts". */
export function scopesToString(byte: number): string {
  return extractScopes(byte).map(scopeName).join(',');
}
