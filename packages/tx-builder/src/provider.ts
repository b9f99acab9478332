// packages/tx-builder/src/provider.ts
import type { ContractParameter, StackItem } from '@n3tx/script';
import { FormatError, ProviderError } from '@n3tx/utils';
import type { Hash160 } from '@n3tx/utils';

import type { Signer } from './signer.js';

export type InvocationResult = {
  state: 'HALT' | 'FAULT';
  /** Decimal string in fractions of GAS. */
  gasConsumed: string;
  exception?: string | null;
  stack: StackItem[];
};

/** Node RPC surface the transaction builder depends on. */
export interface Provider {
  getNetworkMagic(): Promise<number>;
  getBlockCount(): Promise<number>;
  /** Hex-encoded compressed public keys of the current committee. */
  getCommittee(): Promise<string[]>;
  invokeScript(scriptHex: string, signers: readonly Signer[]): Promise<InvocationResult>;
  invokeFunction(
    contractHash: Hash160,
    method: string,
    params: readonly ContractParameter[],
    signers: readonly Signer[]
  ): Promise<InvocationResult>;
  calculateNetworkFee(txHex: string): Promise<bigint | string | number>;
  sendRawTransaction(txHex: string): Promise<{ hash: string }>;
}

/** Runs a provider call, wrapping any rejection in ProviderError with the original as cause. */
export async function callProvider<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof ProviderError) throw err;
    throw new ProviderError(operation, err);
  }
}

/** Parse a fee or gas amount reported by a node. */
export function parseGasAmount(v: bigint | string | number, label: string): bigint {
  if (typeof v === 'bigint') return v;
  if (typeof v === 'number') {
    if (!Number.isSafeInteger(v)) throw new FormatError(`${label}: ${v} is not an integer amount`);
    return BigInt(v);
  }
  if (!/^-?\d+$/.test(v.trim())) throw new FormatError(`${label}: '${v}' is not an integer amount`);
  return BigInt(v.trim());
}
