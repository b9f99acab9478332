// packages/tx-builder/src/tests/fake_provider.ts
// In-process node stand-in: fixed chain state, records every call.
import type { ContractParameter } from '@n3tx/script';
import type { Hash160 } from '@n3tx/utils';

import type { InvocationResult, Provider, Signer } from '../index.js';

export type ProviderCall = { method: string; args: unknown[] };

export class FakeProvider implements Provider {
  calls: ProviderCall[] = [];

  magic = 860833102;
  blockCount = 1000;
  committee: string[] = [];
  invokeResult: InvocationResult = { state: 'HALT', gasConsumed: '984060', stack: [] };
  networkFee: bigint | string | number = '123456';
  balance = 10n ** 12n;
  sentHash = '0x' + '00'.repeat(32);
  failOn?: string;

  pricedHex?: string;
  sentHex?: string;

  private record(method: string, ...args: unknown[]): void {
    this.calls.push({ method, args });
    if (this.failOn === method) throw new Error(`${method} unavailable`);
  }

  called(method: string): ProviderCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  async getNetworkMagic(): Promise<number> {
    this.record('getNetworkMagic');
    return this.magic;
  }

  async getBlockCount(): Promise<number> {
    this.record('getBlockCount');
    return this.blockCount;
  }

  async getCommittee(): Promise<string[]> {
    this.record('getCommittee');
    return this.committee;
  }

  async invokeScript(scriptHex: string, signers: readonly Signer[]): Promise<InvocationResult> {
    this.record('invokeScript', scriptHex, signers);
    return this.invokeResult;
  }

  async invokeFunction(
    contractHash: Hash160,
    method: string,
    params: readonly ContractParameter[],
    signers: readonly Signer[]
  ): Promise<InvocationResult> {
    this.record('invokeFunction', contractHash, method, params, signers);
    return { state: 'HALT', gasConsumed: '0', stack: [{ type: 'Integer', value: this.balance }] };
  }

  async calculateNetworkFee(txHex: string): Promise<bigint | string | number> {
    this.record('calculateNetworkFee', txHex);
    this.pricedHex = txHex;
    return this.networkFee;
  }

  async sendRawTransaction(txHex: string): Promise<{ hash: string }> {
    this.record('sendRawTransaction', txHex);
    this.sentHex = txHex;
    return { hash: this.sentHash };
  }
}
