// packages/tx-builder/src/signer.ts
import { serializableListSize, varIntSize } from '@n3tx/codec';
import type { BinaryReader, BinaryWriter, Serializable } from '@n3tx/codec';
import { PUBLIC_KEY_SIZE } from '@n3tx/script';
import type { ContractParameter } from '@n3tx/script';
import { bytesToHex, ConfigurationError, Hash160, hexToBytes } from '@n3tx/utils';

import type { Account } from './account.js';
import { MAX_SIGNER_SUBITEMS } from './constants.js';
import { validateWitnessCondition } from './witness_condition.js';
import { WitnessRule } from './witness_rule.js';
import type { WitnessRuleJson } from './witness_rule.js';
import { extractScopes, scopesToString, WitnessScope } from './witness_scope.js';

export type SignerJson = {
  account: string;
  scopes: string;
  allowedcontracts?: string[];
  allowedgroups?: string[];
  rules?: WitnessRuleJson[];
};

function fixedListSize(n: number, itemSize: number): number {
  return varIntSize(n) + n * itemSize;
}

/**
 * Who authorizes a transaction and how far that authorization reaches.
 *
 * Scopes are kept as a flag byte. The set* methods validate first and only
 * then mutate, so a rejected call leaves the signer unchanged.
 */
export abstract class Signer implements Serializable {
  readonly signerHash: Hash160;
  private scopeByte: number;
  private contracts: Hash160[] = [];
  private groups: Uint8Array[] = [];
  private witnessRules: WitnessRule[] = [];

  protected constructor(signerHash: Hash160, scope: number) {
    extractScopes(scope);
    this.signerHash = signerHash;
    this.scopeByte = scope;
  }

  get scope(): number {
    return this.scopeByte;
  }

  get scopes(): WitnessScope[] {
    return extractScopes(this.scopeByte);
  }

  get allowedContracts(): readonly Hash160[] {
    return this.contracts;
  }

  get allowedGroups(): readonly Uint8Array[] {
    return this.groups;
  }

  get rules(): readonly WitnessRule[] {
    return this.witnessRules;
  }

  hasScope(scope: WitnessScope): boolean {
    return scope === WitnessScope.None ? this.scopeByte === 0 : (this.scopeByte & scope) !== 0;
  }

  private checkExtend(label: string, current: number, added: number): void {
    if (this.scopeByte === WitnessScope.Global) {
      throw new ConfigurationError(`${label}: cannot be combined with the Global scope`);
    }
    if (current + added > MAX_SIGNER_SUBITEMS) {
      throw new ConfigurationError(`${label}: ${current + added} entries exceed the maximum of ${MAX_SIGNER_SUBITEMS}`);
    }
  }

  setAllowedContracts(...hashes: Hash160[]): this {
    if (hashes.length === 0) return this;
    this.checkExtend('setAllowedContracts', this.contracts.length, hashes.length);
    this.scopeByte |= WitnessScope.CustomContracts;
    this.contracts.push(...hashes);
    return this;
  }

  setAllowedGroups(...groups: Array<Uint8Array | string>): this {
    if (groups.length === 0) return this;
    const keys = groups.map((g) => Uint8Array.from(hexToBytes(g)));
    for (const key of keys) {
      if (key.length !== PUBLIC_KEY_SIZE || (key[0] !== 0x02 && key[0] !== 0x03)) {
        throw new ConfigurationError('setAllowedGroups: groups must be 33-byte compressed public keys');
      }
    }
    this.checkExtend('setAllowedGroups', this.groups.length, keys.length);
    this.scopeByte |= WitnessScope.CustomGroups;
    this.groups.push(...keys);
    return this;
  }

  setRules(...rules: WitnessRule[]): this {
    if (rules.length === 0) return this;
    this.checkExtend('setRules', this.witnessRules.length, rules.length);
    for (const rule of rules) validateWitnessCondition(rule.condition);
    this.scopeByte |= WitnessScope.WitnessRules;
    this.witnessRules.push(...rules);
    return this;
  }

  /** An independent copy of the same kind; later set* calls on either side do not reach the other. */
  abstract snapshot(): Signer;

  protected copyInto<T extends Signer>(target: T): T {
    const t: Signer = target;
    t.scopeByte = this.scopeByte;
    t.contracts = [...this.contracts];
    t.groups = this.groups.map((g) => Uint8Array.from(g));
    t.witnessRules = [...this.witnessRules];
    return target;
  }

  get size(): number {
    let total = Hash160.SIZE + 1;
    if (this.hasScope(WitnessScope.CustomContracts)) total += fixedListSize(this.contracts.length, Hash160.SIZE);
    if (this.hasScope(WitnessScope.CustomGroups)) total += fixedListSize(this.groups.length, PUBLIC_KEY_SIZE);
    if (this.hasScope(WitnessScope.WitnessRules)) total += serializableListSize(this.witnessRules);
    return total;
  }

  serialize(w: BinaryWriter): void {
    w.writeBytes(this.signerHash.toLittleEndian()).writeU8(this.scopeByte);
    if (this.hasScope(WitnessScope.CustomContracts)) {
      w.writeVarInt(this.contracts.length);
      for (const h of this.contracts) w.writeBytes(h.toLittleEndian());
    }
    if (this.hasScope(WitnessScope.CustomGroups)) {
      w.writeVarInt(this.groups.length);
      for (const g of this.groups) w.writeBytes(g);
    }
    if (this.hasScope(WitnessScope.WitnessRules)) w.writeSerializableList(this.witnessRules);
  }

  toJSON(): SignerJson {
    const out: SignerJson = { account: this.signerHash.toJSON(), scopes: scopesToString(this.scopeByte) };
    if (this.hasScope(WitnessScope.CustomContracts)) out.allowedcontracts = this.contracts.map((h) => h.toJSON());
    if (this.hasScope(WitnessScope.CustomGroups)) out.allowedgroups = this.groups.map(bytesToHex);
    if (this.hasScope(WitnessScope.WitnessRules)) out.rules = this.witnessRules.map((r) => r.toJSON());
    return out;
  }

  /** Wire decode; the result is a TransactionSigner since the signing side is not on the wire. */
  static decode(r: BinaryReader): TransactionSigner {
    const hash = new Hash160(r.readBytes(Hash160.SIZE));
    const signer = new TransactionSigner(hash, r.readU8());
    const scopeByte = signer.scope;
    if ((scopeByte & WitnessScope.CustomContracts) !== 0) {
      signer.setAllowedContracts(
        ...r.readSerializableList((rr) => new Hash160(rr.readBytes(Hash160.SIZE)), MAX_SIGNER_SUBITEMS)
      );
    }
    if ((scopeByte & WitnessScope.CustomGroups) !== 0) {
      signer.setAllowedGroups(...r.readSerializableList((rr) => rr.readEncodedEcPoint(), MAX_SIGNER_SUBITEMS));
    }
    if ((scopeByte & WitnessScope.WitnessRules) !== 0) {
      signer.setRules(...r.readSerializableList(WitnessRule.decode, MAX_SIGNER_SUBITEMS));
    }
    return signer;
  }
}

/** Signer backed by an account; the builder signs for it when the account holds a key. */
export class AccountSigner extends Signer {
  readonly account: Account;

  private constructor(account: Account, scope: WitnessScope) {
    super(account.scriptHash, scope);
    this.account = account;
  }

  snapshot(): AccountSigner {
    return this.copyInto(new AccountSigner(this.account, WitnessScope.None));
  }

  static none(account: Account): AccountSigner {
    return new AccountSigner(account, WitnessScope.None);
  }

  static calledByEntry(account: Account): AccountSigner {
    return new AccountSigner(account, WitnessScope.CalledByEntry);
  }

  static global(account: Account): AccountSigner {
    return new AccountSigner(account, WitnessScope.Global);
  }
}

/** Contract account whose `verify` method authorizes the transaction. */
export class ContractSigner extends Signer {
  readonly verifyParams: readonly ContractParameter[];

  private constructor(contractHash: Hash160, scope: WitnessScope, verifyParams: ContractParameter[]) {
    super(contractHash, scope);
    this.verifyParams = verifyParams;
  }

  snapshot(): ContractSigner {
    return this.copyInto(new ContractSigner(this.signerHash, WitnessScope.None, [...this.verifyParams]));
  }

  static calledByEntry(contractHash: Hash160, ...verifyParams: ContractParameter[]): ContractSigner {
    return new ContractSigner(contractHash, WitnessScope.CalledByEntry, verifyParams);
  }

  static global(contractHash: Hash160, ...verifyParams: ContractParameter[]): ContractSigner {
    return new ContractSigner(contractHash, WitnessScope.Global, verifyParams);
  }
}

/** Wire-only signer: a hash and scope byte with no signing capability attached. */
export class TransactionSigner extends Signer {
  constructor(signerHash: Hash160, scope: number) {
    super(signerHash, scope);
  }

  snapshot(): TransactionSigner {
    return this.copyInto(new TransactionSigner(this.signerHash, WitnessScope.None));
  }
}

export function assertUniqueSigners(signers: readonly Signer[]): void {
  const seen = new Set<string>();
  for (const s of signers) {
    const key = s.signerHash.toString();
    if (seen.has(key)) throw new ConfigurationError(`duplicate signer ${s.signerHash.toJSON()}`);
    seen.add(key);
  }
}
