// packages/tx-builder/src/transaction_builder.ts
import { randomBytes } from '@noble/hashes/utils.js';
import { publicKeyToScriptHash } from '@n3tx/crypto';
import {
  ContractParam,
  InvocationScript,
  SIGNATURE_SIZE,
  stackItemToInteger,
  VerificationScript,
} from '@n3tx/script';
import {
  bytesToHex,
  concat,
  ConfigurationError,
  Hash160,
  hexToBytes,
  makeLogger,
  ProviderError,
  SigningError,
} from '@n3tx/utils';
import type { Logger } from '@n3tx/utils';

import { resolveTxConfig } from './config.js';
import type { TxConfig, TxConfigInput } from './config.js';
import { GAS_TOKEN_HASH, MAX_TRANSACTION_ATTRIBUTES, TRANSACTION_VERSION } from './constants.js';
import { callProvider, parseGasAmount } from './provider.js';
import type { InvocationResult, Provider } from './provider.js';
import { AccountSigner, assertUniqueSigners, ContractSigner } from './signer.js';
import type { Signer } from './signer.js';
import { SignedTransaction, Transaction, validateSignersAndAttributes } from './transaction.js';
import type { TransactionAttribute } from './transaction_attribute.js';
import { Witness } from './witness.js';

/** Called with the total fee and the sender's GAS balance when the balance falls short. */
export type FeeConsumer = (requiredFee: bigint, balance: bigint) => void;

function randomNonce(): number {
  const b = randomBytes(4);
  return new DataView(b.buffer, b.byteOffset, 4).getUint32(0, true);
}

function toFee(label: string, v: bigint | number): bigint {
  const fee = typeof v === 'bigint' ? v : BigInt(v);
  if (fee < 0n) throw new ConfigurationError(`${label}: fee must not be negative`);
  return fee;
}

/**
 * Multi-sig account of the committee: threshold n - floor((n - 1) / 2).
 */
function committeeAccountHash(keys: readonly Uint8Array[]): Hash160 {
  const n = keys.length;
  return VerificationScript.fromMultiSig(keys, n - Math.floor((n - 1) / 2)).scriptHash;
}

/**
 * Stand-in witness with the final script shapes, so the node can price
 * verification before real signatures exist.
 */
function placeholderWitness(signer: Signer): Witness {
  if (signer instanceof ContractSigner) return Witness.createContractWitness(signer.verifyParams);
  if (!(signer instanceof AccountSigner)) {
    throw new ConfigurationError(`network fee: signer ${signer.signerHash.toJSON()} has no known witness shape`);
  }
  const vs = signer.account.verificationScript;
  if (!vs) {
    throw new ConfigurationError(`network fee: account ${signer.signerHash.toJSON()} has no verification script`);
  }
  const fake = new Uint8Array(SIGNATURE_SIZE);
  const sigs = Array.from({ length: vs.getSigningThreshold() }, () => fake);
  return new Witness(InvocationScript.fromSignatures(sigs), vs);
}

/**
 * Collects script, signers and attributes, asks the provider for fees and
 * chain state, and produces unsigned or signed transactions.
 * A builder is meant for one flow at a time.
 */
export class TransactionBuilder {
  private readonly provider: Provider;
  private readonly config: TxConfig;
  private readonly log: Logger;

  private txVersion = TRANSACTION_VERSION;
  private txNonce = randomNonce();
  private txValidUntilBlock?: number;
  private txScript: Uint8Array = new Uint8Array();
  private txSigners: Signer[] = [];
  private txAttributes: TransactionAttribute[] = [];
  private extraNetworkFee = 0n;
  private extraSystemFee = 0n;
  private feeConsumer?: FeeConsumer;

  constructor(provider: Provider, config: TxConfigInput = {}) {
    this.provider = provider;
    this.config = resolveTxConfig(config);
    this.log = makeLogger('tx-builder', this.config.logLevel);
  }

  version(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0xff) throw new ConfigurationError(`version: invalid value ${v}`);
    this.txVersion = v;
    return this;
  }

  nonce(n: number): this {
    if (!Number.isInteger(n) || n < 0 || n > 0xffff_ffff) throw new ConfigurationError(`nonce: ${n} is not a u32`);
    this.txNonce = n;
    return this;
  }

  validUntilBlock(height: number): this {
    if (!Number.isInteger(height) || height <= 0 || height > 0xffff_ffff) {
      throw new ConfigurationError(`validUntilBlock: ${height} must be within 1..0xffffffff`);
    }
    this.txValidUntilBlock = height;
    return this;
  }

  script(script: Uint8Array | string): this {
    this.txScript = Uint8Array.from(hexToBytes(script));
    return this;
  }

  extendScript(script: Uint8Array | string): this {
    this.txScript = concat(this.txScript, hexToBytes(script));
    return this;
  }

  /** Replaces the signer list; the first signer is the sender. */
  signers(...signers: Signer[]): this {
    assertUniqueSigners(signers);
    if (signers.length + this.txAttributes.length > MAX_TRANSACTION_ATTRIBUTES) {
      throw new ConfigurationError(
        `signers: ${signers.length} signers and ${this.txAttributes.length} attributes exceed ${MAX_TRANSACTION_ATTRIBUTES}`
      );
    }
    this.txSigners = [...signers];
    return this;
  }

  /** Moves the signer with `hash` to the front, making it the fee payer. */
  firstSigner(hash: Hash160): this {
    const idx = this.txSigners.findIndex((s) => s.signerHash.equals(hash));
    if (idx < 0) throw new ConfigurationError(`firstSigner: ${hash.toJSON()} is not a signer of this transaction`);
    const [signer] = this.txSigners.splice(idx, 1);
    this.txSigners.unshift(signer);
    return this;
  }

  attributes(...attributes: TransactionAttribute[]): this {
    const next = [...this.txAttributes, ...attributes];
    if (this.txSigners.length + next.length > MAX_TRANSACTION_ATTRIBUTES) {
      throw new ConfigurationError(
        `attributes: ${this.txSigners.length} signers and ${next.length} attributes exceed ${MAX_TRANSACTION_ATTRIBUTES}`
      );
    }
    this.txAttributes = next;
    return this;
  }

  additionalNetworkFee(fee: bigint | number): this {
    this.extraNetworkFee = toFee('additionalNetworkFee', fee);
    return this;
  }

  additionalSystemFee(fee: bigint | number): this {
    this.extraSystemFee = toFee('additionalSystemFee', fee);
    return this;
  }

  /** Advisory hook; the transaction is still produced after it runs. */
  doIfSenderCannotCoverFees(consumer: FeeConsumer): this {
    this.feeConsumer = consumer;
    return this;
  }

  /** Test-invoke the current script with the current signers. */
  async callInvokeScript(): Promise<InvocationResult> {
    if (this.txScript.length === 0) throw new ConfigurationError('callInvokeScript: no script set');
    const script = bytesToHex(this.txScript);
    const signers = this.txSigners;
    return callProvider('invokeScript', () => this.provider.invokeScript(script, signers));
  }

  private async checkHighPriority(): Promise<void> {
    if (!this.txAttributes.some((a) => a.type === 'HighPriority')) return;

    const committee = await callProvider('getCommittee', () => this.provider.getCommittee());
    const keys = committee.map((k) => hexToBytes(k));
    const allowed = keys.map(publicKeyToScriptHash);
    if (keys.length > 0) allowed.push(committeeAccountHash(keys));

    const ok = this.txSigners.some((s) => allowed.some((h) => h.equals(s.signerHash)));
    if (!ok) throw new ConfigurationError('HighPriority attribute requires a committee member or the committee account as signer');
  }

  private async resolveValidUntilBlock(): Promise<number> {
    if (this.txValidUntilBlock !== undefined) return this.txValidUntilBlock;
    const count = await callProvider('getBlockCount', () => this.provider.getBlockCount());
    return count + this.config.maxValidUntilBlockIncrement - 1;
  }

  private async computeSystemFee(): Promise<bigint> {
    const res = await this.callInvokeScript();
    if (res.state === 'FAULT') {
      throw new ProviderError('invokeScript', new Error(`script execution faulted: ${res.exception ?? 'unknown'}`));
    }
    return parseGasAmount(res.gasConsumed, 'gasConsumed') + this.extraSystemFee;
  }

  private async computeNetworkFee(tx: Transaction): Promise<bigint> {
    const priced = tx.withWitnesses(tx.signers.map(placeholderWitness));
    const raw = await callProvider('calculateNetworkFee', () => this.provider.calculateNetworkFee(priced.toHex()));
    return parseGasAmount(raw, 'calculateNetworkFee') + this.extraNetworkFee;
  }

  private async checkSenderBalance(sender: Hash160, total: bigint): Promise<void> {
    const consumer = this.feeConsumer;
    if (!consumer) return;

    const gas = Hash160.fromHex(GAS_TOKEN_HASH);
    const res = await callProvider('invokeFunction', () =>
      this.provider.invokeFunction(gas, 'balanceOf', [ContractParam.hash160(sender)], [])
    );
    const top = res.stack[0];
    if (res.state === 'FAULT' || !top) {
      throw new ProviderError('invokeFunction', new Error(`balanceOf failed: ${res.exception ?? 'empty stack'}`));
    }
    const balance = stackItemToInteger(top);
    if (balance < total) {
      this.log.warn({ sender: sender.toJSON(), required: total.toString(), balance: balance.toString() }, 'sender cannot cover fees');
      consumer(total, balance);
    }
  }

  /**
   * Validates the builder, then fetches what it needs from the provider:
   * valid-until height (when unset), system fee from a test invocation and
   * network fee priced over placeholder witnesses.
   */
  async getUnsignedTransaction(): Promise<Transaction> {
    if (this.txSigners.length === 0) throw new ConfigurationError('getUnsignedTransaction: no signers set');
    if (this.txScript.length === 0) throw new ConfigurationError('getUnsignedTransaction: no script set');
    validateSignersAndAttributes(this.txSigners, this.txAttributes);
    await this.checkHighPriority();

    const validUntilBlock = await this.resolveValidUntilBlock();
    const systemFee = await this.computeSystemFee();

    const draft = new Transaction(
      {
        version: this.txVersion,
        nonce: this.txNonce,
        systemFee,
        networkFee: 0n,
        validUntilBlock,
        signers: this.txSigners,
        attributes: this.txAttributes,
        script: this.txScript,
      },
      this.provider
    );
    const networkFee = await this.computeNetworkFee(draft);
    const tx = new Transaction({ ...draft.fields, networkFee }, this.provider);

    await this.checkSenderBalance(tx.sender.signerHash, systemFee + networkFee);

    this.log.debug(
      {
        size: tx.size,
        signers: tx.signers.length,
        systemFee: systemFee.toString(),
        networkFee: networkFee.toString(),
        validUntilBlock,
      },
      'unsigned transaction built'
    );
    return tx;
  }

  private async networkMagic(): Promise<number> {
    if (this.config.networkMagic !== undefined) return this.config.networkMagic;
    return callProvider('getNetworkMagic', () => this.provider.getNetworkMagic());
  }

  /**
   * Builds and signs. Single-sig accounts sign with their key; contract
   * signers get a witness from their verify parameters. Multi-sig accounts
   * must go through getUnsignedTransaction() and Transaction.withWitnesses().
   */
  async sign(): Promise<SignedTransaction> {
    const tx = await this.getUnsignedTransaction();
    const hashData = tx.getHashData(await this.networkMagic());

    const witnesses = tx.signers.map((signer) => {
      if (signer instanceof ContractSigner) return Witness.createContractWitness(signer.verifyParams);
      if (!(signer instanceof AccountSigner)) {
        throw new SigningError(`sign: signer ${signer.signerHash.toJSON()} has no account to sign with`);
      }
      const account = signer.account;
      if (account.isMultiSig) {
        throw new SigningError(
          `sign: ${account.address(this.config.addressVersion)} is multi-sig; collect signatures and use withWitnesses()`
        );
      }
      if (!account.keyPair) {
        throw new SigningError(`sign: account ${account.address(this.config.addressVersion)} has no private key`);
      }
      return Witness.create(hashData, account.keyPair);
    });

    const signed = tx.withWitnesses(witnesses);
    if (signed.size > this.config.maxTransactionSize) {
      throw new ConfigurationError(`sign: transaction size ${signed.size} exceeds ${this.config.maxTransactionSize}`);
    }
    this.log.debug({ hash: signed.hash.toJSON(), size: signed.size, witnesses: witnesses.length }, 'witnesses attached');
    return signed;
  }
}
