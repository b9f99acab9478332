// packages/tx-builder/src/transaction.ts
// -----------------------------------------------------------------------------
// Transaction wire format
//
//   version(u8) | nonce(u32) | systemFee(i64) | networkFee(i64) |
//   validUntilBlock(u32) | signers | attributes | script(var-bytes)
//
// followed, in the signed form, by one witness per signer. The id is the
// SHA256 of the unsigned bytes; signatures cover SHA256(magic(u32 LE) | id).
// -----------------------------------------------------------------------------

import { BinaryReader, BinaryWriter, serializableListSize, varBytesSize, varIntSize } from '@n3tx/codec';
import type { Serializable } from '@n3tx/codec';
import { bytesToHex, concat, ConfigurationError, FormatError, Hash256 } from '@n3tx/utils';

import {
  MAX_SIGNER_SUBITEMS,
  MAX_TRANSACTION_ATTRIBUTES,
  MAX_TRANSACTION_SCRIPT_SIZE,
  MAX_TRANSACTION_SIZE,
  TRANSACTION_VERSION,
} from './constants.js';
import { callProvider } from './provider.js';
import type { Provider } from './provider.js';
import { assertUniqueSigners, Signer } from './signer.js';
import {
  allowsMultiple,
  readTransactionAttribute,
  transactionAttributeSize,
  writeTransactionAttribute,
} from './transaction_attribute.js';
import type { TransactionAttribute } from './transaction_attribute.js';
import { Witness } from './witness.js';

export type TransactionFields = {
  version: number;
  nonce: number;
  systemFee: bigint;
  networkFee: bigint;
  validUntilBlock: number;
  signers: readonly Signer[];
  attributes: readonly TransactionAttribute[];
  script: Uint8Array;
};

/* ========================================================================== */
/* Field validation                                                           */
/* ========================================================================== */

function checkU32(label: string, v: number): void {
  if (!Number.isInteger(v) || v < 0 || v > 0xffff_ffff) {
    throw new ConfigurationError(`${label}: ${v} is not a u32`);
  }
}

export function validateSignersAndAttributes(
  signers: readonly Signer[],
  attributes: readonly TransactionAttribute[]
): void {
  if (signers.length === 0) throw new ConfigurationError('transaction: at least one signer is required');
  if (signers.length > MAX_SIGNER_SUBITEMS) {
    throw new ConfigurationError(`transaction: ${signers.length} signers exceed the maximum of ${MAX_SIGNER_SUBITEMS}`);
  }
  if (signers.length + attributes.length > MAX_TRANSACTION_ATTRIBUTES) {
    throw new ConfigurationError(
      `transaction: signers + attributes (${signers.length + attributes.length}) exceed ${MAX_TRANSACTION_ATTRIBUTES}`
    );
  }
  assertUniqueSigners(signers);

  const seen = new Set<string>();
  for (const a of attributes) {
    if (seen.has(a.type) && !allowsMultiple(a.type)) {
      throw new ConfigurationError(`transaction: duplicate ${a.type} attribute`);
    }
    seen.add(a.type);
  }
}

/* ========================================================================== */
/* Unsigned transaction                                                       */
/* ========================================================================== */

export class Transaction implements Serializable {
  readonly version: number;
  readonly nonce: number;
  readonly systemFee: bigint;
  readonly networkFee: bigint;
  readonly validUntilBlock: number;
  readonly signers: readonly Signer[];
  readonly attributes: readonly TransactionAttribute[];
  readonly script: Uint8Array;

  protected readonly provider?: Provider;

  constructor(fields: TransactionFields, provider?: Provider) {
    if (!Number.isInteger(fields.version) || fields.version < 0 || fields.version > 0xff) {
      throw new ConfigurationError(`transaction: invalid version ${fields.version}`);
    }
    checkU32('transaction: nonce', fields.nonce);
    checkU32('transaction: validUntilBlock', fields.validUntilBlock);
    if (fields.script.length === 0) throw new ConfigurationError('transaction: script is empty');
    if (fields.systemFee < 0n || fields.networkFee < 0n) throw new ConfigurationError('transaction: negative fee');
    validateSignersAndAttributes(fields.signers, fields.attributes);

    this.version = fields.version;
    this.nonce = fields.nonce;
    this.systemFee = fields.systemFee;
    this.networkFee = fields.networkFee;
    this.validUntilBlock = fields.validUntilBlock;
    this.signers = fields.signers.map((s) => s.snapshot());
    this.attributes = [...fields.attributes];
    this.script = Uint8Array.from(fields.script);
    this.provider = provider;
  }

  get fields(): TransactionFields {
    return {
      version: this.version,
      nonce: this.nonce,
      systemFee: this.systemFee,
      networkFee: this.networkFee,
      validUntilBlock: this.validUntilBlock,
      signers: this.signers,
      attributes: this.attributes,
      script: this.script,
    };
  }

  /** The first signer pays the fees. */
  get sender(): Signer {
    return this.signers[0];
  }

  get unsignedSize(): number {
    let attrs = varIntSize(this.attributes.length);
    for (const a of this.attributes) attrs += transactionAttributeSize(a);
    return 1 + 4 + 8 + 8 + 4 + serializableListSize(this.signers) + attrs + varBytesSize(this.script);
  }

  get size(): number {
    return this.unsignedSize;
  }

  protected serializeUnsigned(w: BinaryWriter): void {
    w.writeU8(this.version)
      .writeU32(this.nonce)
      .writeI64(this.systemFee)
      .writeI64(this.networkFee)
      .writeU32(this.validUntilBlock)
      .writeSerializableList(this.signers);
    w.writeVarInt(this.attributes.length);
    for (const a of this.attributes) writeTransactionAttribute(w, a);
    w.writeVarBytes(this.script);
  }

  serialize(w: BinaryWriter): void {
    this.serializeUnsigned(w);
  }

  unsignedBytes(): Uint8Array {
    const w = new BinaryWriter(this.unsignedSize);
    this.serializeUnsigned(w);
    return w.toBytes();
  }

  toBytes(): Uint8Array {
    const w = new BinaryWriter(this.size);
    this.serialize(w);
    return w.toBytes();
  }

  toHex(): string {
    return bytesToHex(this.toBytes());
  }

  /** Transaction id: SHA256 of the unsigned bytes (display hex is reversed). */
  get hash(): Hash256 {
    return Hash256.digest(this.unsignedBytes());
  }

  /** Bytes every witness signs for the given network. */
  getHashData(networkMagic: number): Uint8Array {
    checkU32('getHashData: networkMagic', networkMagic);
    return concat(new BinaryWriter(4).writeU32(networkMagic).toBytes(), this.hash.toLittleEndian());
  }

  /**
   * Attach externally produced witnesses (e.g. a multi-sig collected
   * offline). One witness per signer in signer order; a witness with a
   * verification script must hash to its signer.
   */
  withWitnesses(witnesses: readonly Witness[]): SignedTransaction {
    if (witnesses.length !== this.signers.length) {
      throw new ConfigurationError(
        `withWitnesses: ${witnesses.length} witness(es) for ${this.signers.length} signer(s)`
      );
    }
    witnesses.forEach((wit, i) => {
      const hash = wit.scriptHash;
      if (hash && !hash.equals(this.signers[i].signerHash)) {
        throw new ConfigurationError(`withWitnesses: witness ${i} does not match signer ${this.signers[i].signerHash.toJSON()}`);
      }
    });
    const signed = new SignedTransaction(this.fields, witnesses, this.provider);
    if (signed.size > MAX_TRANSACTION_SIZE) {
      throw new ConfigurationError(`withWitnesses: transaction size ${signed.size} exceeds ${MAX_TRANSACTION_SIZE}`);
    }
    return signed;
  }

  protected static readFields(r: BinaryReader): TransactionFields {
    const version = r.readU8();
    if (version !== TRANSACTION_VERSION) throw new FormatError(`Transaction.decode: unsupported version ${version}`);
    const nonce = r.readU32();
    const systemFee = r.readI64();
    const networkFee = r.readI64();
    if (systemFee < 0n || networkFee < 0n) throw new FormatError('Transaction.decode: negative fee');
    const validUntilBlock = r.readU32();

    const signers = r.readSerializableList(Signer.decode, MAX_SIGNER_SUBITEMS);
    if (signers.length === 0) throw new FormatError('Transaction.decode: no signers');
    const attributes = r.readSerializableList(readTransactionAttribute, MAX_TRANSACTION_ATTRIBUTES - signers.length);
    const script = r.readVarBytes(MAX_TRANSACTION_SCRIPT_SIZE);
    if (script.length === 0) throw new FormatError('Transaction.decode: empty script');

    return { version, nonce, systemFee, networkFee, validUntilBlock, signers, attributes, script };
  }

  /** Decode the unsigned form; trailing bytes are rejected. */
  static decode(bytes: Uint8Array, provider?: Provider): Transaction {
    const r = new BinaryReader(bytes);
    const fields = Transaction.readFields(r);
    if (r.available !== 0) throw new FormatError(`Transaction.decode: ${r.available} trailing byte(s)`);
    return asFormatError('Transaction.decode', () => new Transaction(fields, provider));
  }
}

// Decoded input that fails a builder-side check is malformed input.
function asFormatError<T>(label: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ConfigurationError) throw new FormatError(`${label}: ${err.message}`, { cause: err });
    throw err;
  }
}

/* ========================================================================== */
/* Signed transaction                                                         */
/* ========================================================================== */

export class SignedTransaction extends Transaction {
  readonly witnesses: readonly Witness[];
  private sentAtHeight?: number;

  constructor(fields: TransactionFields, witnesses: readonly Witness[], provider?: Provider) {
    super(fields, provider);
    if (witnesses.length !== fields.signers.length) {
      throw new ConfigurationError(`SignedTransaction: ${witnesses.length} witness(es) for ${fields.signers.length} signer(s)`);
    }
    this.witnesses = [...witnesses];
  }

  override get size(): number {
    return this.unsignedSize + serializableListSize(this.witnesses);
  }

  override serialize(w: BinaryWriter): void {
    this.serializeUnsigned(w);
    w.writeSerializableList(this.witnesses);
  }

  /** Block count observed just before broadcasting; undefined until sent. */
  get blockHeightWhenSent(): number | undefined {
    return this.sentAtHeight;
  }

  /** Broadcast through the provider; returns the id the node reports. */
  async send(): Promise<Hash256> {
    const provider = this.provider;
    if (!provider) throw new ConfigurationError('send: transaction has no provider');

    const height = await callProvider('getBlockCount', () => provider.getBlockCount());
    const res = await callProvider('sendRawTransaction', () => provider.sendRawTransaction(this.toHex()));
    this.sentAtHeight = height;
    return Hash256.fromHex(res.hash);
  }

  static override decode(bytes: Uint8Array, provider?: Provider): SignedTransaction {
    const r = new BinaryReader(bytes);
    const fields = Transaction.readFields(r);
    const witnesses = r.readSerializableList(Witness.decode, fields.signers.length);
    if (witnesses.length !== fields.signers.length) {
      throw new FormatError(
        `SignedTransaction.decode: ${witnesses.length} witness(es) for ${fields.signers.length} signer(s)`
      );
    }
    if (r.available !== 0) throw new FormatError(`SignedTransaction.decode: ${r.available} trailing byte(s)`);
    return asFormatError('SignedTransaction.decode', () =>
      new Transaction(fields, provider).withWitnesses(witnesses)
    );
  }
}
