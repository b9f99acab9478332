// packages/tx-builder/src/witness.ts
import type { BinaryReader, BinaryWriter, Serializable } from '@n3tx/codec';
import type { KeyPair } from '@n3tx/crypto';
import { InvocationScript, ScriptBuilder, VerificationScript } from '@n3tx/script';
import type { ContractParameter } from '@n3tx/script';
import { ConfigurationError, Hash160 } from '@n3tx/utils';

/** Invocation script plus the verification script it satisfies. */
export class Witness implements Serializable {
  readonly invocationScript: InvocationScript;
  readonly verificationScript: VerificationScript;

  constructor(
    invocationScript: InvocationScript = new InvocationScript(),
    verificationScript: VerificationScript = new VerificationScript()
  ) {
    this.invocationScript = invocationScript;
    this.verificationScript = verificationScript;
  }

  /** Single-signature witness over `message` (the transaction's signing data). */
  static create(message: Uint8Array, keyPair: KeyPair): Witness {
    return new Witness(
      InvocationScript.fromSignature(keyPair.sign(message)),
      VerificationScript.fromPublicKey(keyPair.publicKey)
    );
  }

  /** Pushes exactly the first `threshold` signatures, in the order given. */
  static createMultiSigWitness(signatures: readonly Uint8Array[], verificationScript: VerificationScript): Witness {
    const threshold = verificationScript.getSigningThreshold();
    if (signatures.length < threshold) {
      throw new ConfigurationError(
        `createMultiSigWitness: ${signatures.length} signature(s) provided, ${threshold} required`
      );
    }
    return new Witness(InvocationScript.fromSignatures(signatures.slice(0, threshold)), verificationScript);
  }

  /**
   * Witness for a contract signer: the invocation script pushes the
   * arguments of the contract's `verify` method; the verification script
   * stays empty so the node calls the deployed contract.
   */
  static createContractWitness(verifyParams: readonly ContractParameter[]): Witness {
    if (verifyParams.length === 0) return new Witness();
    const sb = new ScriptBuilder();
    for (const p of verifyParams) sb.pushParam(p);
    return new Witness(new InvocationScript(sb.toBytes()), new VerificationScript());
  }

  static decode(r: BinaryReader): Witness {
    const invocation = InvocationScript.decode(r);
    return new Witness(invocation, VerificationScript.decode(r));
  }

  get size(): number {
    return this.invocationScript.size + this.verificationScript.size;
  }

  /** Hash of the verification script; undefined for contract witnesses. */
  get scriptHash(): Hash160 | undefined {
    return this.verificationScript.isEmpty ? undefined : this.verificationScript.scriptHash;
  }

  serialize(w: BinaryWriter): void {
    this.invocationScript.serialize(w);
    this.verificationScript.serialize(w);
  }
}
