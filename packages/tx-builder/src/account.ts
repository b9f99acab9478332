// packages/tx-builder/src/account.ts
import {
  ADDRESS_VERSION,
  addressToScriptHash,
  decryptKeyPair,
  encryptKeyPair,
  KeyPair,
  scriptHashToAddress,
} from '@n3tx/crypto';
import { VerificationScript } from '@n3tx/script';
import { ConfigurationError, Hash160 } from '@n3tx/utils';

import { resolveTxConfig } from './config.js';
import type { TxConfigInput } from './config.js';

/**
 * A signing identity. Holds a key pair when it can sign, a verification
 * script when its witness shape is known, and always a script hash.
 */
export class Account {
  readonly scriptHash: Hash160;
  readonly keyPair?: KeyPair;
  readonly verificationScript?: VerificationScript;

  private constructor(scriptHash: Hash160, verificationScript?: VerificationScript, keyPair?: KeyPair) {
    this.scriptHash = scriptHash;
    this.verificationScript = verificationScript;
    this.keyPair = keyPair;
  }

  static fromKeyPair(keyPair: KeyPair): Account {
    const vs = VerificationScript.fromPublicKey(keyPair.publicKey);
    return new Account(vs.scriptHash, vs, keyPair);
  }

  static fromWif(wif: string): Account {
    return Account.fromKeyPair(KeyPair.fromWif(wif));
  }

  static fromVerificationScript(verificationScript: VerificationScript): Account {
    return new Account(verificationScript.scriptHash, verificationScript);
  }

  static createMultiSigAccount(publicKeys: readonly Uint8Array[], threshold: number): Account {
    return Account.fromVerificationScript(VerificationScript.fromMultiSig(publicKeys, threshold));
  }

  /** Watch-only account; cannot sign and cannot have its network fee estimated. */
  static fromScriptHash(scriptHash: Hash160): Account {
    return new Account(scriptHash);
  }

  static fromAddress(address: string, version: number = ADDRESS_VERSION): Account {
    return new Account(addressToScriptHash(address, version));
  }

  /** Decrypts with the scrypt parameters of `config`. */
  static fromEncryptedKey(encryptedKey: string, password: string, config: TxConfigInput = {}): Account {
    return Account.fromKeyPair(decryptKeyPair(password, encryptedKey, resolveTxConfig(config).scrypt));
  }

  address(version: number = ADDRESS_VERSION): string {
    return scriptHashToAddress(this.scriptHash, version);
  }

  get isMultiSig(): boolean {
    return this.verificationScript?.isMultiSig() ?? false;
  }

  get signingThreshold(): number {
    if (!this.verificationScript) throw new ConfigurationError('signingThreshold: account has no verification script');
    return this.verificationScript.getSigningThreshold();
  }

  get nrOfParticipants(): number {
    if (!this.verificationScript) throw new ConfigurationError('nrOfParticipants: account has no verification script');
    return this.verificationScript.getNrOfAccounts();
  }

  encryptPrivateKey(password: string, config: TxConfigInput = {}): string {
    if (!this.keyPair) throw new ConfigurationError('encryptPrivateKey: account has no private key');
    return encryptKeyPair(password, this.keyPair, resolveTxConfig(config).scrypt);
  }
}
