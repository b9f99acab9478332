// packages/tx-builder/src/witness_condition.ts
import { varIntSize } from '@n3tx/codec';
import type { BinaryReader, BinaryWriter } from '@n3tx/codec';
import { bytesToHex, ConfigurationError, FormatError, Hash160, hexToBytes } from '@n3tx/utils';

import { MAX_SIGNER_SUBITEMS, MAX_WITNESS_CONDITION_NESTING } from './constants.js';

export type WitnessCondition =
  | { type: 'Boolean'; expression: boolean }
  | { type: 'Not'; expression: WitnessCondition }
  | { type: 'And'; expressions: WitnessCondition[] }
  | { type: 'Or'; expressions: WitnessCondition[] }
  | { type: 'ScriptHash'; hash: Hash160 }
  | { type: 'Group'; group: Uint8Array }
  | { type: 'CalledByEntry' }
  | { type: 'CalledByContract'; hash: Hash160 }
  | { type: 'CalledByGroup'; group: Uint8Array };

export type WitnessConditionType = WitnessCondition['type'];

export const WITNESS_CONDITION_TYPE_BYTES: Record<WitnessConditionType, number> = {
  Boolean: 0x00,
  Not: 0x01,
  And: 0x02,
  Or: 0x03,
  ScriptHash: 0x18,
  Group: 0x19,
  CalledByEntry: 0x20,
  CalledByContract: 0x28,
  CalledByGroup: 0x29,
};

const GROUP_KEY_SIZE = 33;

function checkGroup(group: Uint8Array): Uint8Array {
  if (group.length !== GROUP_KEY_SIZE || (group[0] !== 0x02 && group[0] !== 0x03)) {
    throw new ConfigurationError(`witness condition: group must be a 33-byte compressed public key`);
  }
  return Uint8Array.from(group);
}

export const WitnessConditions = {
  boolean(expression: boolean): WitnessCondition {
    return { type: 'Boolean', expression };
  },
  not(expression: WitnessCondition): WitnessCondition {
    return { type: 'Not', expression };
  },
  and(...expressions: WitnessCondition[]): WitnessCondition {
    return { type: 'And', expressions };
  },
  or(...expressions: WitnessCondition[]): WitnessCondition {
    return { type: 'Or', expressions };
  },
  scriptHash(hash: Hash160): WitnessCondition {
    return { type: 'ScriptHash', hash };
  },
  group(group: Uint8Array | string): WitnessCondition {
    return { type: 'Group', group: checkGroup(hexToBytes(group)) };
  },
  calledByEntry(): WitnessCondition {
    return { type: 'CalledByEntry' };
  },
  calledByContract(hash: Hash160): WitnessCondition {
    return { type: 'CalledByContract', hash };
  },
  calledByGroup(group: Uint8Array | string): WitnessCondition {
    return { type: 'CalledByGroup', group: checkGroup(hexToBytes(group)) };
  },
};

/**
 * Composite conditions (Not, And, Or) consume one level of `depth`; a
 * composite reached with no depth left fails, as does an And/Or with
 * more than MAX_SIGNER_SUBITEMS children.
 */
export function validateWitnessCondition(c: WitnessCondition, depth = MAX_WITNESS_CONDITION_NESTING): void {
  switch (c.type) {
    case 'Not':
      if (depth <= 0) throw new ConfigurationError('witness condition: nesting depth exceeded');
      validateWitnessCondition(c.expression, depth - 1);
      return;
    case 'And':
    case 'Or':
      if (depth <= 0) throw new ConfigurationError('witness condition: nesting depth exceeded');
      if (c.expressions.length > MAX_SIGNER_SUBITEMS) {
        throw new ConfigurationError(
          `witness condition: ${c.type} has ${c.expressions.length} sub-items (max ${MAX_SIGNER_SUBITEMS})`
        );
      }
      for (const e of c.expressions) validateWitnessCondition(e, depth - 1);
      return;
    default:
      return;
  }
}

export function witnessConditionSize(c: WitnessCondition): number {
  switch (c.type) {
    case 'Boolean':
      return 2;
    case 'Not':
      return 1 + witnessConditionSize(c.expression);
    case 'And':
    case 'Or':
      return c.expressions.reduce((acc, e) => acc + witnessConditionSize(e), 1 + varIntSize(c.expressions.length));
    case 'ScriptHash':
    case 'CalledByContract':
      return 1 + Hash160.SIZE;
    case 'Group':
    case 'CalledByGroup':
      return 1 + GROUP_KEY_SIZE;
    case 'CalledByEntry':
      return 1;
  }
}

export function writeWitnessCondition(w: BinaryWriter, c: WitnessCondition): void {
  w.writeU8(WITNESS_CONDITION_TYPE_BYTES[c.type]);
  switch (c.type) {
    case 'Boolean':
      w.writeBool(c.expression);
      return;
    case 'Not':
      writeWitnessCondition(w, c.expression);
      return;
    case 'And':
    case 'Or':
      w.writeVarInt(c.expressions.length);
      for (const e of c.expressions) writeWitnessCondition(w, e);
      return;
    case 'ScriptHash':
    case 'CalledByContract':
      w.writeBytes(c.hash.toLittleEndian());
      return;
    case 'Group':
    case 'CalledByGroup':
      w.writeBytes(c.group);
      return;
    case 'CalledByEntry':
      return;
  }
}

export function readWitnessCondition(r: BinaryReader, depth = MAX_WITNESS_CONDITION_NESTING): WitnessCondition {
  const typeByte = r.readU8();
  switch (typeByte) {
    case 0x00:
      return { type: 'Boolean', expression: r.readBool() };
    case 0x01:
      if (depth <= 0) throw new FormatError('readWitnessCondition: nesting depth exceeded');
      return { type: 'Not', expression: readWitnessCondition(r, depth - 1) };
    case 0x02:
    case 0x03: {
      if (depth <= 0) throw new FormatError('readWitnessCondition: nesting depth exceeded');
      const expressions = r.readSerializableList((rr) => readWitnessCondition(rr, depth - 1), MAX_SIGNER_SUBITEMS);
      return typeByte === 0x02 ? { type: 'And', expressions } : { type: 'Or', expressions };
    }
    case 0x18:
      return { type: 'ScriptHash', hash: new Hash160(r.readBytes(Hash160.SIZE)) };
    case 0x19:
      return { type: 'Group', group: r.readEncodedEcPoint() };
    case 0x20:
      return { type: 'CalledByEntry' };
    case 0x28:
      return { type: 'CalledByContract', hash: new Hash160(r.readBytes(Hash160.SIZE)) };
    case 0x29:
      return { type: 'CalledByGroup', group: r.readEncodedEcPoint() };
    default:
      throw new FormatError(`readWitnessCondition: unknown condition type 0x${typeByte.toString(16)}`);
  }
}

/** RPC JSON form used in signer `rules`. */
export type WitnessConditionJson =
  | { type: 'Boolean'; expression: boolean }
  | { type: 'Not'; expression: WitnessConditionJson }
  | { type: 'And' | 'Or'; expressions: WitnessConditionJson[] }
  | { type: 'ScriptHash' | 'CalledByContract'; hash: string }
  | { type: 'Group' | 'CalledByGroup'; group: string }
  | { type: 'CalledByEntry' };

export function witnessConditionToJson(c: WitnessCondition): WitnessConditionJson {
  switch (c.type) {
    case 'Boolean':
      return { type: 'Boolean', expression: c.expression };
    case 'Not':
      return { type: 'Not', expression: witnessConditionToJson(c.expression) };
    case 'And':
    case 'Or':
      return { type: c.type, expressions: c.expressions.map(witnessConditionToJson) };
    case 'ScriptHash':
    case 'CalledByContract':
      return { type: c.type, hash: c.hash.toJSON() };
    case 'Group':
    case 'CalledByGroup':
      return { type: c.type, group: bytesToHex(c.group) };
    case 'CalledByEntry':
      return { type: 'CalledByEntry' };
  }
}
