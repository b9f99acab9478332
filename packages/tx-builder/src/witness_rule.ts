// packages/tx-builder/src/witness_rule.ts
import type { BinaryReader, BinaryWriter, Serializable } from '@n3tx/codec';
import { FormatError } from '@n3tx/utils';

import {
  readWitnessCondition,
  validateWitnessCondition,
  witnessConditionSize,
  witnessConditionToJson,
  writeWitnessCondition,
} from './witness_condition.js';
import type { WitnessCondition, WitnessConditionJson } from './witness_condition.js';

export const WitnessRuleAction = {
  Deny: 0x00,
  Allow: 0x01,
} as const;

export type WitnessRuleAction = (typeof WitnessRuleAction)[keyof typeof WitnessRuleAction];

export type WitnessRuleJson = { action: 'Deny' | 'Allow'; condition: WitnessConditionJson };

export class WitnessRule implements Serializable {
  readonly action: WitnessRuleAction;
  readonly condition: WitnessCondition;

  /** Fails with ConfigurationError when the condition nests too deep or too wide. */
  constructor(action: WitnessRuleAction, condition: WitnessCondition) {
    validateWitnessCondition(condition);
    this.action = action;
    this.condition = condition;
  }

  static allow(condition: WitnessCondition): WitnessRule {
    return new WitnessRule(WitnessRuleAction.Allow, condition);
  }

  static deny(condition: WitnessCondition): WitnessRule {
    return new WitnessRule(WitnessRuleAction.Deny, condition);
  }

  static decode(r: BinaryReader): WitnessRule {
    const action = r.readU8();
    if (action !== WitnessRuleAction.Deny && action !== WitnessRuleAction.Allow) {
      throw new FormatError(`WitnessRule.decode: invalid action 0x${action.toString(16)}`);
    }
    return new WitnessRule(action, readWitnessCondition(r));
  }

  get size(): number {
    return 1 + witnessConditionSize(this.condition);
  }

  serialize(w: BinaryWriter): void {
    w.writeU8(this.action);
    writeWitnessCondition(w, this.condition);
  }

  toJSON(): WitnessRuleJson {
    return {
      action: this.action === WitnessRuleAction.Allow ? 'Allow' : 'Deny',
      condition: witnessConditionToJson(this.condition),
    };
  }
}
