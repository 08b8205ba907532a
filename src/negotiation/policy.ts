/**
 * Rule-based policy engine: an asset is granted when every required claim
 * matches the verified claims exactly.
 */

import type { ClaimSet, PolicyDecision, PolicyEngine } from '../core/types.js';

export interface RulePolicyOptions {
  /** Decision for assets without a rule and without a `*` rule */
  defaultDecision?: PolicyDecision;
}

export class RulePolicyEngine implements PolicyEngine {
  private rules = new Map<string, ClaimSet>();
  private defaultDecision: PolicyDecision;

  constructor(rules: Record<string, ClaimSet> = {}, options: RulePolicyOptions = {}) {
    for (const [assetId, required] of Object.entries(rules)) this.rules.set(assetId, required);
    this.defaultDecision = options.defaultDecision ?? 'deny';
  }

  /** Require `claims` for `assetId`; `*` applies to assets without their own rule. */
  require(assetId: string, claims: ClaimSet): this {
    this.rules.set(assetId, claims);
    return this;
  }

  evaluate(claims: ClaimSet, assetId: string): PolicyDecision {
    const required = this.rules.get(assetId) ?? this.rules.get('*');
    if (!required) return this.defaultDecision;
    for (const [key, value] of Object.entries(required)) {
      if (claims[key] !== value) return 'deny';
    }
    return 'allow';
  }
}
