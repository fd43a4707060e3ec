/**
 * Holds the active policy. Policies are never mutated; a reload builds a
 * complete new policy and swaps the reference in one assignment, so a
 * request always sees one consistent policy from start to finish.
 */

import { loadPolicyFile } from './policy-loader.js';
import type { SecurityPolicy } from './security-policy.js';

export type PolicyChangeListener = (next: SecurityPolicy, previous: SecurityPolicy) => void;

export class PolicyStore {
  private policy: SecurityPolicy;
  private readonly listeners = new Set<PolicyChangeListener>();

  constructor(initial: SecurityPolicy) {
    this.policy = initial;
  }

  current(): SecurityPolicy {
    return this.policy;
  }

  replace(next: SecurityPolicy): void {
    const previous = this.policy;
    this.policy = next;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }

  /**
   * Re-read the policy from its source file. On failure the current policy
   * stays in place and the PolicyLoadError propagates.
   */
  async reload(): Promise<SecurityPolicy> {
    const next = await loadPolicyFile(this.policy.source);
    this.replace(next);
    return next;
  }

  onChange(listener: PolicyChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
