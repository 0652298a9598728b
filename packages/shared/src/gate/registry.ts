/**
 * All gated tiers of one page
 */

import type { GateManifest } from '../types';
import { ContentGate } from './content-gate';
import { createDecoyEnvelopes } from './decoy';
import type { AttemptOptions, ContentGateOptions } from './content-gate';
import type { AttemptResult } from './transitions';

export type RegistryOptions<T> = Omit<ContentGateOptions<T>, 'tier' | 'envelopes'>;

export class GateRegistry<T> {
  private readonly gates = new Map<string, ContentGate<T>>();
  /** Gates for names the page does not have, created on first use */
  private readonly decoys = new Map<string, ContentGate<T>>();
  private readonly manifest: GateManifest;
  private readonly options: RegistryOptions<T>;

  constructor(manifest: GateManifest, options: RegistryOptions<T>) {
    this.manifest = manifest;
    this.options = options;
    for (const [tier, embedded] of Object.entries(manifest.tiers)) {
      this.gates.set(tier, new ContentGate<T>({ ...options, tier, envelopes: embedded.envelopes }));
    }
  }

  tiers(): string[] {
    return [...this.gates.keys()];
  }

  get(tier: string): ContentGate<T> | undefined {
    return this.gates.get(tier);
  }

  /**
   * Attempt a tier by name. An unknown tier gets a gate of its own over
   * envelopes nothing can open, so it derives keys, fails and cools down
   * like a real tier given a wrong password.
   */
  async attempt(tier: string, password: string, options?: AttemptOptions): Promise<AttemptResult<T>> {
    return this.resolve(tier).attempt(password, options);
  }

  dispose(): void {
    this.gates.forEach((gate) => gate.dispose());
    this.decoys.forEach((gate) => gate.dispose());
    this.decoys.clear();
  }

  private resolve(tier: string): ContentGate<T> {
    const gate = this.gates.get(tier) ?? this.decoys.get(tier);
    if (gate) {
      return gate;
    }
    const decoy = new ContentGate<T>({ ...this.options, tier, envelopes: createDecoyEnvelopes(this.manifest) });
    this.decoys.set(tier, decoy);
    return decoy;
  }
}
