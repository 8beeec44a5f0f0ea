/**
 * StaticYieldFeed - yield sources declared in configuration.
 */

import type { YieldSource } from "@yield-guardian/types";
import { MANUAL_ORIGIN } from "./chains.js";
import type { YieldSourceFeed } from "./observer.js";

export interface StaticSourceInput {
  readonly name: string;
  readonly principal: string;
  readonly annualRatePercent: string;
  readonly protocolAddress?: string | undefined;
}

export class StaticYieldFeed implements YieldSourceFeed {
  readonly origin: string;
  private readonly inputs: readonly StaticSourceInput[];
  private readonly now: () => Date;

  constructor(
    inputs: readonly StaticSourceInput[],
    options: { origin?: string; now?: () => Date } = {},
  ) {
    this.inputs = inputs;
    this.origin = options.origin ?? MANUAL_ORIGIN;
    this.now = options.now ?? (() => new Date());
  }

  async fetchSources(): Promise<readonly YieldSource[]> {
    const lastUpdated = this.now().toISOString();
    return this.inputs.map((input) => ({
      name: input.name,
      origin: this.origin,
      principal: input.principal,
      annualRatePercent: input.annualRatePercent,
      lastUpdated,
      protocolAddress: input.protocolAddress,
    }));
  }
}
