import type { StepRule } from "./types";
import { ConfigurationError } from "./errors";
import { config } from "./config";

/**
 * Maps a payload byte length to the quantization step used for its bits.
 *
 * Small payloads get a fine step (less distortion); large payloads get a
 * coarser one, since they touch more coefficients and accumulate more rounding
 * noise. Extraction recomputes the step from the decoded length alone, so the
 * table is part of the protocol.
 */
export class AdaptiveStepPolicy {
  readonly rules: readonly StepRule[];

  constructor(rules: readonly StepRule[]) {
    if (rules.length === 0) throw new ConfigurationError("Step table is empty");
    rules.forEach((rule, i) => {
      if (!(rule.q > 0) || !Number.isFinite(rule.q)) {
        throw new ConfigurationError(`Step table row ${i}: q must be positive and finite, got ${rule.q}`);
      }
      const prev = rules[i - 1];
      if (prev && !(rule.maxBytes > prev.maxBytes)) {
        throw new ConfigurationError(`Step table row ${i}: thresholds must be strictly increasing`);
      }
      if (prev && rule.q < prev.q) {
        throw new ConfigurationError(`Step table row ${i}: q must be non-decreasing`);
      }
    });
    if (rules[rules.length - 1].maxBytes !== Infinity) {
      throw new ConfigurationError("Step table must end with an unbounded row (maxBytes = Infinity)");
    }
    this.rules = rules.map((r) => ({ ...r }));
  }

  stepFor(length: number): number {
    if (!Number.isInteger(length) || length < 0) {
      throw new ConfigurationError(`Payload length must be a non-negative integer, got ${length}`);
    }
    for (const rule of this.rules) {
      if (length <= rule.maxBytes) return rule.q;
    }
    // unreachable: the last row is unbounded
    return this.rules[this.rules.length - 1].q;
  }
}

export const DEFAULT_STEP_POLICY = new AdaptiveStepPolicy(config.stepTable);
