/**
 * @module config
 * @description Node configuration: defaults and validation.
 */

import { z } from "zod";

export class ConfigError extends Error {
  readonly code = "INVALID_CONFIG" as const;

  constructor(
    message: string,
    /** One entry per failing option, "path: reason". */
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const positiveMs = z.number().int().positive();

/**
 * Numeric tuning of a node. Every field has a default.
 */
export const nodeTuningSchema = z
  .object({
    /** TTL of locally originated messages. */
    initialTtl: z.number().int().min(0).max(255).default(3),
    /** Expected authority heartbeat period. */
    heartbeatIntervalMs: positiveMs.default(30_000),
    /** Heartbeats missed before the authority counts as unreachable. */
    missedHeartbeatThreshold: z.number().int().min(1).default(2),
    beaconIntervalMs: positiveMs.default(15_000),
    peerTimeoutMs: positiveMs.default(90_000),
    /** Peers needed to stay in P2P_FALLBACK rather than DEGRADED. */
    minPeers: z.number().int().min(1).default(2),
    retryBaseMs: positiveMs.default(1_000),
    retryMaxMs: positiveMs.default(60_000),
    queueEntryTtlMs: positiveMs.default(600_000),
    /** Delivery attempts per queued message before it is dropped. */
    maxDeliveryAttempts: z.number().int().min(1).default(5),
    drainIntervalMs: positiveMs.default(1_000),
    dedupRetentionMs: positiveMs.default(600_000),
    dedupMaxEntries: z.number().int().min(1).default(10_000),
    syncTimeoutMs: positiveMs.default(15_000),
  })
  .refine((t) => t.retryMaxMs >= t.retryBaseMs, {
    message: "retryMaxMs must be at least retryBaseMs",
    path: ["retryMaxMs"],
  });

export type NodeTuningInput = z.input<typeof nodeTuningSchema>;
export type NodeTuning = z.output<typeof nodeTuningSchema>;

/**
 * Apply defaults and validate.
 *
 * @throws {ConfigError} listing every invalid option.
 */
export function resolveTuning(input: NodeTuningInput = {}): NodeTuning {
  const result = nodeTuningSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid node configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
