/**
 * Live balance feed
 *
 * Turns pushed change notifications into fresh balance/settlement results.
 * Every push gets a token from a monotonic counter; a computation publishes
 * only if its token is still the newest one for its group when it finishes,
 * so a slow, older computation never overwrites a newer result.
 *
 * ```
 * push(groupId) ─→ token n ─→ loadSnapshot ─→ evaluate ─→ token n still latest?
 *                                                           ├─ yes → onResult
 *                                                           └─ no  → dropped
 * ```
 *
 * A failed computation that is still the newest one is kept as the group's
 * failure until a later push publishes.
 */

import type { GroupSnapshot } from "../types/index.js";
import { evaluateSnapshot, type SnapshotEvaluation } from "./BalanceService.js";

export interface LiveBalanceResult extends SnapshotEvaluation {
  groupId: string;
  token: number;
  computedAt: Date;
}

export interface LiveBalanceFailure {
  groupId: string;
  token: number;
  error: unknown;
  failedAt: Date;
}

export interface LiveBalanceFeedConfig {
  loadSnapshot: (groupId: string) => Promise<GroupSnapshot>;
  onResult?: (result: LiveBalanceResult) => void;
  onError?: (groupId: string, error: unknown) => void;
}

export class LiveBalanceFeed {
  private loadSnapshot: LiveBalanceFeedConfig["loadSnapshot"];
  private onResult?: LiveBalanceFeedConfig["onResult"];
  private onError: NonNullable<LiveBalanceFeedConfig["onError"]>;

  private sequence = 0;
  private latestTokens: Map<string, number> = new Map();
  private latestResults: Map<string, LiveBalanceResult> = new Map();
  private failures: Map<string, LiveBalanceFailure> = new Map();

  constructor(config: LiveBalanceFeedConfig) {
    this.loadSnapshot = config.loadSnapshot;
    this.onResult = config.onResult;
    this.onError =
      config.onError ??
      ((groupId, error) => {
        console.error(`[LiveBalanceFeed] Recomputation failed for group ${groupId}:`, error);
      });
  }

  /**
   * Notify the feed that a group's data changed. Resolves with the published
   * result, or null when the result was superseded or the computation failed.
   * Never rejects.
   */
  async push(groupId: string): Promise<LiveBalanceResult | null> {
    this.sequence += 1;
    const token = this.sequence;
    this.latestTokens.set(groupId, token);

    let evaluation: SnapshotEvaluation;
    try {
      evaluation = evaluateSnapshot(await this.loadSnapshot(groupId));
    } catch (error) {
      if (this.isCurrent(groupId, token)) {
        this.failures.set(groupId, { groupId, token, error, failedAt: new Date() });
        this.onError(groupId, error);
      }
      return null;
    }

    if (!this.isCurrent(groupId, token)) {
      console.log(`[LiveBalanceFeed] Dropped stale result ${token} for group ${groupId}`);
      return null;
    }

    const result: LiveBalanceResult = {
      groupId,
      token,
      computedAt: new Date(),
      ...evaluation,
    };

    this.latestResults.set(groupId, result);
    this.failures.delete(groupId);
    try {
      this.onResult?.(result);
    } catch (error) {
      this.onError(groupId, error);
    }
    return result;
  }

  /**
   * Most recent published result for a group
   */
  latest(groupId: string): LiveBalanceResult | undefined {
    return this.latestResults.get(groupId);
  }

  /**
   * The newest computation's failure, if it failed after the latest published result
   */
  latestFailure(groupId: string): LiveBalanceFailure | undefined {
    return this.failures.get(groupId);
  }

  private isCurrent(groupId: string, token: number): boolean {
    return this.latestTokens.get(groupId) === token;
  }
}
