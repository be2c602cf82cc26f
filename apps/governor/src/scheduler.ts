/**
 * Epoch keeper — catches the shared ledgers up when an epoch starts.
 *
 * Checks every `checkIntervalMs` whether a new epoch has started. When it
 * has, materializes total lock weight and total vote weight and releases
 * the vault's epoch emissions, all in one transaction. Every write path
 * also catches up on its own.
 */

import { createLogger, type Logger } from "./logger.js";
import type { Protocol } from "./protocol.js";

export interface KeeperResult {
  epoch: number;
  totalLockWeight: number;
  totalVoteWeight: number;
  epochEmissions: bigint;
  unallocated: bigint;
}

export interface KeeperOptions {
  /** How often to check for an epoch boundary (ms). Default: 60_000 (1 min). */
  checkIntervalMs?: number;
  /** Callback after each catch-up (for logging/monitoring). */
  onAdvance?: (result: KeeperResult) => void;
  /** Callback for errors. Default: log through `logger`. */
  onError?: (error: unknown) => void;
  /** Logger for the default callbacks. Default: a pino logger at info. */
  logger?: Logger;
}

export interface EpochKeeper {
  start(): void;
  stop(): void;
  /** Last epoch caught up, -1 before the first tick. */
  lastProcessedEpoch(): number;
  /** Manually trigger a check (useful for testing). */
  tick(): KeeperResult | null;
}

const DEFAULT_CHECK_INTERVAL_MS = 60_000;

export function createEpochKeeper(
  protocol: Pick<Protocol, "core" | "locker" | "voter" | "vault" | "tx">,
  options: KeeperOptions = {},
): EpochKeeper {
  const checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
  const log = options.logger ?? createLogger("info");
  const onAdvance =
    options.onAdvance ??
    ((result: KeeperResult) => log.info({ epoch: result.epoch }, "epoch caught up by keeper"));
  const onError = options.onError ?? ((err: unknown) => log.error({ err }, "keeper error"));
  const { core, locker, voter, vault, tx } = protocol;

  let timer: ReturnType<typeof setInterval> | null = null;
  let _lastProcessedEpoch = -1;

  function tick(): KeeperResult | null {
    let epoch: number;
    try {
      epoch = core.getEpoch();
    } catch (err) {
      onError(err);
      return null;
    }
    if (epoch <= _lastProcessedEpoch) return null;

    try {
      const result = tx.run((): KeeperResult => {
        const totalLockWeight = locker.getTotalWeightWrite();
        const totalVoteWeight = voter.getTotalWeightWrite();
        vault.allocateTotalEmissions();
        return {
          epoch,
          totalLockWeight,
          totalVoteWeight,
          epochEmissions: vault.epochEmissions(epoch),
          unallocated: vault.unallocatedTotal,
        };
      });
      _lastProcessedEpoch = epoch;
      onAdvance(result);
      return result;
    } catch (err) {
      onError(err);
      return null;
    }
  }

  return {
    start() {
      if (timer) return;
      timer = setInterval(() => {
        tick();
      }, checkIntervalMs);
      // Immediate first tick
      tick();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    lastProcessedEpoch() {
      return _lastProcessedEpoch;
    },

    tick,
  };
}
