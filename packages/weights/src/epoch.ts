/**
 * Epoch utilities.
 *
 * epoch = floor((now - START_TIME) / EPOCH_LENGTH), all in unix seconds.
 * START_TIME is fixed at deployment and aligned to an epoch boundary shifted
 * by a configurable offset, so epochs start on a chosen weekday and time.
 */

import { MAX_EPOCHS } from "./constants.js";
import { invalidInput, overflow } from "./errors.js";

export type Clock = () => number;

/** Wall clock in whole unix seconds. */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Compute START_TIME for a deployment at `deployedAt`: the epoch boundary at
 * or before it, less the offset, moved one epoch later if that leaves the
 * deployment past the end of epoch 0. A deployment exactly on that end
 * opens in epoch 1.
 */
export function computeStartTime(
  deployedAt: number,
  epochLength: number,
  startOffset: number,
): number {
  if (!Number.isInteger(epochLength) || epochLength <= 0) {
    throw invalidInput("invalid_epoch_length", String(epochLength));
  }
  let start = Math.floor(deployedAt / epochLength) * epochLength - Math.floor(startOffset);
  if (start + epochLength < deployedAt) start += epochLength;
  return start;
}

/** Compute epoch number from a timestamp. */
export function epochFromTimestamp(
  timestamp: number,
  startTime: number,
  epochLength: number,
): number {
  if (timestamp < startTime) return 0;
  const epoch = Math.floor((timestamp - startTime) / epochLength);
  if (epoch >= MAX_EPOCHS) throw overflow("epoch_out_of_range", String(epoch));
  return epoch;
}

/** Get epoch start timestamp. */
export function epochStart(epoch: number, startTime: number, epochLength: number): number {
  return startTime + epoch * epochLength;
}

/** Get epoch end timestamp (exclusive). */
export function epochEnd(epoch: number, startTime: number, epochLength: number): number {
  return startTime + (epoch + 1) * epochLength;
}

/** True once more than half of the current epoch has elapsed. */
export function isSecondHalfOfEpoch(
  timestamp: number,
  startTime: number,
  epochLength: number,
): boolean {
  if (timestamp < startTime) return false;
  return (timestamp - startTime) % epochLength > epochLength / 2;
}

export class EpochClock {
  readonly startTime: number;
  readonly epochLength: number;
  private readonly clock: Clock;

  constructor(startTime: number, epochLength: number, clock: Clock = systemClock) {
    if (!Number.isInteger(epochLength) || epochLength <= 0) {
      throw invalidInput("invalid_epoch_length", String(epochLength));
    }
    this.startTime = startTime;
    this.epochLength = epochLength;
    this.clock = clock;
  }

  now(): number {
    return this.clock();
  }

  currentEpoch(): number {
    return epochFromTimestamp(this.clock(), this.startTime, this.epochLength);
  }

  epochAt(timestamp: number): number {
    return epochFromTimestamp(timestamp, this.startTime, this.epochLength);
  }

  epochStart(epoch: number): number {
    return epochStart(epoch, this.startTime, this.epochLength);
  }

  epochEnd(epoch: number): number {
    return epochEnd(epoch, this.startTime, this.epochLength);
  }

  inSecondHalf(): boolean {
    return isSecondHalfOfEpoch(this.clock(), this.startTime, this.epochLength);
  }
}
