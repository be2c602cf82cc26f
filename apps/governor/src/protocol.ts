/**
 * Protocol deployment — builds every component on one transactor and one
 * event log and wires their cross references.
 */

import type { BoostParams, Clock } from "@epochlock/weights";
import { BoostCalculator } from "./contracts/boost-calculator.js";
import { CoreOwner } from "./contracts/core-owner.js";
import { DelegatedOps } from "./contracts/delegated-ops.js";
import { EmissionSchedule, type PctScheduleEntry } from "./contracts/emission-schedule.js";
import { GovToken } from "./contracts/gov-token.js";
import { IncentiveVoting } from "./contracts/incentive-voting.js";
import { TokenLocker } from "./contracts/token-locker.js";
import { LOCKER_ACCOUNT, VAULT_ACCOUNT, type Account } from "./contracts/types.js";
import { Vault } from "./contracts/vault.js";
import { EventLog } from "./event-log/writer.js";
import { Transactor } from "./runtime/transactor.js";

export interface DeployOptions {
  owner: Account;
  feeReceiver: Account;
  epochLength: number;
  startOffset: number;
  ownershipTransferDelay: number;
  lockToTokenRatio: bigint;
  tokenTotalSupply: bigint;
  penaltyWithdrawalsEnabled: boolean;
  initialLockEpochs: number;
  lockEpochsDecayRate: number;
  fixedInitialAmounts: readonly bigint[];
  initialAllowances?: ReadonlyArray<{ receiver: Account; amount: bigint }>;
  initialEpochPct: number;
  epochPctSchedule: readonly PctScheduleEntry[];
  boostGraceEpochs: number;
  boost: BoostParams;
  clock?: Clock;
}

export interface Protocol {
  tx: Transactor;
  events: EventLog;
  core: CoreOwner;
  token: GovToken;
  locker: TokenLocker;
  delegates: DelegatedOps;
  voter: IncentiveVoting;
  boost: BoostCalculator;
  schedule: EmissionSchedule;
  vault: Vault;
}

export function deployProtocol(options: DeployOptions): Protocol {
  const tx = new Transactor();
  const core = new CoreOwner(
    {
      owner: options.owner,
      feeReceiver: options.feeReceiver,
      epochLength: options.epochLength,
      startOffset: options.startOffset,
      ownershipTransferDelay: options.ownershipTransferDelay,
      clock: options.clock,
    },
    tx,
  );
  const events = new EventLog(core.epochClock, tx);
  core.attachEventLog(events);

  const token = new GovToken(VAULT_ACCOUNT, LOCKER_ACCOUNT, options.tokenTotalSupply, tx);
  const locker = new TokenLocker(
    core,
    token,
    {
      lockToTokenRatio: options.lockToTokenRatio,
      penaltyWithdrawalsEnabled: options.penaltyWithdrawalsEnabled,
    },
    tx,
    events,
  );
  const delegates = new DelegatedOps(tx);
  const voter = new IncentiveVoting(core, locker, delegates, VAULT_ACCOUNT, tx, events);
  locker.connectVoter(voter);

  const boost = new BoostCalculator(
    core,
    locker,
    { ...options.boost, graceEpochs: options.boostGraceEpochs },
    tx,
  );
  const schedule = new EmissionSchedule(
    core,
    voter,
    VAULT_ACCOUNT,
    {
      initialEpochPct: options.initialEpochPct,
      schedule: options.epochPctSchedule,
      lockEpochs: options.initialLockEpochs,
      lockDecayEpochs: options.lockEpochsDecayRate,
    },
    tx,
    events,
  );
  const vault = new Vault(
    core,
    token,
    locker,
    voter,
    schedule,
    boost,
    { fixedInitialAmounts: options.fixedInitialAmounts, initialAllowances: options.initialAllowances },
    tx,
    events,
  );

  return { tx, events, core, token, locker, delegates, voter, boost, schedule, vault };
}
