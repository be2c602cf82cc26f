/**
 * Governor server — HTTP surface over an in-process protocol deployment.
 *
 * Routes:
 *   GET  /health, /epoch
 *   POST /locks/*                 — lock lifecycle (routes/locks.ts)
 *   POST /votes/*, /delegates     — incentive votes (routes/votes.ts)
 *   GET  /accounts/:account/*     — per-account views
 *   GET  /events                  — hash-chained audit log
 *
 * Caller identity comes from the `x-account` header. This is a dev node:
 * requests are not signed.
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import { config } from "./config.js";
import { loggerOptions } from "./logger.js";
import { deployProtocol, type DeployOptions, type Protocol } from "./protocol.js";
import { registerErrorHandler } from "./routes/context.js";
import { healthRoutes } from "./routes/health.js";
import { lockRoutes } from "./routes/locks.js";
import { voteRoutes } from "./routes/votes.js";
import { boostRoutes } from "./routes/boost.js";
import { eventRoutes } from "./routes/events.js";

export interface GovernorDeps {
  /** Prebuilt deployment (tests). Default: deployProtocol(deployOptionsFromConfig()). */
  protocol?: Protocol;
  /** false silences request logging. Default: true. */
  logger?: boolean;
}

export function deployOptionsFromConfig(): DeployOptions {
  return {
    owner: config.owner,
    feeReceiver: config.feeReceiver,
    epochLength: config.epochLengthSecs,
    startOffset: config.startOffsetSecs,
    ownershipTransferDelay: config.ownershipTransferDelaySecs,
    lockToTokenRatio: config.lockToTokenRatio,
    tokenTotalSupply: config.tokenTotalSupply,
    penaltyWithdrawalsEnabled: config.penaltyWithdrawalsEnabled,
    initialLockEpochs: config.initialLockEpochs,
    lockEpochsDecayRate: config.lockEpochsDecayRate,
    fixedInitialAmounts: config.fixedInitialAmounts,
    initialEpochPct: config.initialEpochPct,
    epochPctSchedule: config.epochPctSchedule,
    boostGraceEpochs: config.boostGraceEpochs,
    boost: {
      maxBoostMultiplier: BigInt(config.maxBoostMultiplier),
      maxBoostablePct: BigInt(config.maxBoostablePct),
      decayBoostPct: BigInt(config.decayBoostPct),
    },
  };
}

export function buildApp(deps?: GovernorDeps) {
  const protocol = deps?.protocol ?? deployProtocol(deployOptionsFromConfig());
  const app = Fastify({
    logger: deps?.logger === false ? false : loggerOptions(config.logLevel, config.logPretty),
    bodyLimit: 64 * 1024,
  });

  registerErrorHandler(app);

  healthRoutes(app, protocol);
  lockRoutes(app, protocol);
  voteRoutes(app, protocol);
  boostRoutes(app, protocol);
  eventRoutes(app, protocol);

  return { app, protocol };
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── governor config ───");
  console.log(`  port:              ${config.port}`);
  console.log(`  epoch_length:      ${config.epochLengthSecs}s`);
  console.log(`  start_offset:      ${config.startOffsetSecs}s`);
  console.log(`  owner:             ${config.owner}`);
  console.log(`  fee_receiver:      ${config.feeReceiver}`);
  console.log(`  lock_epochs:       ${config.initialLockEpochs} (−1 every ${config.lockEpochsDecayRate})`);
  console.log(`  boost_grace:       ${config.boostGraceEpochs} epochs`);
  console.log(`  epoch_keeper:      ${config.epochKeeperIntervalMs > 0 ? `${config.epochKeeperIntervalMs}ms` : "disabled"}`);
  console.log("────────────────────────");

  const { app, protocol } = buildApp();

  // Start epoch keeper BEFORE listen (Fastify 5 forbids addHook after listen)
  if (config.epochKeeperIntervalMs > 0) {
    const { createEpochKeeper } = await import("./scheduler.js");
    const keeper = createEpochKeeper(protocol, {
      checkIntervalMs: config.epochKeeperIntervalMs,
      onAdvance: (result) => {
        app.log.info(
          {
            epoch: result.epoch,
            lockWeight: result.totalLockWeight,
            voteWeight: result.totalVoteWeight,
            emissions: String(result.epochEmissions),
          },
          "epoch caught up by keeper",
        );
      },
      onError: (err) => {
        app.log.error({ err }, "keeper error");
      },
    });

    app.addHook("onClose", async () => {
      keeper.stop();
    });

    keeper.start();
    app.log.info({ intervalMs: config.epochKeeperIntervalMs }, "epoch keeper started");
  }

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
