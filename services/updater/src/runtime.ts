import type { Logger } from "pino";
import { ComposeConfigClient } from "./configApi/composeConfigClient.js";
import { REMOVE_GRACE_MS, REMOVE_RETRY_ATTEMPTS, REMOVE_RETRY_DELAY_MS, STOP_SETTLE_MS } from "./config/constants.js";
import type { EnvConfig } from "./config/env.js";
import { envelopeEncryptor } from "./crypto/envelope.js";
import { FilePlatformConfigStore } from "./platformConfig/platformConfigStore.js";
import { ReconcileLoop } from "./reconciler/reconcileLoop.js";
import { Reconciler, type ReconcilerState } from "./reconciler/reconciler.js";
import { createLogger } from "./telemetry/logger.js";
import { initOtel, shutdownOtel } from "./telemetry/otel.js";
import type { Sleep } from "./types/interfaces.js";
import { realSleep } from "./vmmClient/retryPolicy.js";
import type { FetchFn } from "./vmmClient/rpcTransport.js";
import { PrpcVmmClient } from "./vmmClient/vmmClient.js";

export interface UpdaterOverrides {
  fetchFn?: FetchFn;
  sleep?: Sleep;
  initialState?: ReconcilerState;
}

export function buildUpdater(env: EnvConfig, logger: Logger, overrides: UpdaterOverrides = {}): ReconcileLoop {
  const sleep = overrides.sleep ?? realSleep;
  const vmm = new PrpcVmmClient({
    baseUrl: env.vmmUrl,
    timeoutMs: env.httpTimeoutMs,
    fetchFn: overrides.fetchFn,
    logger: logger.child({ component: "vmm" })
  });
  const configSource = new ComposeConfigClient({
    url: env.configApiUrl,
    timeoutMs: env.httpTimeoutMs,
    managedVmName: env.managedVmName,
    fetchFn: overrides.fetchFn,
    logger: logger.child({ component: "config-api" })
  });

  const reconciler = new Reconciler(
    {
      configSource,
      platformConfig: new FilePlatformConfigStore(env.platformConfigPath),
      vmm,
      encryptor: envelopeEncryptor,
      sleep,
      logger: logger.child({ component: "reconciler" })
    },
    {
      managedVmName: env.managedVmName,
      verifyComposeHash: env.verifyComposeHash,
      timings: {
        stopTimeoutMs: env.stopTimeoutMs,
        stopSettleMs: STOP_SETTLE_MS,
        removeGraceMs: REMOVE_GRACE_MS,
        removeRetry: { attempts: REMOVE_RETRY_ATTEMPTS, delayMs: REMOVE_RETRY_DELAY_MS }
      }
    }
  );

  return new ReconcileLoop(reconciler, { pollIntervalMs: env.pollIntervalMs, sleep, logger }, overrides.initialState);
}

export async function runUpdater(env: EnvConfig): Promise<void> {
  await initOtel(env.otel);
  const logger = createLogger({ level: env.logLevel });
  logger.info({ vmmUrl: env.vmmUrl, configApiUrl: env.configApiUrl, pollIntervalMs: env.pollIntervalMs }, "Connecting to VMM");

  const loop = buildUpdater(env, logger);
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutdown requested, finishing current cycle");
    controller.abort();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await loop.run(controller.signal);
  } finally {
    await shutdownOtel();
  }
}
