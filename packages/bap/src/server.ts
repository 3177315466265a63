import "dotenv/config";
import { createDb, createLogger, createSigner } from "@fis-bap/shared";
import { buildApp } from "./app.js";
import { loadBapConfig, synthesisEnvFrom } from "./config.js";
import { createAnalyticsSink } from "./services/analytics.js";
import { BecknClient } from "./services/beckn-client.js";
import { CallbackIngestor } from "./services/callback-ingestor.js";
import { Correlator } from "./services/correlator.js";
import { DrizzleMessageStore } from "./services/drizzle-message-store.js";
import { FlowService } from "./services/flow-service.js";
import { createHttpFormVendor } from "./services/form-vendor.js";
import { FlowOrchestrator } from "./services/orchestrator.js";
import { createUndiciTransport } from "./services/transport.js";

const logger = createLogger("bap");

const ANALYTICS_TIMEOUT_MS = 5_000;
const OUTBOUND_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const config = loadBapConfig();

  // --- PostgreSQL ---
  const { db, pool } = createDb(config.databaseUrl);
  const store = new DrizzleMessageStore(db);

  // --- Outbound ---
  const transport = createUndiciTransport({ timeoutMs: OUTBOUND_TIMEOUT_MS });
  const analytics = createAnalyticsSink(
    config.analyticsUrl,
    config.analyticsToken,
    createUndiciTransport({ timeoutMs: ANALYTICS_TIMEOUT_MS }),
  );
  const client = new BecknClient({
    signer: createSigner({
      subscriberId: config.bapId,
      uniqueKeyId: config.uniqueKeyId,
      privateKey: config.privateKey,
    }),
    transport,
    gatewayUrl: config.gatewayUrl,
    gatewaySubscriberId: config.gatewaySubscriberId,
    signedUniqueReqId: config.signedUniqueReqId,
    analytics,
  });

  // --- Flows ---
  const flows = new FlowService({
    store,
    correlator: new Correlator(store),
    client,
    formVendor: createHttpFormVendor(transport),
    env: synthesisEnvFrom(config),
  });
  const orchestrator = new FlowOrchestrator(flows, store, {
    intervalMs: config.callbackPollIntervalMs,
    timeoutMs: config.callbackTimeoutMs,
  });

  const fastify = await buildApp({
    config,
    store,
    flows,
    ingestor: new CallbackIngestor(store, analytics),
    orchestrator,
  });

  // Graceful shutdown: close pool
  fastify.addHook("onClose", async () => {
    await pool.end();
    logger.info("PostgreSQL pool closed");
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down buyer adapter");
    try {
      await fastify.close();
    } catch (err) {
      logger.error({ err }, "Error closing server");
      process.exit(1);
    }
    logger.info("Buyer adapter shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  // --- Start ---
  await fastify.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ bapId: config.bapId }, `FIS14 buyer adapter listening on port ${config.port}`);
}

main().catch((err) => {
  logger.fatal({ err }, "Buyer adapter failed to start");
  process.exit(1);
});
