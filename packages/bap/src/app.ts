import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { becknErrorHandler } from "@fis-bap/shared";
import type { BapConfig } from "./config.js";
import type { CallbackIngestor } from "./services/callback-ingestor.js";
import type { FlowService } from "./services/flow-service.js";
import type { MessageStore } from "./services/message-store.js";
import type { FlowOrchestrator } from "./services/orchestrator.js";
import { healthRoute } from "./routes/health.js";
import { registerActionRoutes } from "./routes/actions/index.js";
import { registerCallbackRoutes } from "./routes/callbacks/index.js";
import { registerDataRoutes } from "./routes/data/index.js";
import { registerFlowRoutes } from "./routes/flows/index.js";

// ---------------------------------------------------------------------------
// Extend Fastify instance with shared dependencies
// ---------------------------------------------------------------------------

declare module "fastify" {
  interface FastifyInstance {
    config: BapConfig;
    store: MessageStore;
    flows: FlowService;
    ingestor: CallbackIngestor;
    orchestrator: FlowOrchestrator;
  }
}

export interface AppDependencies {
  config: BapConfig;
  store: MessageStore;
  flows: FlowService;
  ingestor: CallbackIngestor;
  orchestrator: FlowOrchestrator;
}

/**
 * Assemble the adapter's HTTP surface over already-built services. The
 * server entry point wires real ones; tests wire in-process stand-ins.
 */
export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false, // we use our own pino logger
    trustProxy: true,
  });

  await fastify.register(cors, { origin: true });

  fastify.decorate("config", deps.config);
  fastify.decorate("store", deps.store);
  fastify.decorate("flows", deps.flows);
  fastify.decorate("ingestor", deps.ingestor);
  fastify.decorate("orchestrator", deps.orchestrator);

  fastify.setErrorHandler(becknErrorHandler);

  await fastify.register(healthRoute);
  await fastify.register(registerActionRoutes);
  await fastify.register(registerCallbackRoutes);
  await fastify.register(registerDataRoutes);
  await fastify.register(registerFlowRoutes);

  return fastify;
}

export { loadBapConfig, synthesisEnvFrom } from "./config.js";
export type { BapConfig } from "./config.js";
