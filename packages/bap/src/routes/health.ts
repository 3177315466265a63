import type { FastifyInstance, FastifyPluginAsync } from "fastify";

/**
 * Liveness for the buyer adapter: service name, subscriber id, uptime and
 * timestamp.
 */
export const healthRoute: FastifyPluginAsync = async (
  fastify: FastifyInstance,
): Promise<void> => {
  fastify.get("/health", async (_request, _reply) => {
    return {
      status: "ok",
      service: "fis-bap",
      subscriber_id: fastify.config.bapId,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    };
  });
};
