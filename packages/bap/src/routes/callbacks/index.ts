import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { BecknCallbackAction, OndcErrorCode, ack, nack } from "@fis-bap/shared";
import type { IngestRejectionReason } from "../../services/callback-ingestor.js";

const BECKN_CALLBACKS = Object.values(BecknCallbackAction);

const REJECTION: Record<IngestRejectionReason, { statusCode: number; code: OndcErrorCode }> = {
  "missing-context": { statusCode: 400, code: OndcErrorCode.INVALID_REQUEST },
  "action-mismatch": { statusCode: 400, code: OndcErrorCode.INVALID_CONTEXT_ACTION },
  "bad-timestamp": { statusCode: 400, code: OndcErrorCode.INVALID_CONTEXT_TIMESTAMP },
  "unknown-transaction": { statusCode: 404, code: OndcErrorCode.ORDER_NOT_FOUND },
};

/**
 * Register the seller callback routes, POST /on_{action}.
 *
 * Stored and redelivered callbacks are both ACKed. A rejected callback is
 * NACKed with its reason and nothing is stored; a storage failure reaches
 * the error handler as a 500.
 */
export const registerCallbackRoutes: FastifyPluginAsync = async (
  fastify: FastifyInstance,
): Promise<void> => {
  for (const callbackAction of BECKN_CALLBACKS) {
    fastify.post(`/${callbackAction}`, async (request, reply) => {
      const outcome = await fastify.ingestor.ingest(callbackAction, request.body);

      if (outcome.status === "rejected") {
        const { statusCode, code } = REJECTION[outcome.reason];
        return reply.code(statusCode).send(nack(code, outcome.errors.join("; ")));
      }

      return reply.code(200).send(ack());
    });
  }
};
