import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { ValidationError, createLogger } from "@fis-bap/shared";
import type { CompleteFlowInput } from "../../services/orchestrator.js";
import { RequestBody } from "../input.js";

const logger = createLogger("bap-flow-routes");

function completeFlowInput(body: RequestBody, ip: string): CompleteFlowInput {
  body.requireFields(["bpp_id", "bpp_uri", "amount", "pan", "phone", "payment_mode"]);
  const bank = body.bank();
  if (bank === undefined) {
    throw new ValidationError("ifsc, account_number and account_name are required for purchases.");
  }
  return {
    transaction_id: body.optional("transaction_id"),
    bpp_id: body.required("bpp_id"),
    bpp_uri: body.required("bpp_uri"),
    kind: body.kind(),
    amount: body.required("amount"),
    pan: body.required("pan"),
    provider_id: body.optional("provider_id"),
    item_id: body.optional("item_id"),
    isin: body.optional("isin"),
    cadence: body.cadence(),
    form_data: body.object("form_data"),
    ip,
    phone: body.required("phone"),
    bank,
    payment_mode: body.required("payment_mode"),
  };
}

/**
 * POST /flows/complete: search through confirm in one call.
 *
 * The run waits on each callback in turn and is abandoned when the caller
 * disconnects.
 */
export const registerFlowRoutes: FastifyPluginAsync = async (
  fastify: FastifyInstance,
): Promise<void> => {
  fastify.post("/flows/complete", async (request, reply) => {
    const input = completeFlowInput(RequestBody.of(request.body), request.ip);

    const controller = new AbortController();
    const onClose = (): void => {
      if (!reply.raw.writableEnded) {
        logger.warn({ transactionId: input.transaction_id }, "Caller disconnected; abandoning flow");
        controller.abort(new Error("Caller disconnected"));
      }
    };
    reply.raw.on("close", onClose);

    try {
      const result = await fastify.orchestrator.run(input, controller.signal);
      return reply.code(200).send(result);
    } finally {
      reply.raw.off("close", onClose);
    }
  });
};
