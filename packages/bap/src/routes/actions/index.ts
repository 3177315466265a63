import { randomUUID } from "node:crypto";
import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { ValidationError, createLogger } from "@fis-bap/shared";
import type { ActionResult, KycStep } from "../../services/flow-service.js";
import { RequestBody } from "../input.js";

const logger = createLogger("bap-actions");

const KYC_STEPS: readonly KycStep[] = ["digilocker", "esign"];

/**
 * Register the caller-facing action routes.
 *
 * Each route reads the caller's fields, then hands them to the flow
 * service, which correlates against the stored callbacks, builds the
 * signed request and sends it. The reply carries the peer's status:
 *
 *   { transaction_id, message_id, status_code, response }
 *
 * The caller's address (first X-Forwarded-For hop behind a proxy) is
 * quoted to the seller as the investor's IP on init and cancel.
 */
export const registerActionRoutes: FastifyPluginAsync = async (
  fastify: FastifyInstance,
): Promise<void> => {
  const { flows } = fastify;

  const respond = (action: string, result: ActionResult) => {
    logger.info(
      {
        action,
        transactionId: result.transaction_id,
        messageId: result.message_id,
        statusCode: result.status_code,
      },
      "Action dispatched",
    );
    return result;
  };

  fastify.post("/search", async (request, reply) => {
    const body = RequestBody.of(request.body);
    const result = await flows.search({
      transaction_id: body.optional("transaction_id") ?? randomUUID(),
      message_id: body.optional("message_id"),
    });
    return reply.code(result.status_code).send(respond("search", result));
  });

  fastify.post("/select", async (request, reply) => {
    const body = RequestBody.of(request.body);
    const target = body.sellerTarget();
    const result = await flows.select({
      ...target,
      kind: body.kind(),
      amount: body.required("amount"),
      pan: body.required("pan"),
      provider_id: body.optional("provider_id"),
      item_id: body.optional("item_id"),
      isin: body.optional("isin"),
      folio: body.optional("folio"),
      cadence: body.cadence(),
    });
    return reply.code(result.status_code).send(respond("select", result));
  });

  fastify.post("/form-submission", async (request, reply) => {
    const body = RequestBody.of(request.body);
    const target = body.sellerTarget();
    const formData = body.object("form_data");
    if (formData === undefined) {
      throw new ValidationError("form_data is required.");
    }
    const result = await flows.submitForm({
      ...target,
      message_id_select: body.optional("message_id_select"),
      form_data: formData,
    });
    return reply.code(result.status_code).send(respond("form-submission", result));
  });

  for (const step of KYC_STEPS) {
    fastify.post(`/kyc/${step}`, async (request, reply) => {
      const body = RequestBody.of(request.body);
      const result = await flows.kycFollowUp(step, {
        ...body.sellerTarget(),
        submission_id: body.optional("submission_id"),
      });
      return reply.code(result.status_code).send(respond(`kyc-${step}`, result));
    });
  }

  fastify.post("/init", async (request, reply) => {
    const body = RequestBody.of(request.body);
    const target = body.sellerTarget();
    const result = await flows.init({
      ...target,
      kind: body.kind(),
      message_id_select: body.optional("message_id_select"),
      ip: request.ip,
      phone: body.required("phone"),
      folio: body.optional("folio"),
      bank: body.bank(),
      payment_mode: body.optional("payment_mode"),
    });
    return reply.code(result.status_code).send(respond("init", result));
  });

  fastify.post("/confirm", async (request, reply) => {
    const body = RequestBody.of(request.body);
    const target = body.sellerTarget();
    const result = await flows.confirm({
      ...target,
      kind: body.kind(),
      message_id_init: body.optional("message_id_init"),
    });
    return reply.code(result.status_code).send(respond("confirm", result));
  });

  fastify.post("/status", async (request, reply) => {
    const body = RequestBody.of(request.body);
    const result = await flows.status({
      ...body.sellerTarget(),
      order_id: body.optional("order_id"),
    });
    return reply.code(result.status_code).send(respond("status", result));
  });

  fastify.post("/cancel", async (request, reply) => {
    const body = RequestBody.of(request.body);
    const result = await flows.cancel({
      ...body.sellerTarget(),
      order_id: body.optional("order_id"),
      ip: request.ip,
    });
    return reply.code(result.status_code).send(respond("cancel", result));
  });

  fastify.post("/update", async (request, reply) => {
    const body = RequestBody.of(request.body);
    const result = await flows.update({
      ...body.sellerTarget(),
      order_id: body.optional("order_id"),
    });
    return reply.code(result.status_code).send(respond("update", result));
  });
};
