import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { CorrelationMiss, ValidationError, callbackStageEnum } from "@fis-bap/shared";
import { RequestBody } from "../input.js";

/**
 * Read-only views over stored callbacks, for callers polling the progress
 * of an exchange.
 *
 *   GET /data/:stage?transaction_id&message_id   one callback body
 *   GET /data/on_search/all?transaction_id       every seller's catalog
 *   GET /data/on_status/by-pan?pan               latest status for an investor
 *   GET /transactions/:transactionId/state       where the transaction stands
 */
export const registerDataRoutes: FastifyPluginAsync = async (
  fastify: FastifyInstance,
): Promise<void> => {
  const { store } = fastify;

  fastify.get<{ Params: { stage: string } }>("/data/:stage", async (request) => {
    const stage = callbackStageEnum.enumValues.find((name) => name === request.params.stage);
    if (stage === undefined) {
      throw new ValidationError(
        `stage must be one of ${callbackStageEnum.enumValues.join(", ")}.`,
      );
    }
    const query = RequestBody.of(request.query);
    const transactionId = query.required("transaction_id");
    const messageId = query.optional("message_id");

    const record =
      messageId === undefined
        ? await store.findLatest({ stage, transaction_id: transactionId })
        : await store.findExact({ stage, transaction_id: transactionId, message_id: messageId });
    if (record === null) {
      throw new CorrelationMiss(stage, { transaction_id: transactionId, message_id: messageId });
    }
    return record.payload;
  });

  fastify.get("/data/on_search/all", async (request) => {
    const transactionId = RequestBody.of(request.query).required("transaction_id");
    if (!(await store.transactionExists(transactionId))) {
      throw new CorrelationMiss("transaction", { transaction_id: transactionId });
    }
    const records = await store.listStageRecords({
      stage: "on_search",
      transaction_id: transactionId,
    });
    return records.map((record) => ({
      message_id: record.message_id,
      bpp_id: record.bpp_id,
      bpp_uri: record.bpp_uri,
      timestamp: record.timestamp.toISOString(),
      payload: record.payload,
    }));
  });

  fastify.get("/data/on_status/by-pan", async (request) => {
    const pan = RequestBody.of(request.query).required("pan");
    const record = await store.findLatest({ stage: "on_status", pan });
    if (record === null) {
      throw new CorrelationMiss("on_status", { pan });
    }
    return record.payload;
  });

  fastify.get<{ Params: { transactionId: string } }>(
    "/transactions/:transactionId/state",
    async (request) => {
      const { transactionId } = request.params;
      const state = await store.transactionState(transactionId);
      if (state === null) {
        throw new CorrelationMiss("transaction state", { transaction_id: transactionId });
      }
      return { ...state, timestamp: state.timestamp.toISOString() };
    },
  );
};
