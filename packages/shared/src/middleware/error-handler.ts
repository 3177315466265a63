import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { createLogger } from "../utils/logger.js";
import { BapError, UpstreamTransportFailure } from "../protocol/errors.js";
import { OndcErrorCode } from "../protocol/error-codes.js";
import { nack } from "../protocol/ack.js";

const logger = createLogger("beckn-error-handler");

const GENERIC_SERVER_MESSAGE = "Internal server error. Please try again later.";

/**
 * Fallback mapping for errors raised by Fastify itself (body parsing,
 * schema validation, unknown routes).
 */
function codeForStatus(statusCode: number): OndcErrorCode {
  if (statusCode === 404) return OndcErrorCode.ORDER_NOT_FOUND;
  if (statusCode >= 400 && statusCode < 500) return OndcErrorCode.INVALID_REQUEST;
  return OndcErrorCode.TECHNICAL_ERROR;
}

/**
 * Error handler shared by every route.
 *
 *   - adapter errors map to their own status and NACK code
 *   - an upstream failure replays the upstream status and body as
 *     `{status_code, response}`
 *   - anything else is a 500 with a generic message; the full error is logged
 *
 * Usage:
 *   fastify.setErrorHandler(becknErrorHandler);
 */
export function becknErrorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  if (error instanceof UpstreamTransportFailure) {
    logger.warn(
      { url: request.url, upstreamStatus: error.upstreamStatus },
      "Upstream call failed",
    );
    reply.code(error.upstreamStatus).send({
      status_code: error.upstreamStatus,
      response: error.upstreamBody,
    });
    return;
  }

  if (error instanceof BapError) {
    const context = {
      err: error,
      url: request.url,
      method: request.method,
      statusCode: error.statusCode,
    };
    if (error.statusCode >= 500) {
      logger.error(context, "Request failed");
      reply.code(error.statusCode).send(nack(error.errorCode, GENERIC_SERVER_MESSAGE));
      return;
    }
    logger.warn(context, "Request rejected");
    reply.code(error.statusCode).send(error.toNack());
    return;
  }

  const statusCode = error.statusCode ?? 500;

  logger.error(
    {
      err: error,
      url: request.url,
      method: request.method,
      statusCode,
    },
    "Unhandled request error",
  );

  const message =
    statusCode >= 500
      ? GENERIC_SERVER_MESSAGE
      : error.message || "An error occurred processing the request.";

  reply.code(statusCode).send(nack(codeForStatus(statusCode), message));
}
