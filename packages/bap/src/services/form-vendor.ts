import {
  MalformedUpstreamPayload,
  UpstreamTransportFailure,
  createLogger,
  isRecord,
} from "@fis-bap/shared";
import { safeJson, type Transport } from "./transport.js";

const logger = createLogger("bap-form-vendor");

export interface FormSubmission {
  submissionId: string;
}

/** The KYC vendor behind the `xinput.form.url` a seller hands out. */
export interface FormVendor {
  submit(url: string, formData: Record<string, unknown>): Promise<FormSubmission>;
}

/**
 * Post the investor's form data as JSON and read back the vendor's
 * `submission_id`. Only a 200 counts as accepted.
 */
export function createHttpFormVendor(transport: Transport): FormVendor {
  return {
    async submit(url, formData) {
      let statusCode: number;
      let text: string;
      try {
        ({ statusCode, text } = await transport.post(url, JSON.stringify(formData), {
          "Content-Type": "application/json",
        }));
      } catch (err) {
        logger.error({ err, url }, "Failed to reach form vendor");
        throw new UpstreamTransportFailure(502, { error: `Could not reach ${url}` }, { cause: err });
      }

      const body = safeJson(text);
      if (statusCode !== 200) {
        logger.warn({ url, statusCode }, "Form vendor rejected submission");
        throw new UpstreamTransportFailure(statusCode, body);
      }

      const submissionId = isRecord(body) ? body["submission_id"] : undefined;
      if (typeof submissionId !== "string" || submissionId === "") {
        throw new MalformedUpstreamPayload("submission_id", "form submission");
      }

      logger.info({ url, submissionId }, "Form submitted");
      return { submissionId };
    },
  };
}
