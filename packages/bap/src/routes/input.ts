import { ValidationError, isRecord } from "@fis-bap/shared";
import {
  parseFlowKind,
  type BankDetails,
  type CadenceInput,
  type FlowKind,
  type SellerTarget,
} from "../synthesis/index.js";

/**
 * Readers for caller request bodies. Each one throws a ValidationError
 * naming the offending field, so a bad request never reaches correlation.
 */
export class RequestBody {
  private constructor(private readonly fields: Record<string, unknown>) {}

  static of(body: unknown): RequestBody {
    if (body === undefined || body === null) return new RequestBody({});
    if (!isRecord(body)) {
      throw new ValidationError("Request body must be a JSON object.");
    }
    return new RequestBody(body);
  }

  has(field: string): boolean {
    const value = this.fields[field];
    return value !== undefined && value !== null && value !== "";
  }

  /** Strings and finite numbers, as a string; undefined when absent. */
  optional(field: string): string | undefined {
    const value = this.fields[field];
    if (value === undefined || value === null || value === "") return undefined;
    if (typeof value === "string") return value;
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    throw new ValidationError(`${field} must be a string.`);
  }

  required(field: string): string {
    const value = this.optional(field);
    if (value === undefined) {
      throw new ValidationError(`${field} is required.`);
    }
    return value;
  }

  /** Throws one ValidationError listing every missing field. */
  requireFields(fields: readonly string[]): void {
    const missing = fields.filter((field) => !this.has(field));
    if (missing.length > 0) {
      throw new ValidationError(`Missing required fields: ${missing.join(", ")}.`);
    }
  }

  integer(field: string): number | undefined {
    const value = this.fields[field];
    if (value === undefined || value === null || value === "") return undefined;
    const parsed = typeof value === "number" ? value : Number(value);
    if (!Number.isInteger(parsed)) {
      throw new ValidationError(`${field} must be an integer.`);
    }
    return parsed;
  }

  object(field: string): Record<string, unknown> | undefined {
    const value = this.fields[field];
    if (value === undefined || value === null) return undefined;
    if (!isRecord(value)) {
      throw new ValidationError(`${field} must be an object.`);
    }
    return value;
  }

  kind(): FlowKind {
    return parseFlowKind(this.fields["kind"]);
  }

  sellerTarget(): SellerTarget {
    this.requireFields(["transaction_id", "bpp_id", "bpp_uri"]);
    return {
      transaction_id: this.required("transaction_id"),
      bpp_id: this.required("bpp_id"),
      bpp_uri: this.required("bpp_uri"),
      message_id: this.optional("message_id"),
    };
  }

  /** SIP schedule; undefined when the caller sent none of its fields. */
  cadence(): CadenceInput | undefined {
    if (!this.has("frequency") && !this.has("repeat") && !this.has("day_number")) {
      return undefined;
    }
    const frequency = this.optional("frequency");
    const repeat = this.integer("repeat");
    const dayNumber = this.integer("day_number");
    if (frequency === undefined || repeat === undefined || dayNumber === undefined) {
      throw new ValidationError("frequency, repeat and day_number are required for SIP.");
    }
    return { frequency, repeat, day_number: dayNumber };
  }

  /** Investor bank account; undefined when the caller sent none of it. */
  bank(): BankDetails | undefined {
    if (!this.has("ifsc") && !this.has("account_number") && !this.has("account_name")) {
      return undefined;
    }
    this.requireFields(["ifsc", "account_number", "account_name"]);
    return {
      ifsc: this.required("ifsc"),
      account_number: this.required("account_number"),
      account_name: this.required("account_name"),
    };
  }
}
