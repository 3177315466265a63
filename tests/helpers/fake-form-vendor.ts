import type {
  FormSubmission,
  FormVendor,
} from "../../packages/bap/src/services/form-vendor.js";

/** Records submissions and answers with a fixed submission id. */
export class FakeFormVendor implements FormVendor {
  readonly submissions: { url: string; formData: Record<string, unknown> }[] = [];

  constructor(private readonly submissionId = "SUB-1") {}

  async submit(url: string, formData: Record<string, unknown>): Promise<FormSubmission> {
    this.submissions.push({ url, formData });
    return { submissionId: this.submissionId };
  }
}
