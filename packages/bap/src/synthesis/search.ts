import {
  BecknAction,
  bapTermsTag,
  type BecknRequest,
  type SearchMessage,
} from "@fis-bap/shared";
import { envelope, type SynthesisEnv } from "./envelope.js";

export interface SearchInput {
  transaction_id: string;
  message_id?: string;
}

/** Broadcast catalog search for mutual funds through the gateway. */
export function synthesizeSearch(
  input: SearchInput,
  env: SynthesisEnv,
): BecknRequest<SearchMessage> {
  return envelope(env, BecknAction.search, input, {
    intent: {
      category: { descriptor: { code: "MUTUAL_FUNDS" } },
      fulfillment: {
        agent: { organization: { creds: [{ id: env.arn, type: "ARN" }] } },
      },
      tags: [bapTermsTag(env.bapTermsUrl)],
    },
  });
}
