import type { Tag } from "./types.js";

export const DEFAULT_BAP_TERMS_URL =
  "https://buyerapp.com/legal/ondc:fis14/static_terms?v=0.1";
export const DEFAULT_BPP_TERMS_URL =
  "https://sellerapp.com/legal/ondc:fis14/static_terms?v=0.1";

function termsTag(name: string, code: string, staticTermsUrl: string): Tag {
  return {
    display: false,
    descriptor: { name, code },
    list: [
      {
        descriptor: { name: "Static Terms (Transaction Level)", code: "STATIC_TERMS" },
        value: staticTermsUrl,
      },
      {
        descriptor: { name: "Offline Contract", code: "OFFLINE_CONTRACT" },
        value: "true",
      },
    ],
  };
}

export function bapTermsTag(staticTermsUrl: string = DEFAULT_BAP_TERMS_URL): Tag {
  return termsTag("BAP Terms of Engagement", "BAP_TERMS", staticTermsUrl);
}

export function bppTermsTag(staticTermsUrl: string = DEFAULT_BPP_TERMS_URL): Tag {
  return termsTag("BPP Terms of Engagement", "BPP_TERMS", staticTermsUrl);
}
