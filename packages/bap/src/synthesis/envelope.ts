import {
  buildContext,
  type BecknAction,
  type BecknRequest,
  type OutboundMessage,
} from "@fis-bap/shared";

/** Identity and clock every synthesizer builds from. */
export interface SynthesisEnv {
  bapId: string;
  bapUri: string;
  /** Distributor registration quoted as the agent organization's cred. */
  arn: string;
  /** Employee code quoted as the agent person. */
  euin: string;
  bapTermsUrl: string;
  bppTermsUrl: string;
  now: () => Date;
  newMessageId: () => string;
}

/** Where a request goes and which exchange it belongs to. */
export interface SellerTarget {
  transaction_id: string;
  bpp_id: string;
  bpp_uri: string;
  /** Generated when omitted. */
  message_id?: string;
}

export function envelope<M extends OutboundMessage>(
  env: SynthesisEnv,
  action: BecknAction,
  target: { transaction_id: string; message_id?: string; bpp_id?: string; bpp_uri?: string },
  message: M,
): BecknRequest<M> {
  return {
    context: buildContext({
      action,
      bap_id: env.bapId,
      bap_uri: env.bapUri,
      transaction_id: target.transaction_id,
      bpp_id: target.bpp_id,
      bpp_uri: target.bpp_uri,
      message_id: target.message_id ?? env.newMessageId(),
      timestamp: env.now(),
    }),
    message,
  };
}
