import { Type, type Static } from "@sinclair/typebox";
import { Amount } from "./common.schemas.js";

/** A winning ticket redeemed by the orchestrator */
export const TicketEvent = Type.Object({
  transactionHash: Type.String(),
  /** Unix time in seconds */
  blockTime: Amount,
  /** ETH */
  faceValue: Amount,
});

export type TicketEvent = Static<typeof TicketEvent>;

export const TicketsResponse = Type.Array(TicketEvent);

export type TicketsResponse = Static<typeof TicketsResponse>;
