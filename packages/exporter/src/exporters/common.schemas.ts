/**
 * Typebox building blocks shared by the upstream payload schemas.
 */

import { Type, type Static } from "@sinclair/typebox";

/**
 * Token amounts, rounds and rates arrive either as JSON numbers or as
 * decimal strings (subgraph BigDecimal / BigInt).
 */
export const Amount = Type.Union([
  Type.Number(),
  Type.String({ pattern: "^-?(\\d+\\.?\\d*|\\.\\d+)([eE][-+]?\\d+)?$" }),
]);

export type Amount = Static<typeof Amount>;

/** Convert a validated Amount to a number */
export function toNumber(amount: Amount): number {
  return typeof amount === "number" ? amount : Number(amount);
}
