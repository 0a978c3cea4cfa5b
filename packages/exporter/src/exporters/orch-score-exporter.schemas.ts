import { Type, type Static } from "@sinclair/typebox";
import { Amount } from "./common.schemas.js";

const PerRegion = Type.Record(Type.String(), Type.Number());

export const ScoreResponse = Type.Object({
  pricePerPixel: Amount,
  /** Overall score per region, 0–1 */
  scores: PerRegion,
  /** Test stream success rate per region, 0–1 */
  successRates: PerRegion,
  /** Round trip score per region, 0–1 */
  roundTripScores: PerRegion,
});

export type ScoreResponse = Static<typeof ScoreResponse>;
