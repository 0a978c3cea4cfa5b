import { Type, type Static } from "@sinclair/typebox";

/** One test stream run against the orchestrator from a given region */
export const TestStreamRun = Type.Object({
  /** Unix time in seconds */
  timestamp: Type.Number(),
  success_rate: Type.Number(),
  /** Seconds */
  round_trip_time: Type.Number(),
  segments_sent: Type.Number(),
  segments_received: Type.Number(),
  errors: Type.Optional(Type.Array(Type.Unknown())),
});

export type TestStreamRun = Static<typeof TestStreamRun>;

/** Runs keyed by region */
export const TestStreamsResponse = Type.Record(Type.String(), Type.Array(TestStreamRun));

export type TestStreamsResponse = Static<typeof TestStreamsResponse>;
