/** Identifies one of the sub-exporters; also keys per-exporter settings */
export type SubExporterName =
  | "info"
  | "score"
  | "delegators"
  | "testStreams"
  | "tickets";

/**
 * Contract shared by every sub-exporter.
 *
 * A sub-exporter owns two loops: a fetch loop that refreshes its snapshot
 * from upstream, and an update loop that writes that snapshot into gauges.
 */
export interface ISubExporter<TSnapshot> {
  readonly name: SubExporterName;

  /** Start both loops (non-blocking) */
  start(): void;

  /** Cancel both loops */
  stop(): void;

  /** Whether the loops are scheduled */
  readonly isRunning: boolean;

  /** Latest published snapshot, or null before the first successful fetch */
  readonly snapshot: TSnapshot | null;

  /** Run one fetch tick. Resolves false (never rejects) when the fetch failed */
  fetch(): Promise<boolean>;

  /** Run one update tick. Returns false when there was nothing to publish */
  update(): boolean;
}
