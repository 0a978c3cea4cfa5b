export type {
  SubExporterName,
  ISubExporter,
} from "./types/exporter.js";
export type {
  OrchInfoSnapshot,
  RegionScore,
  OrchScoreSnapshot,
  DelegatorInfo,
  OrchDelegatorsSnapshot,
  TestStreamResult,
  OrchTestStreamsSnapshot,
  WinningTicket,
  OrchTicketsSnapshot,
} from "./types/orchestrator.js";
