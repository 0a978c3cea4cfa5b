/**
 * Exporter configuration, read from LIVEPEER_EXPORTER_* environment variables.
 *
 * `loadConfig` is a pure function of the environment map so it can be tested
 * without touching process.env. Any invalid value throws a ConfigError; the
 * caller treats that as fatal.
 */

import type { SubExporterName } from "@livepeer-exporter/shared";
import { ConfigError } from "./errors.js";
import { formatDuration, parseDuration, InvalidDurationError } from "./lib/duration.js";
import { MAX_TIMER_MS } from "./lib/periodic-task.js";
import {
  ADDRESS_PLACEHOLDER,
  DEFAULT_ENDPOINTS,
  expandEndpoint,
  type EndpointName,
  type EndpointTemplates,
} from "./exporters/endpoints.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const ENV_PREFIX = "LIVEPEER_EXPORTER_";

export const FETCH_INTERVAL_DEFAULT_MS = 60_000; // 1 minute
export const TEST_STREAMS_FETCH_INTERVAL_DEFAULT_MS = 15 * 60_000; // 15 minutes
export const UPDATE_INTERVAL_DEFAULT_MS = 30_000; // 30 seconds

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Env var fragment for each sub-exporter's fetch interval override */
const FETCH_INTERVAL_KEYS: Record<SubExporterName, string> = {
  info: "FETCH_INFO_INTERVAL",
  score: "FETCH_SCORE_INTERVAL",
  delegators: "FETCH_DELEGATORS_INTERVAL",
  // Separate default because the test streams API is slow to respond
  testStreams: "FETCH_TEST_STREAMS_INTERVAL",
  tickets: "FETCH_TICKETS_INTERVAL",
};

/** Env var fragment for each endpoint URL template override */
const ENDPOINT_KEYS: Record<EndpointName, string> = {
  orchestrator: "ORCHESTRATOR_URL",
  delegator: "DELEGATOR_URL",
  score: "SCORE_URL",
  testStreams: "TEST_STREAMS_URL",
  tickets: "TICKETS_URL",
};

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Env = Record<string, string | undefined>;

export interface ExporterConfig {
  orchestratorAddress: string;
  /** Its bonded stake is added to the orchestrator's stake; null when unset */
  orchestratorAddressSecondary: string | null;
  /** Default fetch interval in ms */
  fetchIntervalMs: number;
  /** Effective fetch interval in ms for each sub-exporter */
  fetchIntervals: Record<SubExporterName, number>;
  updateIntervalMs: number;
  endpoints: EndpointTemplates;
  logLevel: LogLevel;
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export function loadConfig(env: Env): ExporterConfig {
  const orchestratorAddress = readString(env, "ORCHESTRATOR_ADDRESS");
  if (!orchestratorAddress) {
    throw new ConfigError(
      `${ENV_PREFIX}ORCHESTRATOR_ADDRESS`,
      "environment variable should be set",
    );
  }

  const fetchIntervalMs = readInterval(env, "FETCH_INTERVAL", FETCH_INTERVAL_DEFAULT_MS);

  const intervalFor = (name: SubExporterName, fallback = fetchIntervalMs) =>
    readInterval(env, FETCH_INTERVAL_KEYS[name], fallback);

  const endpointFor = (name: EndpointName): string => {
    const key = ENDPOINT_KEYS[name];
    const template = readString(env, key);
    return template ? checkTemplate(key, template) : DEFAULT_ENDPOINTS[name];
  };

  return {
    orchestratorAddress,
    orchestratorAddressSecondary: readString(env, "ORCHESTRATOR_ADDRESS_SECONDARY") || null,
    fetchIntervalMs,
    fetchIntervals: {
      info: intervalFor("info"),
      score: intervalFor("score"),
      delegators: intervalFor("delegators"),
      testStreams: intervalFor("testStreams", TEST_STREAMS_FETCH_INTERVAL_DEFAULT_MS),
      tickets: intervalFor("tickets"),
    },
    updateIntervalMs: readInterval(env, "UPDATE_INTERVAL", UPDATE_INTERVAL_DEFAULT_MS),
    endpoints: {
      orchestrator: endpointFor("orchestrator"),
      delegator: endpointFor("delegator"),
      score: endpointFor("score"),
      testStreams: endpointFor("testStreams"),
      tickets: endpointFor("tickets"),
    },
    logLevel: readLogLevel(env),
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function readString(env: Env, key: string): string {
  return env[ENV_PREFIX + key]?.trim() ?? "";
}

/** Read a positive duration within the timer limit; unset or empty means `fallback` */
function readInterval(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (!raw) return fallback;

  let ms: number;
  try {
    ms = parseDuration(raw);
  } catch (err) {
    if (err instanceof InvalidDurationError) {
      throw new ConfigError(ENV_PREFIX + key, `failed to parse: ${err.message}`, { cause: err });
    }
    throw err;
  }

  if (ms <= 0) {
    throw new ConfigError(ENV_PREFIX + key, `interval must be positive, got "${raw}"`);
  }
  if (ms > MAX_TIMER_MS) {
    throw new ConfigError(
      ENV_PREFIX + key,
      `interval must be at most ${formatDuration(MAX_TIMER_MS)}, got "${raw}"`,
    );
  }
  return ms;
}

function checkTemplate(key: string, template: string): string {
  if (!template.includes(ADDRESS_PLACEHOLDER)) {
    throw new ConfigError(ENV_PREFIX + key, `URL template must contain ${ADDRESS_PLACEHOLDER}`);
  }
  try {
    new URL(expandEndpoint(template, "0x0"));
  } catch (err) {
    throw new ConfigError(ENV_PREFIX + key, `invalid URL template "${template}"`, { cause: err });
  }
  return template;
}

function readLogLevel(env: Env): LogLevel {
  const raw = readString(env, "LOG_LEVEL").toLowerCase();
  if (!raw) return "info";
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) {
    throw new ConfigError(
      `${ENV_PREFIX}LOG_LEVEL`,
      `must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`,
    );
  }
  return level;
}
