/**
 * Shared test helpers: a recording logger, a stubbed upstream (global fetch)
 * and scrape-output helpers.
 */

import { vi } from "vitest";
import type { FastifyBaseLogger } from "fastify";
import type { Registry } from "prom-client";

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export function createTestLogger() {
  const error = vi.fn();
  const warn = vi.fn();
  const info = vi.fn();
  const logger: FastifyBaseLogger = {
    level: "silent",
    fatal: vi.fn(),
    error,
    warn,
    info,
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
    child: () => logger,
  };
  return { logger, error, warn, info };
}

// ---------------------------------------------------------------------------
// Upstream stub
// ---------------------------------------------------------------------------

export type Route = () => Response | Promise<Response>;

/** JSON response route */
export function json(body: unknown, status = 200): Route {
  return () =>
    new Response(JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json" },
    });
}

/** Route that fails at the network level */
export function networkError(message = "ECONNREFUSED"): Route {
  return () => Promise.reject(new TypeError(`fetch failed: ${message}`));
}

/**
 * Replace global fetch with a URL → route table. The table is read on every
 * call, so tests can swap routes between fetches. Unknown URLs get a 404.
 */
export function stubUpstream(routes: Record<string, Route>) {
  return vi.spyOn(globalThis, "fetch").mockImplementation(async (input) => {
    const url =
      typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const route = routes[url];
    if (!route) return new Response("not found", { status: 404 });
    return route();
  });
}

// ---------------------------------------------------------------------------
// Scrape output
// ---------------------------------------------------------------------------

/** Sample lines (no HELP/TYPE comments) from the registry's text output */
export async function sampleLines(registry: Registry): Promise<string[]> {
  const text = await registry.metrics();
  return text.split("\n").filter((line) => line !== "" && !line.startsWith("#"));
}

/** Sample lines belonging to one metric name */
export async function samplesOf(registry: Registry, name: string): Promise<string[]> {
  const lines = await sampleLines(registry);
  return lines.filter((line) => line.startsWith(`${name} `) || line.startsWith(`${name}{`));
}
