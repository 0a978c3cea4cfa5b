/**
 * JSON fetcher for the upstream APIs.
 *
 * Fetches a URL with a timeout and checks the decoded body against a
 * TypeBox schema. Every failure throws an UpstreamError naming the URL.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { UpstreamError } from "../errors.js";

export interface FetchJsonOptions {
  /** Abort the request after this many ms */
  timeoutMs: number;
}

export async function fetchJson<T extends TSchema>(
  url: string,
  schema: T,
  options: FetchJsonOptions,
): Promise<Static<T>> {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    throw new UpstreamError(`request to ${url} failed`, { url, cause: err });
  }

  if (!res.ok) {
    throw new UpstreamError(`${url} responded with status ${res.status}`, {
      url,
      status: res.status,
    });
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new UpstreamError(`${url} returned invalid JSON`, {
      url,
      status: res.status,
      cause: err,
    });
  }

  if (!Value.Check(schema, body)) {
    const first = Value.Errors(schema, body).First();
    const detail = first ? `: ${first.path || "/"} ${first.message}` : "";
    throw new UpstreamError(`${url} returned an unexpected payload${detail}`, {
      url,
      status: res.status,
    });
  }

  return body;
}
