/**
 * Upstream endpoint URL templates.
 *
 * `{address}` is replaced with the (URL-encoded) address being queried.
 * Every template can be overridden from the environment, see config.ts.
 */

export type EndpointName =
  | "orchestrator"
  | "delegator"
  | "score"
  | "testStreams"
  | "tickets";

export type EndpointTemplates = Record<EndpointName, string>;

export const ADDRESS_PLACEHOLDER = "{address}";

export const DEFAULT_ENDPOINTS: EndpointTemplates = {
  orchestrator: "https://stronk.rocks/api/livepeer/getOrchestrator/{address}",
  delegator: "https://stronk.rocks/api/livepeer/getDelegator/{address}",
  score: "https://explorer.livepeer.org/api/score/{address}",
  testStreams:
    "https://leaderboard-serverless.vercel.app/api/raw_stats?orchestrator={address}",
  tickets: "https://stronk.rocks/api/livepeer/getTickets/{address}",
};

/** Fill in an endpoint template for one address */
export function expandEndpoint(template: string, address: string): string {
  return template.replaceAll(ADDRESS_PLACEHOLDER, encodeURIComponent(address));
}
