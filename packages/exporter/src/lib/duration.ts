/**
 * Duration strings in the form accepted by the exporter's environment:
 * an optional sign followed by one or more `<decimal><unit>` segments,
 * e.g. "300ms", "1.5h", "2h45m". Units: ns, us (µs), ms, s, m, h.
 * The bare string "0" is also accepted. Results are rounded to whole
 * milliseconds, the resolution of Node's timers.
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3, // U+00B5 micro sign
  "μs": 1e-3, // U+03BC greek mu
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

/** One `<decimal><unit>` segment; sticky so segments must be contiguous */
const SEGMENT_SOURCE = "(\\d+(?:\\.\\d*)?|\\.\\d+)(ns|us|µs|μs|ms|s|m|h)";

export class InvalidDurationError extends Error {
  constructor(input: string) {
    super(`invalid duration "${input}"`);
    this.name = "InvalidDurationError";
  }
}

/** Parse a duration string into whole milliseconds */
export function parseDuration(input: string): number {
  let rest = input;
  let sign = 1;
  if (rest.startsWith("-") || rest.startsWith("+")) {
    sign = rest.startsWith("-") ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === "0") return 0;
  if (rest === "") throw new InvalidDurationError(input);

  const segment = new RegExp(SEGMENT_SOURCE, "y");
  let total = 0;
  while (segment.lastIndex < rest.length) {
    const match = segment.exec(rest);
    if (!match) throw new InvalidDurationError(input);
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }

  return Math.round(sign * total);
}

/** Format milliseconds for log output, e.g. 90000 -> "1m30s" */
export function formatDuration(ms: number): string {
  if (ms === 0) return "0s";
  if (ms < 1_000) return `${ms}ms`;

  let remaining = ms;
  let out = "";
  for (const [unit, size] of [["h", 3_600_000], ["m", 60_000]] as const) {
    const whole = Math.floor(remaining / size);
    if (whole > 0) {
      out += `${whole}${unit}`;
      remaining -= whole * size;
    }
  }
  if (remaining > 0) out += `${remaining / 1_000}s`;
  return out;
}
