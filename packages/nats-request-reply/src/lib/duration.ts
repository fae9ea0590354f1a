import { ConfigurationError } from './request-reply.errors';

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000
};

// Longer units first so "ms" is not read as "m" followed by "s"
const SEGMENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

/**
 * Parses a duration string such as `300ms`, `1.5h` or `2h45m` into milliseconds.
 * A sign may prefix the whole string. A bare `0` is accepted.
 */
export function parseDuration(input: string): number {
  let rest = input.trim();
  let sign = 1;

  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }

  if (rest.length === 0) {
    throw new ConfigurationError(`invalid duration "${input}"`);
  }

  let total = 0;
  while (rest.length > 0) {
    const match = SEGMENT.exec(rest);
    if (!match) {
      throw new ConfigurationError(`invalid duration "${input}"`);
    }
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
    rest = rest.slice(match[0].length);
  }

  return sign * total;
}
