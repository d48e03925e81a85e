/**
 * Registrable-domain resolution.
 *
 * The aggregator only depends on the `DomainResolver` interface, so the public
 * suffix data can be swapped or updated without touching aggregation.
 */

import { parse } from 'tldts';

export interface DomainResolver {
  /** Registrable domain ("bbc.co.uk") for a URL or host, or null when there is none */
  resolve(urlOrHost: string): string | null;
}

/**
 * Public-suffix-list resolver backed by tldts. IP addresses, bare suffixes and
 * malformed input resolve to null.
 */
export function createPublicSuffixResolver(): DomainResolver {
  return {
    resolve(urlOrHost: string): string | null {
      const input = urlOrHost.trim();
      if (!input) return null;

      const parsed = parse(input);
      if (parsed.isIp || !parsed.domain) return null;
      return parsed.domain.toLowerCase();
    },
  };
}

export const publicSuffixResolver: DomainResolver = createPublicSuffixResolver();
