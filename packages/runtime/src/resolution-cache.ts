/**
 * Hostname resolution with a per-client cache
 */

import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';
import {
  errorMessage,
  HostResolveError,
  type IpVersion,
  type ResolvedAddress
} from '@probewire/core';

/**
 * Resolve a hostname to one address of the given family
 */
export type LookupFn = (hostname: string, family: IpVersion) => Promise<string>;

export const systemLookup: LookupFn = async (hostname, family) => {
  const { address } = await lookup(hostname, { family });
  return address;
};

type CacheKey = `${IpVersion | 'any'}:${string}`;

const cacheKey = (hostname: string, ipVersion: IpVersion | undefined): CacheKey =>
  `${ipVersion ?? 'any'}:${hostname}`;

/**
 * IP version of an address literal, or undefined for anything else
 */
export function literalIpVersion(hostname: string): IpVersion | undefined {
  const family = isIP(hostname);
  if (family === 4 || family === 6) return family;
  return undefined;
}

export class ResolutionCache {
  private readonly entries = new Map<CacheKey, ResolvedAddress>();
  private readonly inFlight = new Map<CacheKey, Promise<ResolvedAddress>>();
  private readonly lookupFn: LookupFn;
  private generation = 0;

  constructor(lookupFn: LookupFn = systemLookup) {
    this.lookupFn = lookupFn;
  }

  get size(): number {
    return this.entries.size;
  }

  async resolve(hostname: string, ipVersion?: IpVersion): Promise<ResolvedAddress> {
    if (!hostname) {
      throw new HostResolveError(hostname, 'Empty hostname');
    }

    const literal = literalIpVersion(hostname);
    if (literal !== undefined) {
      if (ipVersion !== undefined && ipVersion !== literal) {
        throw new HostResolveError(
          hostname,
          `Address ${hostname} is not an IPv${ipVersion} address`
        );
      }
      return { address: hostname, ipVersion: literal };
    }

    const key = cacheKey(hostname, ipVersion);
    const cached = this.entries.get(key);
    if (cached) return cached;

    const running = this.inFlight.get(key);
    if (running) return running;

    const generation = this.generation;
    const pending = this.lookupAddress(hostname, ipVersion);
    this.inFlight.set(key, pending);

    try {
      const resolved = await pending;
      // clear() during the lookup: answer the caller but leave the cache empty
      if (generation === this.generation) {
        this.entries.set(key, resolved);
      }
      return resolved;
    } finally {
      if (this.inFlight.get(key) === pending) {
        this.inFlight.delete(key);
      }
    }
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
    this.generation += 1;
  }

  private async lookupAddress(
    hostname: string,
    ipVersion: IpVersion | undefined
  ): Promise<ResolvedAddress> {
    const families: readonly IpVersion[] = ipVersion === undefined ? [4, 6] : [ipVersion];
    let lastError: unknown;

    for (const family of families) {
      try {
        const address = await this.lookupFn(hostname, family);
        return { address, ipVersion: family };
      } catch (error) {
        lastError = error;
      }
    }

    throw new HostResolveError(
      hostname,
      `Unable to resolve ${hostname}: ${errorMessage(lastError)}`,
      { cause: lastError }
    );
  }
}
