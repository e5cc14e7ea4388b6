// ABOUTME: Best-effort reverse DNS lookup of client addresses for report decoration
// ABOUTME: Caches per address, bounds concurrent lookups, and times out slow or cancelled lookups to a failure marker

import { Resolver } from 'dns/promises';
import { isIP } from 'net';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import type { ResolvedHost } from './types.js';

const log = createLogger('IPResolver');

export type ReverseLookup = (address: string) => Promise<string[]>;

export interface IPResolverOptions {
  lookup?: ReverseLookup;
  timeoutMs?: number;
  concurrency?: number;
}

export interface ResolveAllOptions {
  signal?: AbortSignal;
}

export class IPResolver {
  private readonly lookup: ReverseLookup;
  // only set for the default lookup, so pending queries can be cancelled
  private readonly dnsResolver: Resolver | null;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  // in-flight promises are cached too, so concurrent callers share one lookup
  private readonly cache = new Map<string, Promise<ResolvedHost>>();

  constructor(options: IPResolverOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 2000;
    if (options.lookup) {
      this.lookup = options.lookup;
      this.dnsResolver = null;
    } else {
      const resolver = new Resolver({ timeout: this.timeoutMs, tries: 1 });
      this.lookup = address => resolver.reverse(address);
      this.dnsResolver = resolver;
    }
    this.concurrency = Math.max(1, options.concurrency ?? 8);
  }

  /**
   * Resolve one address. Never rejects: failures yield hostname null.
   */
  resolve(address: string, signal?: AbortSignal): Promise<ResolvedHost> {
    const cached = this.cache.get(address);
    if (cached) {
      return cached;
    }

    const pending = this.lookupOnce(address, signal);
    this.cache.set(address, pending);
    return pending;
  }

  /**
   * Resolve distinct addresses through a bounded worker pool, in first-seen order
   */
  async resolveAll(addresses: Iterable<string>, options: ResolveAllOptions = {}): Promise<ResolvedHost[]> {
    const unique = Array.from(new Set(addresses));
    const results: ResolvedHost[] = new Array(unique.length);
    let next = 0;

    const { signal } = options;
    const onAbort = (): void => this.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });

    const worker = async (): Promise<void> => {
      while (next < unique.length) {
        const index = next++;
        results[index] = await this.resolve(unique[index], signal);
      }
    };

    const poolSize = Math.min(this.concurrency, unique.length);
    try {
      await Promise.all(Array.from({ length: poolSize }, () => worker()));
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const failures = results.filter(r => r.hostname === null).length;
    log.info(`Resolved ${unique.length - failures} of ${unique.length} addresses`);

    return results;
  }

  /**
   * Cancel outstanding DNS queries of the default lookup; their callers see a failed lookup
   */
  cancel(): void {
    this.dnsResolver?.cancel();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private lookupOnce(address: string, signal?: AbortSignal): Promise<ResolvedHost> {
    if (isIP(address) === 0) {
      log.debug(`Not an IP address, skipping lookup: ${address}`);
      return Promise.resolve({ address, hostname: null });
    }
    if (signal?.aborted) {
      return Promise.resolve({ address, hostname: null });
    }

    return new Promise<ResolvedHost>(resolve => {
      let settled = false;

      const finish = (hostname: string | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve({ address, hostname });
      };

      const onAbort = (): void => {
        log.debug(`Lookup cancelled for ${address}`);
        finish(null);
      };

      const timer = setTimeout(() => {
        log.debug(`Lookup timed out after ${this.timeoutMs}ms for ${address}`);
        finish(null);
      }, this.timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      void Promise.resolve()
        .then(() => this.lookup(address))
        .then(
          hostnames => finish(hostnames.length > 0 ? hostnames[0] : null),
          (error: unknown) => {
            log.debug(`Lookup failed for ${address}: ${errorMessage(error)}`);
            finish(null);
          }
        );
    });
  }
}
