export interface ResponseCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
}

export const METADATA_CACHE_TTL_MS = 10 * 60 * 1000;
export const DOWNLOAD_CACHE_TTL_MS = 10 * METADATA_CACHE_TTL_MS;

type CacheEntry = {
  value: string;
  expiresAt: number;
};

export class MemoryResponseCache implements ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly maxEntries = 1000,
    private readonly now: () => number = Date.now
  ) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) {
      return;
    }
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }
}

export class NoopResponseCache implements ResponseCache {
  async get(_key: string): Promise<string | null> {
    return null;
  }

  async set(_key: string, _value: string, _ttlMs: number): Promise<void> {
    return;
  }
}

export function createResponseCache(enabled: boolean): ResponseCache {
  return enabled ? new MemoryResponseCache() : new NoopResponseCache();
}

/**
 * Method, path and the query string with its keys sorted.
 */
export function buildCacheKey(method: string, url: string): string {
  const [path, search = ''] = url.split('?', 2);
  const params = new URLSearchParams(search);
  const entries = Array.from(params.entries()).sort(([a, av], [b, bv]) =>
    a === b ? av.localeCompare(bv) : a.localeCompare(b)
  );
  const query = new URLSearchParams(entries).toString();
  return `${method.toUpperCase()} ${path}${query ? `?${query}` : ''}`;
}
