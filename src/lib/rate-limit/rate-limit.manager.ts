/**
 * Rate Limit Manager
 * In-memory fixed-window rate limiting, one counter per client
 *
 * All methods are synchronous: a check runs to completion on the event loop
 * before any other request is handled, so updates to a client's window are
 * never interleaved.
 */

import {
  ClientWindow,
  DEFAULT_LIMITER_CONFIG,
  LimiterConfig,
  RateLimitDecision,
  RateLimitStats,
  UNKNOWN_CLIENT_KEY,
} from './rate-limit.types';

export function nowInSeconds(): number {
  return Date.now() / 1000;
}

/**
 * Fold a path the way Express routes it by default
 * (case-insensitive, trailing slash ignored)
 */
export function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return (trimmed || '/').toLowerCase();
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

export class RateLimitManager {
  private readonly config: Readonly<LimiterConfig>;
  // Insertion order doubles as window-start order: a reset re-inserts the entry
  private windows: Map<string, ClientWindow> = new Map();
  private stats = {
    totalChecks: 0,
    admitted: 0,
    rejected: 0,
    exempt: 0,
    purged: 0,
    evicted: 0,
  };

  constructor(config: Partial<LimiterConfig> = {}) {
    const merged: LimiterConfig = {
      ...DEFAULT_LIMITER_CONFIG,
      ...config,
      exemptPaths: new Set(Array.from(config.exemptPaths ?? DEFAULT_LIMITER_CONFIG.exemptPaths, normalizePath)),
    };

    assertPositiveInteger('maxCalls', merged.maxCalls);
    assertPositiveInteger('windowSeconds', merged.windowSeconds);
    assertPositiveInteger('maxClients', merged.maxClients);

    this.config = Object.freeze(merged);
  }

  getConfig(): Readonly<LimiterConfig> {
    return this.config;
  }

  isExempt(path: string): boolean {
    return this.config.exemptPaths.has(normalizePath(path));
  }

  /**
   * Decide whether a request from `clientKey` to `path` is admitted
   */
  check(clientKey: string, path: string, now: number = nowInSeconds()): RateLimitDecision {
    this.stats.totalChecks++;

    if (this.isExempt(path)) {
      this.stats.exempt++;
      return { kind: 'admit', exempt: true };
    }

    const key = clientKey.trim() || UNKNOWN_CLIENT_KEY;
    const { maxCalls, windowSeconds } = this.config;

    let window = this.windows.get(key);
    if (!window) {
      this.makeRoom(now);
      window = { clientKey: key, count: 0, windowStart: now };
      this.windows.set(key, window);
    } else if (now - window.windowStart >= windowSeconds) {
      window.count = 0;
      window.windowStart = now;
      this.windows.delete(key);
      this.windows.set(key, window);
    }

    const reset = window.windowStart + windowSeconds;

    if (window.count >= maxCalls) {
      this.stats.rejected++;
      return {
        kind: 'reject',
        limit: maxCalls,
        remaining: 0,
        reset,
        retryAfter: Math.max(0, windowSeconds - (now - window.windowStart)),
      };
    }

    window.count++;
    this.stats.admitted++;

    return {
      kind: 'admit',
      exempt: false,
      limit: maxCalls,
      remaining: maxCalls - window.count,
      reset,
    };
  }

  /**
   * Drop windows that have aged out; returns how many were removed
   */
  purge(now: number = nowInSeconds()): number {
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (now - window.windowStart >= this.config.windowSeconds) {
        this.windows.delete(key);
        removed++;
      }
    }
    this.stats.purged += removed;
    return removed;
  }

  /**
   * Snapshot of a client's window, if tracked
   */
  peek(clientKey: string): Readonly<ClientWindow> | undefined {
    const window = this.windows.get(clientKey);
    return window ? { ...window } : undefined;
  }

  reset(clientKey: string): boolean {
    return this.windows.delete(clientKey);
  }

  getStats(): RateLimitStats {
    return {
      ...this.stats,
      activeClients: this.windows.size,
    };
  }

  clear(): void {
    this.windows.clear();
    this.stats = {
      totalChecks: 0,
      admitted: 0,
      rejected: 0,
      exempt: 0,
      purged: 0,
      evicted: 0,
    };
  }

  private makeRoom(now: number): void {
    if (this.windows.size < this.config.maxClients) {
      return;
    }

    this.purge(now);

    while (this.windows.size >= this.config.maxClients) {
      const oldest = this.windows.keys().next();
      if (oldest.done) {
        return;
      }
      this.windows.delete(oldest.value);
      this.stats.evicted++;
    }
  }
}
