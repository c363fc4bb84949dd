/**
 * Rate Limit Types
 * Type definitions for the fixed-window rate limiter
 */

/**
 * Sentinel key for callers the transport cannot identify
 */
export const UNKNOWN_CLIENT_KEY = 'unknown';

/**
 * Rate limiter policy
 */
export interface LimiterConfig {
  maxCalls: number;                     // Allowed requests per window
  windowSeconds: number;                // Window length in seconds
  exemptPaths: ReadonlySet<string>;     // Paths that bypass the limiter
  maxClients: number;                   // Upper bound on tracked clients
}

/**
 * Per-client quota state
 */
export interface ClientWindow {
  clientKey: string;
  count: number;
  windowStart: number;                  // Epoch seconds
}

export interface QuotaInfo {
  limit: number;
  remaining: number;
  reset: number;                        // Epoch seconds when the window ends
}

export interface AdmitDecision extends QuotaInfo {
  kind: 'admit';
  exempt: false;
}

export interface ExemptDecision {
  kind: 'admit';
  exempt: true;
}

export interface RejectDecision extends QuotaInfo {
  kind: 'reject';
  remaining: 0;
  retryAfter: number;                   // Seconds until the window resets
}

export type RateLimitDecision = AdmitDecision | ExemptDecision | RejectDecision;

/**
 * Rate limit statistics
 */
export interface RateLimitStats {
  totalChecks: number;
  admitted: number;
  rejected: number;
  exempt: number;
  activeClients: number;
  purged: number;
  evicted: number;
}

export const DEFAULT_LIMITER_CONFIG: LimiterConfig = {
  maxCalls: 100,
  windowSeconds: 60,
  exemptPaths: new Set(['/health', '/health/detailed']),
  maxClients: 10000,
};
