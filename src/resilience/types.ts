/**
 * Graceful Degradation Types
 */

export type DependencyName = 'upstream' | 'cache';

export type DependencyStatus = 'healthy' | 'degraded' | 'down';

export type DegradationLevel = 'none' | 'partial' | 'full';

export interface DependencyHealth {
  name: DependencyName;
  status: DependencyStatus;
  lastCheck: number;
  consecutiveFailures: number;
  lastError?: string;
  /** Circuit breaker: open = requests blocked */
  circuitOpen: boolean;
  circuitOpenUntil?: number;
  /** Half-open: the single trial call is outstanding */
  halfOpenProbeInFlight?: boolean;
}

export interface DependencyHealthSummary {
  status: DependencyStatus;
  circuitOpen: boolean;
  failures: number;
  lastError?: string;
}
