/**
 * Dependency Health Manager
 *
 * Per-dependency circuit breakers + health monitoring. While the upstream
 * circuit is open, fetches fail fast instead of queueing behind timeouts.
 */

import {
  DependencyName,
  DependencyHealth,
  DependencyHealthSummary,
  DegradationLevel,
} from './types';
import { logger } from '../observability/logger';

const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_CIRCUIT_RESET_MS = 30_000;

export class DependencyHealthManager {
  private readonly deps = new Map<DependencyName, DependencyHealth>();
  private readonly log = logger.child({ component: 'dep-health' });

  constructor(
    private readonly failureThreshold = DEFAULT_FAILURE_THRESHOLD,
    private readonly circuitResetMs = DEFAULT_CIRCUIT_RESET_MS,
    private readonly now: () => number = Date.now,
  ) {
    const names: DependencyName[] = ['upstream', 'cache'];
    for (const name of names) {
      this.deps.set(name, {
        name,
        status: 'healthy',
        lastCheck: this.now(),
        consecutiveFailures: 0,
        circuitOpen: false,
      });
    }
  }

  /** Record a successful call */
  recordSuccess(name: DependencyName): void {
    const dep = this.deps.get(name);
    if (!dep) return;
    if (dep.status !== 'healthy') {
      this.log.info({ dependency: name }, 'Dependency recovered');
    }
    dep.consecutiveFailures = 0;
    dep.status = 'healthy';
    dep.lastCheck = this.now();
    dep.circuitOpen = false;
    dep.circuitOpenUntil = undefined;
    dep.halfOpenProbeInFlight = false;
    dep.lastError = undefined;
  }

  /** Record a failed call */
  recordFailure(name: DependencyName, error: string): void {
    const dep = this.deps.get(name);
    if (!dep) return;
    dep.consecutiveFailures++;
    dep.lastCheck = this.now();
    dep.lastError = error;
    dep.halfOpenProbeInFlight = false;

    if (dep.consecutiveFailures >= this.failureThreshold) {
      dep.status = 'down';
      dep.circuitOpen = true;
      dep.circuitOpenUntil = this.now() + this.circuitResetMs;
      this.log.warn({ dependency: name, failures: dep.consecutiveFailures }, 'Circuit opened');
    } else if (dep.consecutiveFailures >= Math.floor(this.failureThreshold / 2)) {
      dep.status = 'degraded';
    }
  }

  /** Check if a dependency is available (circuit closed or half-open) */
  isAvailable(name: DependencyName): boolean {
    const dep = this.deps.get(name);
    if (!dep) return true;

    if (!dep.circuitOpen) return true;

    // Half-open: admit one trial call until its outcome is recorded
    if (dep.circuitOpenUntil !== undefined && this.now() > dep.circuitOpenUntil) {
      if (dep.halfOpenProbeInFlight) return false;
      dep.halfOpenProbeInFlight = true;
      dep.status = 'degraded';
      return true;
    }

    return false;
  }

  getStatus(name: DependencyName): DependencyHealth | undefined {
    return this.deps.get(name);
  }

  getAllStatuses(): DependencyHealth[] {
    return Array.from(this.deps.values());
  }

  getDegradationLevel(): DegradationLevel {
    const statuses = this.getAllStatuses();
    if (statuses.every((d) => d.status === 'down')) return 'full';
    if (statuses.some((d) => d.status !== 'healthy')) return 'partial';
    return 'none';
  }

  /** Health summary for the /ready endpoint */
  getHealthSummary(): Record<string, DependencyHealthSummary> {
    const summary: Record<string, DependencyHealthSummary> = {};
    for (const dep of this.deps.values()) {
      summary[dep.name] = {
        status: dep.status,
        circuitOpen: dep.circuitOpen,
        failures: dep.consecutiveFailures,
        lastError: dep.lastError,
      };
    }
    return summary;
  }
}
