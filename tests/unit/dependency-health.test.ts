import { DependencyHealthManager } from '../../src/resilience/dependency-health';

describe('DependencyHealthManager', () => {
  it('starts healthy', () => {
    const health = new DependencyHealthManager();
    expect(health.getDegradationLevel()).toBe('none');
    expect(health.isAvailable('upstream')).toBe(true);
  });

  it('degrades at half the threshold and opens at the threshold', () => {
    const health = new DependencyHealthManager(4, 1_000, () => 0);

    health.recordFailure('upstream', 'timeout');
    expect(health.getStatus('upstream')?.status).toBe('healthy');
    health.recordFailure('upstream', 'timeout');
    expect(health.getStatus('upstream')?.status).toBe('degraded');
    health.recordFailure('upstream', 'timeout');
    health.recordFailure('upstream', 'timeout');

    expect(health.getStatus('upstream')?.status).toBe('down');
    expect(health.isAvailable('upstream')).toBe(false);
    expect(health.getDegradationLevel()).toBe('partial');
  });

  it('lets a probe through after the reset window and closes on success', () => {
    let now = 0;
    const health = new DependencyHealthManager(1, 1_000, () => now);
    health.recordFailure('upstream', 'boom');
    expect(health.isAvailable('upstream')).toBe(false);

    now = 1_001;
    expect(health.isAvailable('upstream')).toBe(true);
    health.recordSuccess('upstream');

    expect(health.getHealthSummary().upstream).toEqual({
      status: 'healthy',
      circuitOpen: false,
      failures: 0,
      lastError: undefined,
    });
  });

  it('admits a single trial call while half-open', () => {
    let now = 0;
    const health = new DependencyHealthManager(2, 1_000, () => now);
    health.recordFailure('upstream', 'boom');
    health.recordFailure('upstream', 'boom');

    now = 1_001;
    const admitted = [1, 2, 3, 4, 5].map(() => health.isAvailable('upstream'));
    expect(admitted).toEqual([true, false, false, false, false]);
  });

  it('reopens for a new window when the trial call fails', () => {
    let now = 0;
    const health = new DependencyHealthManager(2, 1_000, () => now);
    health.recordFailure('upstream', 'boom');
    health.recordFailure('upstream', 'boom');

    now = 1_001;
    expect(health.isAvailable('upstream')).toBe(true);
    health.recordFailure('upstream', 'still down');
    expect(health.isAvailable('upstream')).toBe(false);

    now = 2_002;
    expect(health.isAvailable('upstream')).toBe(true);
    expect(health.isAvailable('upstream')).toBe(false);
  });

  it('reports full degradation when every dependency is down', () => {
    const health = new DependencyHealthManager(1);
    health.recordFailure('upstream', 'boom');
    health.recordFailure('cache', 'disk');
    expect(health.getDegradationLevel()).toBe('full');
  });
});
