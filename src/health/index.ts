/**
 * Connection health validation.
 *
 * @module health
 */

import { DEFAULT_PROBE_TIMEOUT_MS } from '../config/index.js';
import { MetricNames, Observability, createNoopObservability } from '../observability/index.js';
import type { ResourceHandle } from '../pool/index.js';

/** Query used to probe a connection */
export const PROBE_QUERY = 'SELECT 1';

/**
 * Checks that a handle can serve queries before an operation uses it.
 */
export class HealthValidator {
  private readonly observability: Observability;

  constructor(observability: Observability = createNoopObservability()) {
    this.observability = observability;
  }

  /**
   * Opens the handle if needed, then probes it.
   *
   * Failures to open propagate unchanged so they can be classified; a probe
   * failure is logged and reported as `false`. The probe is never
   * auto-prepared.
   */
  async ensureLive(
    handle: ResourceHandle,
    probeTimeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS
  ): Promise<boolean> {
    if (handle.state !== 'open') {
      await handle.open();
    }

    try {
      await handle.query(PROBE_QUERY, undefined, { timeoutMs: probeTimeoutMs, prepare: false });
      return true;
    } catch (error) {
      this.observability.logger.warn('Connection health probe failed', {
        database: handle.resourceName,
        handleId: handle.id,
        error: error instanceof Error ? error.message : String(error),
      });
      this.observability.metrics.increment(MetricNames.PROBE_FAILURES_TOTAL, 1, {
        database: handle.resourceName,
      });
      return false;
    }
  }
}
