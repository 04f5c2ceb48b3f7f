import type { ComponentName, HealthReport, HealthState, HealthStatus } from '@statute-rag/shared';
import { describeError } from '../errors';
import { abortable, withDeadline } from '../utils/abort';
import { componentLogger } from '../utils/logger';

/**
 * Health Aggregator
 *
 * Owned by the process lifecycle: start() runs one refresh and schedules the
 * background loop, stop() tears it down. Readers always get the last
 * snapshot without touching any provider.
 */

const log = componentLogger('health');

export interface ProbeResult {
  state?: Exclude<HealthState, 'down'>;
  detail?: string;
}

export interface HealthProbe {
  readonly component: ComponentName;
  check(signal: AbortSignal): Promise<ProbeResult>;
}

export interface HealthAggregatorOptions {
  refreshIntervalMs: number;
  checkTimeoutMs: number;
  now?: () => Date;
}

export interface Liveness {
  status: 'ok';
  uptimeSeconds: number;
}

/**
 * - down: document store down, or vector index and generator both down
 * - degraded: any other monitored component not up
 * - up: everything up
 *
 * The cache is reported but never changes the overall state.
 */
export function computeOverall(components: readonly HealthStatus[]): HealthState {
  const stateOf = (name: ComponentName) => components.find((c) => c.component === name)?.state;

  if (stateOf('documentStore') === 'down') return 'down';
  if (stateOf('vectorIndex') === 'down' && stateOf('generator') === 'down') return 'down';

  const monitored = components.filter((c) => c.component !== 'cache');
  return monitored.some((c) => c.state !== 'up') ? 'degraded' : 'up';
}

export class HealthAggregator {
  private snapshot: HealthReport;
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<HealthReport> | undefined;
  private readonly startedAt = Date.now();
  private readonly now: () => Date;

  constructor(private readonly probes: readonly HealthProbe[], private readonly options: HealthAggregatorOptions) {
    this.now = options.now ?? (() => new Date());
    const pending = probes.map(
      (probe): HealthStatus => ({ component: probe.component, state: 'down', lastCheckedAt: null, detail: 'pending' })
    );
    this.snapshot = Object.freeze({ overall: computeOverall(pending), checkedAt: null, components: pending });
  }

  async start(): Promise<void> {
    if (this.timer) return;
    await this.refresh();
    this.timer = setInterval(() => {
      this.refresh().catch((error: unknown) => {
        log.error({ error: describeError(error) }, 'Health refresh failed');
      });
    }, this.options.refreshIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  getHealth(): HealthReport {
    return this.snapshot;
  }

  getLiveness(): Liveness {
    return { status: 'ok', uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000) };
  }

  /**
   * Probe every component once. A refresh already running is joined, not repeated.
   */
  refresh(): Promise<HealthReport> {
    if (!this.inFlight) {
      this.inFlight = this.collect().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async collect(): Promise<HealthReport> {
    const components = await Promise.all(this.probes.map((probe) => this.check(probe)));
    const report: HealthReport = Object.freeze({
      overall: computeOverall(components),
      checkedAt: this.now().toISOString(),
      components,
    });

    if (report.overall !== this.snapshot.overall) {
      log.info({ from: this.snapshot.overall, to: report.overall }, 'Overall health changed');
    }
    this.snapshot = report;
    return report;
  }

  private async check(probe: HealthProbe): Promise<HealthStatus> {
    const started = Date.now();
    try {
      const result = await withDeadline(this.options.checkTimeoutMs, undefined, (deadline) =>
        abortable(probe.check(deadline.signal), deadline.signal).catch((error: unknown) => {
          throw deadline.timedOut() ? new Error(`timed out after ${this.options.checkTimeoutMs}ms`) : error;
        })
      );
      const status: HealthStatus = {
        component: probe.component,
        state: result.state ?? 'up',
        lastCheckedAt: this.now().toISOString(),
        detail: result.detail ?? 'ok',
        latencyMs: Date.now() - started,
      };
      return status;
    } catch (error) {
      log.warn({ component: probe.component, error: describeError(error) }, 'Health probe failed');
      const status: HealthStatus = {
        component: probe.component,
        state: 'down',
        lastCheckedAt: this.now().toISOString(),
        detail: describeError(error),
        latencyMs: Date.now() - started,
      };
      return status;
    }
  }
}
