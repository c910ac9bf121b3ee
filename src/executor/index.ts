/**
 * Retry executor.
 *
 * Drives one operation against a named resource: resolves the profile,
 * takes a fresh handle per attempt, validates it, runs the operation and
 * retries transient failures with capped, jittered exponential backoff.
 *
 * @module executor
 */

import { classify } from '../classifier/index.js';
import {
  createExecutorConfig,
  ExecutorConfig,
  formatIssues,
  RetryPolicy,
  retryPolicySchema,
} from '../config/index.js';
import { ConfigurationError, HandleUnusableError, toRawFailure } from '../errors/index.js';
import { HealthValidator } from '../health/index.js';
import {
  createNoopObservability,
  guardObservability,
  MetricNames,
  Observability,
  SpanContext,
} from '../observability/index.js';
import type { HandleProvider, ResourceHandle } from '../pool/index.js';
import type { ConnectionProfileResolver } from '../resolver/index.js';
import {
  ExecutionState,
  failure,
  FailureClass,
  Outcome,
  RawFailure,
  ResourceProfile,
  RetryState,
  success,
} from '../types/index.js';

/**
 * Context passed to each invocation of an operation.
 */
export interface AttemptContext {
  /** 1-based attempt number */
  attempt: number;
  profile: ResourceProfile;
}

/**
 * Unit of work run against an open, validated handle.
 */
export type Operation<T> = (handle: ResourceHandle, context: AttemptContext) => Promise<T>;

/**
 * A state change of a run.
 */
export interface StateTransition {
  from: ExecutionState;
  to: ExecutionState;
  attempt: number;
}

/**
 * Per-run options. Unset values come from the executor configuration.
 */
export interface RunOptions {
  /** Name used in log lines and metrics (default: 'operation') */
  operationName?: string;
  maxAttempts?: number;
  initialDelayMs?: number;
  delayCapMs?: number;
  /** Observer of state transitions; its faults are logged and ignored */
  onStateChange?: (transition: StateTransition) => void;
}

export type Sleep = (ms: number) => Promise<void>;

export interface RetryExecutorOptions {
  resolver: ConnectionProfileResolver;
  handles: HandleProvider;
  config?: ExecutorConfig;
  health?: HealthValidator;
  observability?: Observability;
  /** Injected for tests; defaults to a timer */
  sleep?: Sleep;
  /** Uniform source in [0, 1); defaults to Math.random */
  random?: () => number;
}

type AttemptResult<T> = { ok: true; value: T } | { ok: false; failure: RawFailure };

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Computes the delay that follows a failed attempt.
 *
 * `min(delayCap, initialDelay * 2^(attempt - 1) + jitter)` with jitter drawn
 * uniformly from `[0, jitterMs)`.
 *
 * @param attempt - The attempt that just failed (1-based)
 */
export function computeBackoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'initialDelayMs' | 'delayCapMs' | 'jitterMs'>,
  random: () => number = Math.random
): number {
  const exponential = policy.initialDelayMs * Math.pow(2, attempt - 1);
  const jitter = Math.floor(random() * policy.jitterMs);
  return Math.min(policy.delayCapMs, exponential + jitter);
}

/**
 * Runs operations with retry. {@link RetryExecutor.run} never throws.
 */
export class RetryExecutor {
  private readonly config: ExecutorConfig;
  private readonly resolver: ConnectionProfileResolver;
  private readonly handles: HandleProvider;
  private readonly health: HealthValidator;
  private readonly observability: Observability;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(options: RetryExecutorOptions) {
    this.config = options.config ?? createExecutorConfig();
    this.resolver = options.resolver;
    this.handles = options.handles;
    this.observability = guardObservability(options.observability ?? createNoopObservability());
    this.health = options.health ?? new HealthValidator(this.observability);
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /** The retry policy used when a run sets no overrides */
  get retryPolicy(): Readonly<RetryPolicy> {
    return this.config.retry;
  }

  /**
   * Runs `operation` against `resourceName`.
   *
   * @returns `success` with the operation's value, or `failure` with the
   *   classification of the last fault and the number of attempts made
   */
  async run<T>(
    operation: Operation<T>,
    resourceName: string,
    options: RunOptions = {}
  ): Promise<Outcome<T>> {
    const operationName = options.operationName ?? 'operation';
    const { logger, metrics, tracer } = this.observability;
    const tags = { database: resourceName, operation: operationName };
    const startedAt = Date.now();
    const state: RetryState = { attempt: 0, currentDelayMs: 0 };
    const span = tracer.startSpan('pg_resilience.run', tags);

    let outcome: Outcome<T>;
    try {
      const policy = this.policyFor(options);
      outcome = await this.loop(operation, resourceName, operationName, policy, state, span, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Unexpected executor fault', { ...tags, error: message });
      outcome = failure(
        { kind: FailureClass.Permanent, isNetworkLevel: false },
        message,
        state.attempt
      );
    }

    const status = outcome.status;
    metrics.increment(MetricNames.RUNS_TOTAL, 1, { ...tags, status });
    metrics.timing(MetricNames.RUN_DURATION_MS, Date.now() - startedAt, tags);
    span.setAttribute('attempts', outcome.attempts);
    if (outcome.status === 'success') {
      span.setStatus('OK');
    } else {
      span.setAttribute('failure_class', outcome.classification.kind);
      span.setStatus('ERROR', outcome.message);
    }
    span.end();

    return outcome;
  }

  private async loop<T>(
    operation: Operation<T>,
    resourceName: string,
    operationName: string,
    policy: RetryPolicy,
    state: RetryState,
    span: SpanContext,
    options: RunOptions
  ): Promise<Outcome<T>> {
    const { logger, metrics } = this.observability;
    const tags = { database: resourceName, operation: operationName };
    const resolved: { profile?: ResourceProfile } = {};
    let current = ExecutionState.Idle;

    const transition = (to: ExecutionState): void => {
      const from = current;
      current = to;
      this.notify(options, { from, to, attempt: state.attempt });
    };

    for (state.attempt = 1; ; state.attempt++) {
      transition(ExecutionState.Attempting);
      metrics.increment(MetricNames.ATTEMPTS_TOTAL, 1, tags);

      const result = await this.attempt(operation, resourceName, resolved, state.attempt);
      if (result.ok) {
        transition(ExecutionState.Succeeded);
        return success(result.value, state.attempt);
      }

      state.lastFailure = result.failure;
      const classification = classify(result.failure);

      if (classification.kind === FailureClass.Permanent || state.attempt >= policy.maxAttempts) {
        transition(ExecutionState.Failed);
        logger.error(`${operationName} failed after ${state.attempt} attempt(s)`, {
          ...tags,
          error: result.failure.message,
          classification: classification.kind,
          diagnosticCode: classification.diagnosticCode,
        });
        return failure(classification, result.failure.message, state.attempt);
      }

      const delayMs = computeBackoffDelay(state.attempt, policy, this.random);
      state.currentDelayMs = delayMs;

      logger.warn(
        `[Retry] ${operationName} attempt ${state.attempt}/${policy.maxAttempts} failed: ${result.failure.message}`,
        { ...tags, diagnosticCode: classification.diagnosticCode }
      );
      logger.warn(`[Retry] Waiting ${delayMs}ms before retry...`, tags);

      metrics.increment(MetricNames.RETRIES_TOTAL, 1, tags);
      metrics.histogram(MetricNames.BACKOFF_DELAY_MS, delayMs, tags);
      span.recordEvent('retry', { attempt: state.attempt, delayMs });

      transition(ExecutionState.BackingOff);
      await this.sleep(delayMs);
    }
  }

  /**
   * Runs one attempt. Faults are converted, never thrown.
   */
  private async attempt<T>(
    operation: Operation<T>,
    resourceName: string,
    resolved: { profile?: ResourceProfile },
    attempt: number
  ): Promise<AttemptResult<T>> {
    let handle: ResourceHandle | undefined;
    let failed = false;

    try {
      const profile = resolved.profile ?? this.resolver.resolve(resourceName);
      resolved.profile = profile;

      handle = this.handles.handleFor(profile);
      const live = await this.health.ensureLive(handle, this.config.probeTimeoutMs);
      if (!live) {
        throw new HandleUnusableError(resourceName);
      }

      const value = await operation(handle, { attempt, profile });
      return { ok: true, value };
    } catch (error) {
      failed = true;
      return { ok: false, failure: toRawFailure(error) };
    } finally {
      if (handle) {
        this.releaseHandle(handle, failed);
      }
    }
  }

  private releaseHandle(handle: ResourceHandle, destroy: boolean): void {
    try {
      handle.release(destroy);
    } catch (error) {
      this.observability.logger.warn('Failed to release handle', {
        database: handle.resourceName,
        handleId: handle.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private notify(options: RunOptions, transition: StateTransition): void {
    if (!options.onStateChange) return;
    try {
      options.onStateChange(transition);
    } catch (error) {
      this.observability.logger.warn('State change observer failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Applies per-run overrides to the configured retry policy.
   *
   * @throws {ConfigurationError} If an override is out of range
   */
  private policyFor(options: RunOptions): RetryPolicy {
    const candidate: RetryPolicy = {
      maxAttempts: options.maxAttempts ?? this.config.retry.maxAttempts,
      initialDelayMs: options.initialDelayMs ?? this.config.retry.initialDelayMs,
      delayCapMs: options.delayCapMs ?? this.config.retry.delayCapMs,
      jitterMs: this.config.retry.jitterMs,
    };
    const result = retryPolicySchema.safeParse(candidate);
    if (!result.success) {
      throw new ConfigurationError(`Invalid retry options: ${formatIssues(result.error)}`);
    }
    return result.data;
  }
}
