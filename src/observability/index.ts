/**
 * Observability components for the resilience layer.
 *
 * Provides logging, metrics, and tracing interfaces with pluggable implementations.
 * Console output goes to stderr: stdout is reserved for the host protocol.
 */

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Log levels.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Parses a level name (case-insensitive), falling back to INFO.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return fallback;
  }
}

/**
 * Logger interface.
 */
export interface Logger {
  /** Log at debug level */
  debug(message: string, context?: Record<string, unknown>): void;
  /** Log at info level */
  info(message: string, context?: Record<string, unknown>): void;
  /** Log at warn level */
  warn(message: string, context?: Record<string, unknown>): void;
  /** Log at error level */
  error(message: string, context?: Record<string, unknown>): void;
  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): Logger;
}

/**
 * Destination for formatted log lines.
 */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Console logger writing JSON lines with sensitive data redaction.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly redactKeys: Set<string>;
  private readonly sink: LogSink;

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    redactKeys?: string[];
    sink?: LogSink;
  } = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? {};
    this.redactKeys = new Set(
      (options.redactKeys ?? ['password', 'secret', 'token', 'connectionString']).map((key) =>
        key.toLowerCase()
      )
    );
    this.sink = options.sink ?? stderrSink;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      redactKeys: Array.from(this.redactKeys),
      sink: this.sink,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const mergedContext = this.redact({ ...this.context, ...context });

    const output = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(mergedContext).length > 0 ? { context: mergedContext } : {}),
    };

    this.sink(JSON.stringify(output));
  }

  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (this.redactKeys.has(key.toLowerCase())) {
        result[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * No-op logger for testing.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

/**
 * Log entry for in-memory logger.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * In-memory logger for testing.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, entries: LogEntry[] = []) {
    this.context = context;
    this.entries = entries;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.ERROR, message, context);
  }

  /** Children share the parent's entries */
  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  private addEntry(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date(),
    });
  }

  /** Gets all log entries */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /** Gets all messages, in order */
  getMessages(): string[] {
    return this.entries.map((e) => e.message);
  }

  /** Gets entries at a specific level */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }
}

// ============================================================================
// Metrics Interface
// ============================================================================

/**
 * Metric names for resilient execution.
 */
export const MetricNames = {
  // Executor metrics
  ATTEMPTS_TOTAL: 'pg_resilience_attempts_total',
  RETRIES_TOTAL: 'pg_resilience_retries_total',
  RUNS_TOTAL: 'pg_resilience_runs_total',
  RUN_DURATION_MS: 'pg_resilience_run_duration_ms',
  BACKOFF_DELAY_MS: 'pg_resilience_backoff_delay_ms',

  // Health metrics
  PROBE_FAILURES_TOTAL: 'pg_resilience_probe_failures_total',

  // Connection pool metrics
  POOL_CONNECTIONS: 'pg_pool_connections',
  POOL_ERRORS_TOTAL: 'pg_pool_errors_total',
  PREPARED_STATEMENTS: 'pg_prepared_statements',
} as const;

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  /** Increment a counter */
  increment(name: string, value?: number, tags?: Record<string, string>): void;
  /** Set a gauge value */
  gauge(name: string, value: number, tags?: Record<string, string>): void;
  /** Record a histogram value */
  histogram(name: string, value: number, tags?: Record<string, string>): void;
  /** Record a timing value */
  timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}

/**
 * No-op metrics collector for testing.
 */
export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  gauge(): void {}
  histogram(): void {}
  timing(): void {}
}

/**
 * In-memory metrics collector for testing.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters: Map<string, number> = new Map();
  private readonly gauges: Map<string, number> = new Map();
  private readonly samples: Map<string, number[]> = new Map();

  increment(name: string, value: number = 1, tags?: Record<string, string>): void {
    const key = this.makeKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  gauge(name: string, value: number, tags?: Record<string, string>): void {
    this.gauges.set(this.makeKey(name, tags), value);
  }

  histogram(name: string, value: number, tags?: Record<string, string>): void {
    this.record(name, value, tags);
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    this.record(name, durationMs, tags);
  }

  private record(name: string, value: number, tags?: Record<string, string>): void {
    const key = this.makeKey(name, tags);
    const values = this.samples.get(key) ?? [];
    values.push(value);
    this.samples.set(key, values);
  }

  private makeKey(name: string, tags?: Record<string, string>): string {
    if (!tags || Object.keys(tags).length === 0) return name;
    const sortedTags = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}{${sortedTags}}`;
  }

  /** Gets counter value */
  getCounter(name: string, tags?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, tags)) ?? 0;
  }

  /** Gets gauge value */
  getGauge(name: string, tags?: Record<string, string>): number | undefined {
    return this.gauges.get(this.makeKey(name, tags));
  }

  /** Histogram and timing values, in recording order */
  getSamples(name: string, tags?: Record<string, string>): number[] {
    return [...(this.samples.get(this.makeKey(name, tags)) ?? [])];
  }
}

// ============================================================================
// Tracer Interface
// ============================================================================

/**
 * Span status.
 */
export type SpanStatus = 'OK' | 'ERROR' | 'UNSET';

/**
 * Span context interface.
 */
export interface SpanContext {
  /** Set span status */
  setStatus(status: SpanStatus, message?: string): void;
  /** Set an attribute */
  setAttribute(key: string, value: string | number | boolean): void;
  /** Record an event */
  recordEvent(name: string, attributes?: Record<string, unknown>): void;
  /** End the span */
  end(): void;
}

/**
 * Tracer interface.
 */
export interface Tracer {
  /** Start a new span */
  startSpan(name: string, attributes?: Record<string, unknown>): SpanContext;
}

const NOOP_SPAN: SpanContext = {
  setStatus: () => {},
  setAttribute: () => {},
  recordEvent: () => {},
  end: () => {},
};

/**
 * No-op tracer for testing.
 */
export class NoopTracer implements Tracer {
  startSpan(): SpanContext {
    return NOOP_SPAN;
  }
}

/**
 * In-memory span context for testing.
 */
export class InMemorySpanContext implements SpanContext {
  readonly name: string;
  readonly attributes: Record<string, string | number | boolean> = {};
  readonly events: Array<{ name: string; attributes?: Record<string, unknown>; timestamp: Date }> = [];
  status: SpanStatus = 'UNSET';
  statusMessage?: string;
  startTime: Date;
  endTime?: Date;

  constructor(name: string, attributes?: Record<string, unknown>) {
    this.name = name;
    this.startTime = new Date();
    if (attributes) {
      for (const [key, value] of Object.entries(attributes)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          this.attributes[key] = value;
        }
      }
    }
  }

  setStatus(status: SpanStatus, message?: string): void {
    this.status = status;
    this.statusMessage = message;
  }

  setAttribute(key: string, value: string | number | boolean): void {
    this.attributes[key] = value;
  }

  recordEvent(name: string, attributes?: Record<string, unknown>): void {
    this.events.push({ name, attributes, timestamp: new Date() });
  }

  end(): void {
    this.endTime = new Date();
  }
}

/**
 * In-memory tracer for testing.
 */
export class InMemoryTracer implements Tracer {
  private readonly spans: InMemorySpanContext[] = [];

  startSpan(name: string, attributes?: Record<string, unknown>): InMemorySpanContext {
    const span = new InMemorySpanContext(name, attributes);
    this.spans.push(span);
    return span;
  }

  /** Gets all spans */
  getSpans(): InMemorySpanContext[] {
    return [...this.spans];
  }

  /** Gets spans by name */
  getSpansByName(name: string): InMemorySpanContext[] {
    return this.spans.filter((s) => s.name === name);
  }
}

// ============================================================================
// Observability Container
// ============================================================================

/**
 * Container for all observability components.
 */
export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
  tracer: Tracer;
}

/**
 * Creates a no-op observability container.
 */
export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}

/**
 * Creates an in-memory observability container for testing.
 */
export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
  tracer: InMemoryTracer;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
    tracer: new InMemoryTracer(),
  };
}

/**
 * Creates a console-based observability container.
 */
export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return {
    logger: new ConsoleLogger({ level }),
    metrics: new NoopMetricsCollector(), // Console doesn't support metrics by default
    tracer: new NoopTracer(),
  };
}

// ============================================================================
// Fault Isolation
// ============================================================================

/**
 * Runs a side-channel call, dropping any fault it raises.
 */
function contain(fn: () => void): void {
  try {
    fn();
  } catch {
    // Observability faults must not reach the caller.
  }
}

class GuardedLogger implements Logger {
  constructor(private readonly inner: Logger) {}

  debug(message: string, context?: Record<string, unknown>): void {
    contain(() => this.inner.debug(message, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    contain(() => this.inner.info(message, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    contain(() => this.inner.warn(message, context));
  }

  error(message: string, context?: Record<string, unknown>): void {
    contain(() => this.inner.error(message, context));
  }

  child(context: Record<string, unknown>): Logger {
    try {
      return new GuardedLogger(this.inner.child(context));
    } catch {
      return this;
    }
  }
}

class GuardedMetrics implements MetricsCollector {
  constructor(private readonly inner: MetricsCollector) {}

  increment(name: string, value?: number, tags?: Record<string, string>): void {
    contain(() => this.inner.increment(name, value, tags));
  }

  gauge(name: string, value: number, tags?: Record<string, string>): void {
    contain(() => this.inner.gauge(name, value, tags));
  }

  histogram(name: string, value: number, tags?: Record<string, string>): void {
    contain(() => this.inner.histogram(name, value, tags));
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    contain(() => this.inner.timing(name, durationMs, tags));
  }
}

class GuardedSpan implements SpanContext {
  constructor(private readonly inner: SpanContext) {}

  setStatus(status: SpanStatus, message?: string): void {
    contain(() => this.inner.setStatus(status, message));
  }

  setAttribute(key: string, value: string | number | boolean): void {
    contain(() => this.inner.setAttribute(key, value));
  }

  recordEvent(name: string, attributes?: Record<string, unknown>): void {
    contain(() => this.inner.recordEvent(name, attributes));
  }

  end(): void {
    contain(() => this.inner.end());
  }
}

class GuardedTracer implements Tracer {
  constructor(private readonly inner: Tracer) {}

  startSpan(name: string, attributes?: Record<string, unknown>): SpanContext {
    try {
      return new GuardedSpan(this.inner.startSpan(name, attributes));
    } catch {
      return NOOP_SPAN;
    }
  }
}

/**
 * Wraps a container so that no logging, metrics or tracing call can throw.
 */
export function guardObservability(observability: Observability): Observability {
  return {
    logger: new GuardedLogger(observability.logger),
    metrics: new GuardedMetrics(observability.metrics),
    tracer: new GuardedTracer(observability.tracer),
  };
}
