/**
 * Rendering of outcomes into the stable external result shape.
 *
 * @module reporter
 */

import { Logger, NoopLogger } from '../observability/index.js';
import { FailureClass, FailureResult, Outcome, StructuredResult } from '../types/index.js';

export const TRANSIENT_SUGGESTION =
  'This appears to be a transient error. The operation was retried automatically.';

export const PERMANENT_SUGGESTION =
  'This error requires attention and cannot be automatically retried.';

/** Error text used when an outcome cannot be rendered */
export const RENDER_FAILURE_MESSAGE = 'Failed to render operation result';

/**
 * Turns outcomes into {@link StructuredResult}s. Never throws.
 */
export class OutcomeReporter {
  private readonly logger: Logger;

  constructor(logger: Logger = new NoopLogger()) {
    this.logger = logger;
  }

  render<T>(outcome: Outcome<T>): StructuredResult<T> {
    try {
      if (outcome.status === 'success') {
        return { success: true, data: outcome.value };
      }

      const isTransient = outcome.classification.kind === FailureClass.Transient;
      const result: FailureResult = {
        success: false,
        error: outcome.message,
        isTransient,
        suggestion: isTransient ? TRANSIENT_SUGGESTION : PERMANENT_SUGGESTION,
        attempts: outcome.attempts,
      };
      if (outcome.classification.diagnosticCode !== undefined) {
        result.diagnosticCode = outcome.classification.diagnosticCode;
      }
      return result;
    } catch (error) {
      return this.fallback(outcome, error);
    }
  }

  /**
   * Renders an outcome as indented JSON.
   *
   * `bigint` values become decimal strings and buffers become hex strings.
   * Anything else JSON cannot carry (cycles, for one) yields the minimal
   * failure result instead.
   */
  renderJson<T>(outcome: Outcome<T>): string {
    const result = this.render(outcome);
    try {
      return JSON.stringify(result, jsonReplacer, 2);
    } catch (error) {
      return JSON.stringify(this.fallback(outcome, error), null, 2);
    }
  }

  private fallback(outcome: unknown, error: unknown): FailureResult {
    try {
      this.logger.error('Failed to render outcome', {
        error: error instanceof Error ? error.message : String(error),
      });
    } catch {
      // The logger is the last resort; nothing left to report to.
    }
    return {
      success: false,
      error: RENDER_FAILURE_MESSAGE,
      isTransient: false,
      suggestion: PERMANENT_SUGGESTION,
      attempts: attemptsOf(outcome),
    };
  }
}

function attemptsOf(outcome: unknown): number {
  try {
    if (typeof outcome === 'object' && outcome !== null && 'attempts' in outcome) {
      return typeof outcome.attempts === 'number' ? outcome.attempts : 0;
    }
  } catch {
    // A throwing getter leaves the count unknown.
  }
  return 0;
}

/**
 * JSON replacer for driver values.
 *
 * Buffers reach the replacer already converted by `Buffer#toJSON`, so they
 * are recognised by that shape.
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (isSerializedBuffer(value)) {
    return Buffer.from(value.data).toString('hex');
  }
  return value;
}

function isSerializedBuffer(value: unknown): value is { type: 'Buffer'; data: number[] } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Buffer' &&
    'data' in value &&
    Array.isArray(value.data) &&
    value.data.every((byte) => typeof byte === 'number')
  );
}
