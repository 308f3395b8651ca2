/**
 * Span helpers for patch engine operations.
 */

import { SpanKind, SpanStatusCode, context, trace } from '@opentelemetry/api';
import type { Attributes, Span } from '@opentelemetry/api';
import { getTracer } from './setup.js';
import { ATTR_ERROR_TYPE, ATTR_PATCHKIT_OPERATION } from './conventions.js';
import type { PatchkitOperationName } from './conventions.js';

const TRACER_NAME = 'patchkit.engine';

/**
 * Start a span for an engine operation, named `patchkit.<operation>`.
 */
export function startPatchSpan(operation: PatchkitOperationName, attributes: Attributes = {}): Span {
  const tracer = getTracer(TRACER_NAME);
  return tracer.startSpan(`patchkit.${operation}`, {
    kind: SpanKind.INTERNAL,
    attributes: {
      [ATTR_PATCHKIT_OPERATION]: operation,
      ...attributes,
    },
  });
}

/**
 * End a span, recording an error status when `error` is given.
 */
export function endPatchSpan(span: Span, error?: unknown): void {
  if (error !== undefined) {
    const errorType = error instanceof Error ? error.name : 'Error';
    span.setAttribute(ATTR_ERROR_TYPE, errorType);
    if (error instanceof Error) {
      span.recordException(error);
    }
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : String(error),
    });
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }
  span.end();
}

/**
 * Run `fn` inside a span that is active for its duration.
 * The span ends when the promise settles; a rejection is recorded and rethrown.
 *
 * @example
 * ```typescript
 * const result = await withPatchSpan('apply', { [ATTR_PATCHKIT_ROOT]: root }, async (span) => {
 *   const applied = await applier.applyPatch(proposal);
 *   span.setAttribute(ATTR_PATCHKIT_FILES_WRITTEN, applied.written.length);
 *   return applied;
 * });
 * ```
 */
export async function withPatchSpan<T>(
  operation: PatchkitOperationName,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = startPatchSpan(operation, attributes);
  const ctx = trace.setSpan(context.active(), span);
  try {
    const result = await context.with(ctx, () => fn(span));
    endPatchSpan(span);
    return result;
  } catch (error) {
    endPatchSpan(span, error);
    throw error;
  }
}

/**
 * Get the current active span from context.
 */
export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}
