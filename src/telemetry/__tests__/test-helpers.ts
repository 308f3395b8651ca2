/**
 * Test helpers for telemetry span validation.
 */

import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { initializeTelemetry, shutdown } from '../index.js';

/**
 * Helper for capturing and inspecting spans in tests.
 */
export interface SpanCapture {
  exporter: InMemorySpanExporter;
  getSpans: () => ReadableSpan[];
  /** Get the first span (throws if none) */
  getFirstSpan: () => ReadableSpan;
  getSpansByName: (name: string) => ReadableSpan[];
  getAttribute: (span: ReadableSpan, key: string) => unknown;
  reset: () => void;
  shutdown: () => Promise<void>;
}

/**
 * Initialize telemetry with an in-memory exporter.
 *
 * NOTE: Always call `await capture.shutdown()` in afterEach.
 */
export async function initializeTestTelemetry(): Promise<SpanCapture> {
  // Always shutdown first to ensure clean state
  await shutdown();

  const exporter = new InMemorySpanExporter();
  await initializeTelemetry({ exporter, serviceName: 'test-service' });

  return {
    exporter,

    getSpans(): ReadableSpan[] {
      return exporter.getFinishedSpans();
    },

    getFirstSpan(): ReadableSpan {
      const first = exporter.getFinishedSpans()[0];
      if (first === undefined) {
        throw new Error('No spans captured');
      }
      return first;
    },

    getSpansByName(name: string): ReadableSpan[] {
      return exporter.getFinishedSpans().filter((span) => span.name === name);
    },

    getAttribute(span: ReadableSpan, key: string): unknown {
      return span.attributes[key];
    },

    reset(): void {
      exporter.reset();
    },

    async shutdown(): Promise<void> {
      await shutdown();
    },
  };
}
