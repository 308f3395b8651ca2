/**
 * OpenTelemetry setup and initialization.
 *
 * Key design decisions:
 * - Manual spans only, registered on a BasicTracerProvider
 * - Zero overhead when disabled (the API's no-op tracer)
 * - Exporters are never contacted at initialization; OTLP export happens
 *   per span through the SimpleSpanProcessor
 */

import { trace, diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import type { Tracer } from '@opentelemetry/api';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import {
  BasicTracerProvider,
  ConsoleSpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';

import type {
  TelemetryOptions,
  TelemetryInitResult,
  TelemetryResponse,
  TelemetryHelpers,
  ExporterType,
} from './types.js';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const DEFAULT_SERVICE_NAME = 'patchkit';
const DEFAULT_SERVICE_VERSION = '0.1.0';
const DEFAULT_OTLP_HTTP_ENDPOINT = 'http://localhost:4318/v1/traces';

// -----------------------------------------------------------------------------
// Module State
// -----------------------------------------------------------------------------

let initialized = false;
let tracerProvider: BasicTracerProvider | null = null;
let initResult: TelemetryInitResult | null = null;

function successResponse<T>(result: T, message: string): TelemetryResponse<T> {
  return { success: true, result, message };
}

function disabledResult(serviceName: string): TelemetryInitResult {
  return { enabled: false, exporterType: 'none', serviceName };
}

// -----------------------------------------------------------------------------
// Main Setup Function
// -----------------------------------------------------------------------------

/**
 * Initialize OpenTelemetry.
 *
 * @example
 * const result = await initializeTelemetry({ exporterType: 'console' });
 * if (result.success) {
 *   console.log(`Telemetry enabled: ${result.result.enabled}`);
 * }
 */
export async function initializeTelemetry(
  options: TelemetryOptions = {}
): Promise<TelemetryResponse<TelemetryInitResult>> {
  const debug = options.onDebug ?? ((_msg: string): void => {});
  const serviceName = options.serviceName ?? DEFAULT_SERVICE_NAME;

  if (initialized) {
    return {
      success: false,
      error: 'ALREADY_INITIALIZED',
      message: 'Telemetry has already been initialized. Call shutdown() first to reinitialize.',
    };
  }

  if (options.config?.enabled === false && options.exporter === undefined) {
    debug('Telemetry disabled via configuration');
    initResult = disabledResult(serviceName);
    initialized = true;
    return successResponse(initResult, 'Telemetry disabled');
  }

  const exporterType: ExporterType = options.exporterType ?? 'otlp';
  const endpoint =
    exporterType === 'otlp'
      ? (options.endpoint ?? options.config?.otlpEndpoint ?? DEFAULT_OTLP_HTTP_ENDPOINT)
      : undefined;

  let exporter: SpanExporter;
  if (options.exporter !== undefined) {
    debug('Using custom span exporter');
    exporter = options.exporter;
  } else {
    switch (exporterType) {
      case 'otlp':
        debug(`Creating OTLP HTTP exporter for ${endpoint ?? 'default'}`);
        exporter = new OTLPTraceExporter({ url: endpoint });
        break;
      case 'console':
        debug('Creating console exporter');
        exporter = new ConsoleSpanExporter();
        break;
      case 'none':
        debug('No exporter configured (no-op mode)');
        initResult = disabledResult(serviceName);
        initialized = true;
        return successResponse(initResult, 'Telemetry initialized with none exporter');
    }
  }

  try {
    // In OTel SDK 2.x, use resourceFromAttributes instead of new Resource()
    const resource = resourceFromAttributes({
      [ATTR_SERVICE_NAME]: serviceName,
      [ATTR_SERVICE_VERSION]: options.serviceVersion ?? DEFAULT_SERVICE_VERSION,
    });

    tracerProvider = new BasicTracerProvider({
      resource,
      spanProcessors: [new SimpleSpanProcessor(exporter)],
    });

    // In OTel SDK 2.x, use trace.setGlobalTracerProvider() instead of provider.register()
    trace.setGlobalTracerProvider(tracerProvider);
  } catch (err) {
    tracerProvider = null;
    const message = err instanceof Error ? err.message : 'Unknown error creating tracer provider';
    return { success: false, error: 'INITIALIZATION_FAILED', message };
  }

  if (process.env['DEBUG_OTEL'] === 'true') {
    diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.DEBUG);
  }

  initResult = {
    enabled: true,
    exporterType,
    endpoint,
    serviceName,
  };
  initialized = true;
  debug(`Telemetry initialized: ${JSON.stringify(initResult)}`);

  return successResponse(initResult, `Telemetry initialized with ${exporterType} exporter`);
}

// -----------------------------------------------------------------------------
// Getter Functions
// -----------------------------------------------------------------------------

/**
 * Get a tracer instance for creating spans.
 * Returns a no-op tracer if telemetry is not initialized or disabled.
 */
export function getTracer(name?: string, version?: string): Tracer {
  const tracerName = name ?? initResult?.serviceName ?? DEFAULT_SERVICE_NAME;
  return trace.getTracer(tracerName, version);
}

export function isEnabled(): boolean {
  return initialized && (initResult?.enabled ?? false);
}

/**
 * Get the current telemetry configuration, or null if not initialized.
 */
export function getConfig(): TelemetryInitResult | null {
  return initResult;
}

/**
 * Shutdown telemetry, flushing any pending spans.
 * Must be called before reinitializing.
 */
export async function shutdown(): Promise<TelemetryResponse> {
  if (!initialized) {
    return {
      success: false,
      error: 'NOT_INITIALIZED',
      message: 'Telemetry is not initialized',
    };
  }

  try {
    if (tracerProvider) {
      await tracerProvider.shutdown();
      tracerProvider = null;
    }
    // Disable the global tracer provider to allow re-initialization
    trace.disable();
    initialized = false;
    initResult = null;
    return successResponse(undefined, 'Telemetry shutdown complete');
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error during shutdown';
    return {
      success: false,
      error: 'UNKNOWN',
      message,
    };
  }
}

export const telemetryHelpers: TelemetryHelpers = {
  getTracer,
  isEnabled,
  getConfig,
  shutdown,
};
