/**
 * Telemetry type definitions.
 */

import type { Tracer } from '@opentelemetry/api';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import type { TelemetryConfig } from '../config/schema.js';

// -----------------------------------------------------------------------------
// Error Types
// -----------------------------------------------------------------------------

/**
 * Telemetry-specific error codes.
 */
export type TelemetryErrorCode =
  | 'INITIALIZATION_FAILED'
  | 'INVALID_CONFIG'
  | 'ALREADY_INITIALIZED'
  | 'NOT_INITIALIZED'
  | 'UNKNOWN';

export interface TelemetrySuccessResponse<T = void> {
  success: true;
  result: T;
  message: string;
}

export interface TelemetryErrorResponse {
  success: false;
  error: TelemetryErrorCode;
  message: string;
}

export type TelemetryResponse<T = void> = TelemetrySuccessResponse<T> | TelemetryErrorResponse;

// -----------------------------------------------------------------------------
// Configuration Types
// -----------------------------------------------------------------------------

export type ExporterType = 'otlp' | 'console' | 'none';

/**
 * Options for telemetry initialization.
 */
export interface TelemetryOptions {
  /** Telemetry section of the project config; disabled config means no-op */
  config?: TelemetryConfig;
  /** Exporter to create (defaults to 'otlp') */
  exporterType?: ExporterType;
  /** OTLP HTTP endpoint (overrides config) */
  endpoint?: string;
  /** Service name for traces (defaults to 'patchkit') */
  serviceName?: string;
  serviceVersion?: string;
  /** Span exporter to use instead of the exporter type, e.g. an in-memory one in tests */
  exporter?: SpanExporter;
  onDebug?: (message: string) => void;
}

/**
 * Telemetry initialization result.
 */
export interface TelemetryInitResult {
  /** Whether spans are being exported */
  enabled: boolean;
  exporterType: ExporterType;
  /** The endpoint being used (OTLP only) */
  endpoint?: string;
  serviceName: string;
}

/**
 * Telemetry helpers interface.
 */
export interface TelemetryHelpers {
  getTracer(name?: string, version?: string): Tracer;
  isEnabled(): boolean;
  getConfig(): TelemetryInitResult | null;
  shutdown(): Promise<TelemetryResponse>;
}

// -----------------------------------------------------------------------------
// Type Guards
// -----------------------------------------------------------------------------

export function isTelemetrySuccess<T>(
  response: TelemetryResponse<T>
): response is TelemetrySuccessResponse<T> {
  return response.success;
}

export function isTelemetryError(
  response: TelemetryResponse<unknown>
): response is TelemetryErrorResponse {
  return !response.success;
}
