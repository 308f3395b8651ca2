/**
 * Jest setup file for test environment configuration.
 *
 * Leaves no global tracer provider registered between test files.
 */

import { afterAll } from '@jest/globals';
import { trace } from '@opentelemetry/api';

afterAll(() => {
  trace.disable();
});
