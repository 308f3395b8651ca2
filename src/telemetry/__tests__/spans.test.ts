/**
 * Tests for patch engine span helpers.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SpanStatusCode } from '@opentelemetry/api';
import {
  withPatchSpan,
  startPatchSpan,
  endPatchSpan,
  ATTR_PATCHKIT_OPERATION,
  ATTR_PATCHKIT_ROOT,
  ATTR_PATCHKIT_FILES_WRITTEN,
  ATTR_ERROR_TYPE,
} from '../index.js';
import { initializeTestTelemetry, type SpanCapture } from './test-helpers.js';

describe('patch spans', () => {
  let capture: SpanCapture;

  beforeEach(async () => {
    capture = await initializeTestTelemetry();
  });

  afterEach(async () => {
    await capture.shutdown();
  });

  it('names spans after the operation and records attributes', async () => {
    const value = await withPatchSpan('apply', { [ATTR_PATCHKIT_ROOT]: '/tmp/proj' }, (span) => {
      span.setAttribute(ATTR_PATCHKIT_FILES_WRITTEN, 2);
      return Promise.resolve('done');
    });

    expect(value).toBe('done');
    const span = capture.getFirstSpan();
    expect(span.name).toBe('patchkit.apply');
    expect(capture.getAttribute(span, ATTR_PATCHKIT_OPERATION)).toBe('apply');
    expect(capture.getAttribute(span, ATTR_PATCHKIT_ROOT)).toBe('/tmp/proj');
    expect(capture.getAttribute(span, ATTR_PATCHKIT_FILES_WRITTEN)).toBe(2);
    expect(span.status.code).toBe(SpanStatusCode.OK);
  });

  it('records error status and rethrows', async () => {
    await expect(
      withPatchSpan('rollback', {}, () => Promise.reject(new TypeError('bad id')))
    ).rejects.toThrow('bad id');

    const span = capture.getFirstSpan();
    expect(span.status.code).toBe(SpanStatusCode.ERROR);
    expect(span.status.message).toBe('bad id');
    expect(capture.getAttribute(span, ATTR_ERROR_TYPE)).toBe('TypeError');
  });

  it('supports manual start and end', () => {
    const span = startPatchSpan('rename', { 'patchkit.symbol.old': 'foo' });
    endPatchSpan(span, 'plain failure');

    const finished = capture.getSpansByName('patchkit.rename');
    expect(finished).toHaveLength(1);
    expect(finished[0]?.status.message).toBe('plain failure');
    expect(finished[0] && capture.getAttribute(finished[0], ATTR_ERROR_TYPE)).toBe('Error');
  });
});
