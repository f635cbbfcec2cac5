import assert from 'node:assert/strict';
import { test } from 'node:test';

import { formatTimestamp, normalizeTimestamp } from '../src';

test('formats dates as zone-less UTC with milliseconds', () => {
  assert.equal(formatTimestamp(new Date(Date.UTC(2024, 8, 24, 1, 2, 3, 4))), '2024-09-24T01:02:03.004');
});

test('normalizes zone-less timestamps textually', () => {
  assert.equal(normalizeTimestamp('2024-09-24T10:15:00'), '2024-09-24T10:15:00.000');
  assert.equal(normalizeTimestamp('2024-09-24 10:15:00.123456'), '2024-09-24T10:15:00.123');
  assert.equal(normalizeTimestamp('2024-09-24T10:15:00.5'), '2024-09-24T10:15:00.500');
  assert.equal(normalizeTimestamp('2024-09-24'), '2024-09-24T00:00:00.000');
});

test('converts zoned and HTTP-date timestamps to UTC', () => {
  assert.equal(normalizeTimestamp('2024-09-24T10:15:00+02:00'), '2024-09-24T08:15:00.000');
  assert.equal(normalizeTimestamp('2024-09-24T10:15:00.250Z'), '2024-09-24T10:15:00.250');
  assert.equal(normalizeTimestamp('Thu, 12 Feb 2026 00:00:00 GMT'), '2026-02-12T00:00:00.000');
});

test('rejects unreadable and impossible dates', () => {
  assert.equal(normalizeTimestamp('yesterday'), null);
  assert.equal(normalizeTimestamp('2024-02-30'), null);
  assert.equal(normalizeTimestamp('2024-13-01T00:00:00'), null);
});
