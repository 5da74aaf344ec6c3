import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { SecurityEvent } from '../src/domain/index.js';

let counter = 0;

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<SecurityEvent> = {}): SecurityEvent {
  counter++;
  return {
    event_id: overrides.event_id ?? `test-${counter}`,
    timestamp: overrides.timestamp ?? '2026-02-18T12:00:00Z',
    source_address: overrides.source_address ?? '185.60.216.35',
    description: overrides.description ?? 'Failed login attempt',
    country: overrides.country ?? 'Unknown',
    city: overrides.city ?? 'Unknown',
    latitude: overrides.latitude ?? null,
    longitude: overrides.longitude ?? null,
    is_threat: overrides.is_threat ?? true,
  };
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** Fixed "now" for deterministic clock-driven tests. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

export interface TestClock {
  now: number;
  readonly fn: () => number;
  advance(seconds: number): void;
}

/** Mutable clock: `clock.fn` reads `clock.now`. */
export function makeClock(start: number = FIXED_NOW): TestClock {
  const clock: TestClock = {
    now: start,
    fn: () => clock.now,
    advance(seconds: number): void {
      clock.now += seconds * 1000;
    },
  };
  return clock;
}
