import { describe, it, expect } from 'vitest';
import { CACHE_TTL, LIMITS, POINTS, UPSTREAM } from '../src/core/constants.js';

describe('constants', () => {
  it('should have all required cache TTL values', () => {
    expect(CACHE_TTL.RECENT_SECONDS).toBe(60);
    expect(CACHE_TTL.UPCOMING_SECONDS).toBe(60);
    expect(CACHE_TTL.STANDINGS_SECONDS).toBe(300);
    expect(CACHE_TTL.BROADCASTS_SECONDS).toBe(60);
  });

  it('should keep default counts within their ceilings', () => {
    expect(LIMITS.DEFAULT_UPCOMING).toBeLessThanOrEqual(LIMITS.MAX_UPCOMING);
    expect(LIMITS.DEFAULT_RECENT).toBeLessThanOrEqual(LIMITS.MAX_RECENT);
  });

  it('should have all required upstream values', () => {
    expect(UPSTREAM.TIMEOUT_MS).toBe(10000);
    expect(UPSTREAM.RETRY_ATTEMPTS).toBe(1);
    expect(UPSTREAM.RETRY_DELAY_MS).toBe(250);
  });

  it('should award two points per win and one per overtime loss', () => {
    expect(POINTS.WIN).toBe(2);
    expect(POINTS.OT_LOSS).toBe(1);
  });
});
