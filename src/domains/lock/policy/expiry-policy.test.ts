import { describe, it, expect } from 'vitest';
import { ExpiryPolicy, resourceClassOf, DEFAULT_TTL_MS } from './expiry-policy.js';
import { ValidationError } from '../../../shared/errors/index.js';

describe('ExpiryPolicy', () => {
  it('defaults to a 15 minute TTL and 2 second skew', () => {
    const policy = new ExpiryPolicy();
    expect(policy.ttlFor('42')).toBe(DEFAULT_TTL_MS);
    expect(policy.ttlFor('42')).toBe(900_000);
    expect(policy.clockSkewMs).toBe(2000);
  });

  it('treats the expiry instant itself as expired', () => {
    const policy = new ExpiryPolicy({ ttlMs: 900_000 });
    expect(policy.isExpired(900_000, 899_999)).toBe(false);
    expect(policy.isExpired(900_000, 900_000)).toBe(true);
  });

  it('uses the skew tolerance as the renew grace', () => {
    expect(new ExpiryPolicy({ ttlMs: 900_000, clockSkewMs: 1500 }).renewGraceMs).toBe(1500);
  });

  it('computes expiry and heartbeat from the TTL', () => {
    const policy = new ExpiryPolicy({ ttlMs: 900_000 });
    expect(policy.expiresAtFrom(10_000, 'conference:42')).toBe(910_000);
    expect(policy.heartbeatIntervalMs('conference:42')).toBe(300_000);
  });

  it('applies per-class TTLs by id prefix', () => {
    const policy = new ExpiryPolicy({ ttlMs: 900_000, classTtls: { session: 300_000 } });
    expect(policy.ttlFor('session:7')).toBe(300_000);
    expect(policy.ttlFor('conference:7')).toBe(900_000);
    expect(policy.ttlFor('7')).toBe(900_000);
    expect(policy.heartbeatIntervalMs('session:7')).toBe(100_000);
  });

  it('rejects invalid settings', () => {
    expect(() => new ExpiryPolicy({ ttlMs: 0 })).toThrow(ValidationError);
    expect(() => new ExpiryPolicy({ clockSkewMs: -1 })).toThrow(ValidationError);
    expect(() => new ExpiryPolicy({ ttlMs: 6000, clockSkewMs: 2000 })).toThrow(
      'clock skew tolerance (2000ms) must be below a third of the shortest TTL (6000ms)'
    );
    expect(() => new ExpiryPolicy({ classTtls: { session: 3000 } })).toThrow(ValidationError);
  });
});

describe('resourceClassOf', () => {
  it('reads the prefix before the first colon', () => {
    expect(resourceClassOf('conference:42')).toBe('conference');
    expect(resourceClassOf('a:b:c')).toBe('a');
    expect(resourceClassOf('42')).toBeUndefined();
    expect(resourceClassOf(':42')).toBeUndefined();
  });
});
