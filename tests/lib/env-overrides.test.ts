import { describe, it, expect } from 'vitest';
import { parseOverrides } from '../../src/lib/env-overrides.js';

describe('parseOverrides', () => {
  it('should return empty overrides for empty or blank input', () => {
    expect(parseOverrides('')).toEqual({ overrides: {} });
    expect(parseOverrides('   ')).toEqual({ overrides: {} });
    expect(parseOverrides(undefined)).toEqual({ overrides: {} });
  });

  it('should split pairs and trim whitespace', () => {
    expect(parseOverrides(' host = a.example.com , user=qa ')).toEqual({
      overrides: { host: 'a.example.com', user: 'qa' },
    });
  });

  it('should split only on the first equals sign', () => {
    expect(parseOverrides('query=a=b').overrides).toEqual({ query: 'a=b' });
  });

  it('should extract zone_env from the overrides', () => {
    expect(parseOverrides('zone_env=boe_test,user=qa')).toEqual({
      overrides: { user: 'qa' },
      zoneEnv: 'boe_test',
    });
  });

  it('should skip fragments without a key or an equals sign', () => {
    expect(parseOverrides('novalue,=orphan,,ok=1').overrides).toEqual({ ok: '1' });
  });

  it('should keep the last value for duplicate keys', () => {
    expect(parseOverrides('user=a,USER=b').overrides).toEqual({ user: 'b' });
  });
});
