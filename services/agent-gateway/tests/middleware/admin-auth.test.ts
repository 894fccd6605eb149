import { describe, expect, it } from 'vitest';
import { parseBasicAuth } from '../../src/middleware/admin-auth.js';

function basic(value: string): string {
  return `Basic ${Buffer.from(value, 'utf-8').toString('base64')}`;
}

describe('parseBasicAuth', () => {
  it('decodes username and password', () => {
    expect(parseBasicAuth(basic('admin:test-secret'))).toEqual({ username: 'admin', password: 'test-secret' });
  });

  it('keeps colons inside the password', () => {
    expect(parseBasicAuth(basic('admin:a:b'))).toEqual({ username: 'admin', password: 'a:b' });
  });

  it('accepts a lowercase scheme', () => {
    expect(parseBasicAuth(`basic ${Buffer.from('ops:pw').toString('base64')}`)).toEqual({ username: 'ops', password: 'pw' });
  });

  it('rejects missing, non-basic and malformed headers', () => {
    expect(parseBasicAuth(undefined)).toBeNull();
    expect(parseBasicAuth('Bearer test-secret')).toBeNull();
    expect(parseBasicAuth(basic('no-separator'))).toBeNull();
  });
});
