import { describe, expect, it } from 'vitest';
import { hostName, rejectRequest } from '../src/httpGuard.js';

describe('hostName', () => {
  it('drops the port and keeps IPv6 brackets', () => {
    expect(hostName('Example.com:3000')).toBe('example.com');
    expect(hostName('[::1]:3000')).toBe('[::1]');
    expect(hostName('localhost')).toBe('localhost');
  });
});

describe('rejectRequest', () => {
  const allow = { hosts: new Set(['localhost', '[::1]']), origins: new Set(['http://localhost:5173']) };

  it('lets listed hosts and origins through', () => {
    expect(rejectRequest({ host: 'localhost:3000', origin: 'http://localhost:5173' }, allow)).toBeNull();
    expect(rejectRequest({ host: '[::1]:3000' }, allow)).toBeNull();
  });

  it('rejects unlisted hosts before checking the origin', () => {
    expect(rejectRequest({ host: 'evil.example:3000', origin: 'http://evil.example' }, allow)).toBe('Forbidden host');
    expect(rejectRequest({ host: 'localhost', origin: 'http://evil.example' }, allow)).toBe('Forbidden origin');
  });

  it('allows everything when no lists are configured', () => {
    expect(rejectRequest({ host: 'anything:1', origin: 'http://anywhere' }, { hosts: new Set(), origins: new Set() })).toBeNull();
  });
});
