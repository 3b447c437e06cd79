import { describe, it, expect } from 'vitest';
import { isIpAllowed, isLoopback, isValidWhitelistEntry, normalizeIp } from '../src/maintenance/ip.js';

describe('normalizeIp', () => {
  it('canonicalises addresses for comparison', () => {
    expect(normalizeIp(' LOCALHOST ')).toBe('127.0.0.1');
    expect(normalizeIp('::ffff:10.0.0.1')).toBe('10.0.0.1');
    expect(normalizeIp('::ffff:7f00:1')).toBe('127.0.0.1');
    expect(normalizeIp('0:0:0:0:0:FFFF:C633:6407')).toBe('198.51.100.7');
    expect(normalizeIp('[::1]')).toBe('::1');
    expect(normalizeIp('fe80::1%eth0')).toBe('fe80::1');
    expect(normalizeIp('2001:DB8:0:0:0:0:0:1')).toBe('2001:db8::1');
  });
});

describe('isLoopback', () => {
  it('covers 127.0.0.0/8, ::1 and mapped loopback', () => {
    expect(isLoopback('127.8.8.8')).toBe(true);
    expect(isLoopback('::1')).toBe(true);
    expect(isLoopback('::ffff:127.0.0.1')).toBe(true);
    expect(isLoopback('::ffff:7f00:1')).toBe(true);
    expect(isLoopback('10.0.0.1')).toBe(false);
  });
});

describe('isIpAllowed', () => {
  it('always allows loopback, even with an empty list', () => {
    expect(isIpAllowed('127.0.0.1', [])).toBe(true);
    expect(isIpAllowed('localhost', [])).toBe(true);
  });

  it('matches exact entries after normalization', () => {
    expect(isIpAllowed('::ffff:192.168.1.10', ['192.168.1.10'])).toBe(true);
    expect(isIpAllowed('2001:db8::1', ['2001:DB8:0:0:0:0:0:1'])).toBe(true);
    expect(isIpAllowed('192.168.1.11', ['192.168.1.10'])).toBe(false);
  });

  it('matches CIDR ranges of the same family', () => {
    expect(isIpAllowed('192.168.1.77', ['192.168.1.0/24'])).toBe(true);
    expect(isIpAllowed('192.168.2.1', ['192.168.1.0/24'])).toBe(false);
    expect(isIpAllowed('fd00::5', ['fd00::/8'])).toBe(true);
    expect(isIpAllowed('192.168.1.77', ['fd00::/8'])).toBe(false);
  });
});

describe('isValidWhitelistEntry', () => {
  it('accepts addresses and ranges only', () => {
    expect(isValidWhitelistEntry('10.0.0.1')).toBe(true);
    expect(isValidWhitelistEntry('localhost')).toBe(true);
    expect(isValidWhitelistEntry('10.0.0.0/8')).toBe(true);
    expect(isValidWhitelistEntry('10.0.0.0/33')).toBe(false);
    expect(isValidWhitelistEntry('example.com')).toBe(false);
  });
});
