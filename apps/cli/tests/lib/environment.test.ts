import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { refreshEnvironment, getSymbols, shouldUseColors, isVerbose } from '../../src/lib/environment.js';

describe('environment', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env['NO_COLOR'];
    delete process.env['FORCE_COLOR'];
    delete process.env['GROUNDCHECK_NO_COLOR'];
    delete process.env['GROUNDCHECK_NO_UNICODE'];
    delete process.env['GROUNDCHECK_VERBOSE'];
    delete process.env['GROUNDCHECK_DEBUG'];
    delete process.env['DEBUG'];
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
    refreshEnvironment();
  });

  describe('colors', () => {
    it('respects NO_COLOR', () => {
      process.env['NO_COLOR'] = '';
      process.env['FORCE_COLOR'] = '1';
      refreshEnvironment();
      expect(shouldUseColors()).toBe(false);
    });

    it('respects GROUNDCHECK_NO_COLOR', () => {
      process.env['GROUNDCHECK_NO_COLOR'] = 'true';
      process.env['FORCE_COLOR'] = '1';
      refreshEnvironment();
      expect(shouldUseColors()).toBe(false);
    });

    it('ignores GROUNDCHECK_NO_COLOR values that are not on', () => {
      process.env['GROUNDCHECK_NO_COLOR'] = 'false';
      process.env['FORCE_COLOR'] = '1';
      refreshEnvironment();
      expect(shouldUseColors()).toBe(true);
    });

    it('respects FORCE_COLOR=0', () => {
      process.env['FORCE_COLOR'] = '0';
      refreshEnvironment();
      expect(shouldUseColors()).toBe(false);
    });
  });

  describe('getSymbols', () => {
    it('falls back to ASCII when Unicode is disabled', () => {
      process.env['GROUNDCHECK_NO_UNICODE'] = '1';
      refreshEnvironment();
      expect(getSymbols().tick).toBe('√');
      expect(getSymbols().arrow).toBe('->');
    });
  });

  describe('isVerbose', () => {
    it('reads GROUNDCHECK_VERBOSE', () => {
      process.env['GROUNDCHECK_VERBOSE'] = 'yes';
      refreshEnvironment();
      expect(isVerbose()).toBe(true);
    });

    it('is off by default', () => {
      refreshEnvironment();
      expect(isVerbose()).toBe(false);
    });
  });

  describe('refreshEnvironment', () => {
    it('reports the Node.js major version', () => {
      const major = Number(process.versions.node.split('.')[0]);
      expect(refreshEnvironment().nodeVersion.major).toBe(major);
    });
  });
});
