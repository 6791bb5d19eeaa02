import { describe, it, expect } from 'vitest';
import { PLACEHOLDER_DNS, validatePlayerConfig } from '../../src/client/config-check.js';

const placeholderWarning = {
  severity: 'WARNING',
  message: 'DNS is set to default value. Please configure your IPTV provider URL.',
  setting: 'dns',
};

describe('validatePlayerConfig', () => {
  it('should accept a configured provider URL', () => {
    expect(validatePlayerConfig({ dns: 'http://iptv.example.test:8080', cors: true })).toEqual([]);
  });

  it('should warn about the shipped placeholder', () => {
    expect(validatePlayerConfig({ dns: PLACEHOLDER_DNS, cors: false })).toEqual([placeholderWarning]);
  });

  it('should treat a missing or blank DNS as unconfigured', () => {
    expect(validatePlayerConfig({})).toEqual([placeholderWarning]);
    expect(validatePlayerConfig({ dns: '   ' })).toEqual([placeholderWarning]);
  });

  it('should add an error when CORS proxying is on without a provider', () => {
    expect(validatePlayerConfig({ dns: PLACEHOLDER_DNS, cors: true })).toEqual([
      placeholderWarning,
      {
        severity: 'ERROR',
        message: 'CORS is enabled but DNS is not configured. Player will not work.',
        setting: 'dns and cors',
      },
    ]);
  });
});
