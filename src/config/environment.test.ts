import { describe, it, expect } from 'vitest';
import { environmentConfig, getEnvironmentConfig } from './environment';
import { LogLevel } from '../types/environment';

/**
 * Test Suite: Environment Configuration
 *
 * Covers defaults, case handling for LOG_LEVEL and the errors raised for
 * values outside the allowed sets.
 */
describe('Environment Configuration', () => {
  it('should use NODE_ENV from environment', () => {
    // Vitest sets NODE_ENV to 'test' by default
    expect(environmentConfig.environment).toBe('test');
  });

  it('should apply defaults when nothing is set', () => {
    expect(getEnvironmentConfig({})).toEqual({
      environment: 'development',
      logLevel: LogLevel.INFO,
      defaultPreset: 'category',
    });
  });

  it('should read every supported variable', () => {
    expect(
      getEnvironmentConfig({
        NODE_ENV: 'production',
        LOG_LEVEL: 'warn',
        REPORT_PRESET: ' services ',
      })
    ).toEqual({
      environment: 'production',
      logLevel: LogLevel.WARN,
      defaultPreset: 'services',
    });
  });

  it('should fall back to the default preset for a blank REPORT_PRESET', () => {
    expect(getEnvironmentConfig({ REPORT_PRESET: '  ' }).defaultPreset).toBe('category');
  });

  it('should reject an unknown NODE_ENV', () => {
    expect(() => getEnvironmentConfig({ NODE_ENV: 'staging' })).toThrow(
      'Invalid NODE_ENV: "staging". Must be one of: development, production, test'
    );
  });

  it('should reject an unknown LOG_LEVEL', () => {
    expect(() => getEnvironmentConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid LOG_LEVEL: "verbose". Must be one of: DEBUG, INFO, WARN, ERROR'
    );
  });
});
