/**
 * Config Schema Validation Tests
 */

import { describe, it, expect } from 'vitest';
import { UserConfigSchema, resolveConfig, DEFAULT_CONFIG } from '../../src/config/schema.js';

describe('UserConfigSchema', () => {
  it('accepts an empty object', () => {
    expect(UserConfigSchema.safeParse({}).success).toBe(true);
  });

  it('keeps unknown top-level keys', () => {
    const result = UserConfigSchema.safeParse({ theme: 'dark' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.theme).toBe('dark');
    }
  });

  it('rejects unknown keys inside a section', () => {
    expect(UserConfigSchema.safeParse({ display: { preview: 10 } }).success).toBe(false);
  });

  it('rejects a zero preview length', () => {
    expect(UserConfigSchema.safeParse({ display: { previewLength: 0 } }).success).toBe(false);
  });

  it('accepts a zero JSON prefix threshold', () => {
    expect(UserConfigSchema.safeParse({ normalizer: { primaryJsonPrefixThreshold: 0 } }).success).toBe(true);
  });

  it('rejects empty skipTools entries', () => {
    expect(UserConfigSchema.safeParse({ batching: { skipTools: [''] } }).success).toBe(false);
  });

  it('rejects unknown log levels', () => {
    expect(UserConfigSchema.safeParse({ logging: { level: 'verbose' } }).success).toBe(false);
  });
});

describe('resolveConfig', () => {
  it('fills every default', () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('does not share the skipTools array with the defaults', () => {
    const resolved = resolveConfig();
    resolved.batching.skipTools.push('x');
    expect(DEFAULT_CONFIG.batching.skipTools).toEqual([]);
  });

  it('applies partial sections', () => {
    const resolved = resolveConfig({ logging: { file: '/tmp/timeline.log' } });
    expect(resolved.logging).toEqual({ level: 'warn', file: '/tmp/timeline.log' });
  });
});
