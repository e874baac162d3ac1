/**
 * Tests for default application, validation and resolution precedence.
 */

import { describe, expect, it } from '@jest/globals';

import { withDefaults, validateConfig, resolveConfig } from '../defaults.js';
import { getDefaultConfig } from '../schema.js';
import type { IEnvReader } from '../env.js';

class StaticEnvReader implements IEnvReader {
  constructor(private readonly values: Record<string, string>) {}

  get(name: string): string | undefined {
    return this.values[name];
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    return value === 'true';
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    return value === undefined ? undefined : Number(value);
  }
}

describe('withDefaults', () => {
  it('should return the documented defaults for empty input', () => {
    expect(withDefaults({})).toEqual(getDefaultConfig());
    expect(withDefaults()).toEqual(getDefaultConfig());
  });

  it('should never overwrite caller-supplied values', () => {
    const config = withDefaults({
      enabled: true,
      serviceName: 'planner',
      tracing: { sampleRate: 0, insecure: false },
      metrics: { enabled: true },
      logging: { includeTraceId: false },
    });

    expect(config.enabled).toBe(true);
    expect(config.serviceName).toBe('planner');
    expect(config.tracing.sampleRate).toBe(0);
    expect(config.tracing.insecure).toBe(false);
    expect(config.tracing.endpoint).toBe('localhost:4317');
    expect(config.metrics.enabled).toBe(true);
    expect(config.metrics.intervalMs).toBe(60000);
    expect(config.logging.includeTraceId).toBe(false);
    expect(config.logging.level).toBe('info');
  });

  it('should keep an empty environment string', () => {
    expect(withDefaults({ environment: '' }).environment).toBe('');
  });

  it('should not mutate its input', () => {
    const input = { tracing: { sampleRate: 0.3 } };
    withDefaults(input);
    expect(input).toEqual({ tracing: { sampleRate: 0.3 } });
  });
});

describe('validateConfig', () => {
  it.each([0, 1])('should accept sampleRate %s', (sampleRate) => {
    const result = validateConfig(withDefaults({ tracing: { sampleRate } }));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.result.tracing.sampleRate).toBe(sampleRate);
    }
  });

  it.each([-0.1, 1.5])('should reject sampleRate %s with INVALID_CONFIG', (sampleRate) => {
    const result = validateConfig(withDefaults({ tracing: { sampleRate } }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('INVALID_CONFIG');
      expect(result.message).toBe(
        'Invalid telemetry configuration: tracing.sampleRate: sampleRate must be between 0 and 1'
      );
    }
  });

  it('should reject an empty service name', () => {
    const result = validateConfig(withDefaults({ serviceName: '' }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('INVALID_CONFIG');
      expect(result.message).toContain('serviceName');
    }
  });
});

describe('resolveConfig', () => {
  it('should apply environment over defaults', () => {
    const env = new StaticEnvReader({
      OTEL_SERVICE_NAME: 'env-service',
      OTEL_TRACES_SAMPLER_ARG: '0.25',
    });

    const config = resolveConfig({}, env);

    expect(config.serviceName).toBe('env-service');
    expect(config.tracing.sampleRate).toBe(0.25);
    expect(config.tracing.endpoint).toBe('localhost:4317');
  });

  it('should apply explicit input over environment', () => {
    const env = new StaticEnvReader({
      OTEL_SERVICE_NAME: 'env-service',
      AGENT_LOG_LEVEL: 'warn',
    });

    const config = resolveConfig({ serviceName: 'explicit', tracing: { sampleRate: 0 } }, env);

    expect(config.serviceName).toBe('explicit');
    expect(config.tracing.sampleRate).toBe(0);
    expect(config.logging.level).toBe('warn');
  });
});
