import { describe, expect, test } from 'vitest';
import { EngineLogger, EnvInterpolator, ErrorCode, LogLevel, SchemaError } from '../src/index.js';
import { captureError } from './helpers.js';

describe('EnvInterpolator', () => {
  test('replaces placeholders in nested strings and copies other values', () => {
    const interpolator = new EnvInterpolator({ env: { API_KEY: 'test-secret', REGION: 'eu' } });

    const result = interpolator.interpolate(
      { key: '{{ API_KEY }}', urls: ['https://{{REGION}}.example.test'], limit: 3, enabled: true },
      'tools',
    );

    expect(result).toEqual({ key: 'test-secret', urls: ['https://eu.example.test'], limit: 3, enabled: true });
    expect(interpolator.unresolved).toEqual([]);
  });

  test('keeps unknown placeholders and warns once per variable', () => {
    const lines: string[] = [];
    const logger = new EngineLogger({
      level: LogLevel.WARN,
      colors: false,
      timestamp: false,
      sink: (line) => lines.push(line),
    });
    const interpolator = new EnvInterpolator({ env: {}, logger });

    expect(interpolator.interpolate('{{MISSING}}-{{MISSING}}', 'config.key')).toBe('{{MISSING}}-{{MISSING}}');
    expect(interpolator.unresolved).toEqual(['MISSING']);
    expect(lines).toEqual([
      'WARN  [analysis:EnvInterpolator] Environment variable not set; placeholder kept variable=MISSING path=config.key',
    ]);
  });

  test('throws in strict mode with the location', () => {
    const interpolator = new EnvInterpolator({ env: {}, strict: true });

    const error = captureError(() => interpolator.interpolate({ nested: ['{{TOKEN}}'] }, 'tools[0].config'), SchemaError);

    expect(error.code).toBe(ErrorCode.SCHEMA_UNRESOLVED_VARIABLE);
    expect(error.path).toBe('tools[0].config.nested[0]');
  });

  test('leaves non-variable braces alone', () => {
    const interpolator = new EnvInterpolator({ env: { A: '1' } });

    expect(interpolator.interpolate('{{search.leads}} {{A}}', 'x')).toBe('{{search.leads}} 1');
  });
});
