import { describe, expect, test } from 'vitest';
import {
  EngineLogger,
  GraphError,
  LogLevel,
  createEngineLogger,
  createSilentLogger,
  type EngineLogEntry,
} from '../src/index.js';

function capture(level: LogLevel, format: 'text' | 'json' = 'text') {
  const lines: string[] = [];
  const entries: EngineLogEntry[] = [];
  const logger = new EngineLogger({
    level,
    format,
    colors: false,
    timestamp: false,
    source: 'Test',
    category: 'system',
    sink: (line, entry) => {
      lines.push(line);
      entries.push(entry);
    },
  });
  return { logger, lines, entries };
}

describe('EngineLogger', () => {
  test('filters below the configured level', () => {
    const { logger, lines } = capture(LogLevel.INFO);

    logger.debug('hidden');
    logger.info('Loaded', { count: 2, name: 'outreach' });
    logger.warn('Slow', { list: ['a', 'b'] });

    expect(lines).toEqual(['INFO  [system:Test] Loaded count=2 name=outreach', 'WARN  [system:Test] Slow list=["a","b"]']);
  });

  test('appends error details', () => {
    const { logger, lines } = capture(LogLevel.ERROR);

    logger.error('Rejected', GraphError.noEntry('outreach'));
    logger.error('Crashed', 'disk full');

    expect(lines).toEqual([
      'ERROR [system:Test] Rejected GraphError [LF-G-005]: Workflow "outreach" has no entry step: every step has a predecessor',
      'ERROR [system:Test] Crashed Error: disk full',
    ]);
  });

  test('binds source and context in child loggers', () => {
    const { logger, lines } = capture(LogLevel.DEBUG);

    logger.child({ source: 'Child', category: 'runtime', context: { stepId: 'a' } }).debug('Step', { n: 1, skip: undefined });

    expect(lines).toEqual(['DEBUG [runtime:Child] Step stepId=a n=1']);
  });

  test('writes pino JSON lines in json format', () => {
    const { logger, lines, entries } = capture(LogLevel.INFO, 'json');

    logger.info('Loaded', { steps: 3 });

    expect(JSON.parse(lines[0] ?? '')).toEqual({ level: 'info', category: 'system', source: 'Test', steps: 3, msg: 'Loaded' });
    expect(entries[0]).toMatchObject({ level: LogLevel.INFO, source: 'Test', message: 'Loaded', context: { steps: 3 } });
  });

  test('carries error details in json format', () => {
    const { logger, lines } = capture(LogLevel.INFO, 'json');

    logger.error('Rejected', GraphError.noEntry('outreach'));

    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'error',
      msg: 'Rejected',
      error: { name: 'GraphError', code: 'LF-G-005' },
    });
  });

  test('names the innermost source once in nested children', () => {
    const { logger, lines } = capture(LogLevel.INFO, 'json');

    logger
      .child({ source: 'WorkflowExecutor', category: 'runtime', context: { runId: 'run-1' } })
      .child({ source: 'StepExecutor', context: { stepId: 'a' } })
      .info('Step succeeded');

    expect(lines[0]?.match(/"source"/g)).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      level: 'info',
      runId: 'run-1',
      stepId: 'a',
      category: 'runtime',
      source: 'StepExecutor',
      msg: 'Step succeeded',
    });
  });

  test('logs nothing when silent', () => {
    expect(createSilentLogger().willLog(LogLevel.ERROR)).toBe(false);

    const logger = createEngineLogger({ level: 'warn', colors: false });
    expect(logger.willLog(LogLevel.INFO)).toBe(false);
    expect(logger.willLog(LogLevel.ERROR)).toBe(true);
  });
});
