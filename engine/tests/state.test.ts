import { describe, expect, test } from 'vitest';
import {
  ErrorCode,
  ExecutionState,
  StateError,
  defineStep,
  defineWorkflow,
  type StepResult,
} from '../src/index.js';
import { captureError } from './helpers.js';

const spec = defineWorkflow('outreach')
  .step(defineStep('search').handler('prospect_search').next('enrich'))
  .step(defineStep('enrich').handler('enrichment'))
  .build();

function succeeded(stepId: string, output: Record<string, unknown> = {}): StepResult {
  const at = new Date();
  return {
    status: 'succeeded',
    stepId,
    handler: 'noop',
    output,
    absentInputs: [],
    startedAt: at,
    completedAt: at,
    duration: 0,
  };
}

describe('ExecutionState', () => {
  test('records one frozen result per step', () => {
    const state = new ExecutionState('run-1', spec);

    const recorded = state.record(succeeded('search', { leads: ['acme'] }));

    expect(state.has('search')).toBe(true);
    expect(state.get('search')).toBe(recorded);
    expect(Object.isFrozen(recorded)).toBe(true);
    expect(recorded.status === 'succeeded' && Object.isFrozen(recorded.output)).toBe(true);
    expect(state.size).toBe(1);
  });

  test('freezes nested output values', () => {
    const state = new ExecutionState('run-1', spec);
    const sentAt = new Date('2026-03-02T09:00:00.000Z');
    const output = { leads: [{ company: 'acme' }], meta: { sentAt } };

    state.record(succeeded('search', output));

    expect(Object.isFrozen(output.leads)).toBe(true);
    expect(Object.isFrozen(output.leads[0])).toBe(true);
    expect(Object.isFrozen(output.meta)).toBe(true);
    expect(Object.isFrozen(sentAt)).toBe(false);
    expect(() => output.leads.push({ company: 'globex' })).toThrow(TypeError);
  });

  test('matches only the workflow it was created for', () => {
    const state = new ExecutionState('run-1', spec);
    const searchOnly = defineWorkflow('outreach').step(defineStep('search').handler('prospect_search')).build();
    const renamed = defineWorkflow('follow-up')
      .step(defineStep('search').handler('prospect_search').next('enrich'))
      .step(defineStep('enrich').handler('enrichment'))
      .build();

    expect(state.belongsTo(spec)).toBe(true);
    expect(state.belongsTo(searchOnly)).toBe(false);
    expect(state.belongsTo(renamed)).toBe(false);
  });

  test('refuses a second result for the same step', () => {
    const state = new ExecutionState('run-1', spec);
    state.record(succeeded('search'));

    const error = captureError(() => state.record(succeeded('search')), StateError);

    expect(error.code).toBe(ErrorCode.STATE_DUPLICATE_RESULT);
    expect(error.message).toBe('A result for step "search" is already recorded in run run-1');
  });

  test('refuses results for steps outside the workflow', () => {
    const state = new ExecutionState('run-1', spec);

    expect(captureError(() => state.record(succeeded('compose')), StateError).code).toBe(
      ErrorCode.STATE_UNKNOWN_STEP,
    );
  });

  test('is closed for writing once completed', () => {
    const state = new ExecutionState('run-1', spec);
    state.complete('partial');

    expect(state.isComplete).toBe(true);
    expect(state.status).toBe('partial');
    expect(state.finishedAt).toBeInstanceOf(Date);
    expect(captureError(() => state.record(succeeded('search')), StateError).code).toBe(
      ErrorCode.STATE_ALREADY_COMPLETED,
    );
    expect(() => state.complete('succeeded')).toThrow(StateError);
  });

  test('keeps recording order apart from declaration order', () => {
    const state = new ExecutionState('run-1', spec);
    state.record(succeeded('enrich'));
    state.record(succeeded('search'));

    expect(state.results().map((result) => result.stepId)).toEqual(['enrich', 'search']);
    expect(state.snapshot().map((result) => result.stepId)).toEqual(['search', 'enrich']);
  });
});
