import { describe, expect, test } from 'vitest';
import {
  EngineEventType,
  EngineTestHarness,
  ErrorCode,
  ExecutionState,
  GraphError,
  MockHandler,
  RegistryError,
  StateError,
  defineStep,
  defineWorkflow,
  fromStep,
  normalizeConcurrency,
  type HandlerFactory,
  type WorkflowResult,
} from '../src/index.js';
import { captureRejection } from './helpers.js';

const chain = defineWorkflow('chain')
  .config({ persona: { tone: 'warm' } })
  .step(defineStep('a').handler('ok').next('b'))
  .step(defineStep('b').handler('boom').input('lead', fromStep('a', 'lead')).next('c'))
  .step(defineStep('c').handler('ok').input('draft', fromStep('b', 'draft')))
  .build();

const fanIn = defineWorkflow('fan-in')
  .step(defineStep('search').handler('search').next('enrich', 'score'))
  .step(defineStep('enrich').handler('enrich').next('compose'))
  .step(defineStep('score').handler('score').next('compose'))
  .step(
    defineStep('compose')
      .handler('compose')
      .input('enriched', fromStep('enrich', 'enriched'))
      .input('scores', fromStep('score', 'scores')),
  )
  .build();

function single(handler: string, configure = (step: ReturnType<typeof defineStep>) => step) {
  return defineWorkflow('single').step(configure(defineStep('only').handler(handler))).build();
}

function tracker(delayMs: number): { factory: HandlerFactory; peak: () => number } {
  let active = 0;
  let peak = 0;
  return {
    factory: () => ({
      execute: async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        active--;
        return {};
      },
    }),
    peak: () => peak,
  };
}

describe('WorkflowExecutor', () => {
  test('keeps running after a failed step and hands its bindings over as absent', async () => {
    const harness = new EngineTestHarness();
    const ok = harness.registerMockSuccess('ok', { lead: 'acme' });
    harness.registerMockFailure('boom', new Error('api down'));

    const result = await harness.run(chain);

    expect(result.status).toBe('partial');
    expect(result.steps.map((step) => step.status)).toEqual(['succeeded', 'failed', 'succeeded']);
    expect(result.steps[1]).toMatchObject({
      status: 'failed',
      error: { name: 'HandlerFailed', code: ErrorCode.EXECUTION_HANDLER_FAILED, message: 'api down' },
    });
    expect(result.steps[2]?.absentInputs).toEqual(['draft']);
    expect(ok.getCallFor('c')?.input.values).toEqual({ draft: null });
    expect(result.metadata).toEqual({ totalSteps: 3, succeededSteps: 2, failedSteps: 1, skippedSteps: 0 });
  });

  test('emits lifecycle events in order', async () => {
    const harness = new EngineTestHarness();
    harness.registerMockSuccess('ok', { lead: 'acme' });
    harness.registerMockFailure('boom');

    await harness.run(chain);

    expect(harness.getEventTrail(true)).toEqual([
      'workflow.started',
      'step.started:a',
      'step.completed:a',
      'step.started:b',
      'step.failed:b',
      'step.started:c',
      'step.completed:c',
      'workflow.completed',
    ]);
  });

  test('reports failed when the entry step fails, while dependents still run', async () => {
    const harness = new EngineTestHarness();
    const ok = harness.registerMockSuccess('ok');
    harness.registerMockFailure('boom');
    const spec = defineWorkflow('entry-fails')
      .step(defineStep('a').handler('boom').next('b'))
      .step(defineStep('b').handler('ok').input('lead', fromStep('a', 'lead')))
      .build();

    const result = await harness.run(spec);

    expect(result.status).toBe('failed');
    expect(ok.getCallCount()).toBe(1);
    expect(result.steps[1]?.absentInputs).toEqual(['lead']);
  });

  test('runs a fan-in step once, after all of its predecessors', async () => {
    const harness = new EngineTestHarness({ maxConcurrentSteps: 2 });
    harness.registerMockSuccess('search', { leads: ['acme'] });
    harness.registerMockSuccess('enrich', { enriched: ['acme+'] });
    harness.registerMockSuccess('score', { scores: [0.9] });
    const compose = harness.registerMockSuccess('compose', { drafts: 1 });

    const result = await harness.assertSuccess(fanIn);

    expect(compose.getCallCount()).toBe(1);
    expect(compose.getInstanceCount()).toBe(1);
    expect(compose.getLastCall()?.input.values).toEqual({ enriched: ['acme+'], scores: [0.9] });
    expect(result.steps.map((step) => step.stepId)).toEqual(['search', 'enrich', 'score', 'compose']);
  });

  test('runs a fan-in step once when one of its predecessors failed', async () => {
    const harness = new EngineTestHarness({ maxConcurrentSteps: 2 });
    harness.registerMockSuccess('search', { leads: ['acme'] });
    harness.registerMockSuccess('enrich', { enriched: ['acme+'] });
    harness.registerMockFailure('score', new Error('scoring api down'));
    const compose = harness.registerMockSuccess('compose', { drafts: 1 });

    const result = await harness.run(fanIn);

    expect(result.status).toBe('partial');
    expect(result.steps.map((step) => step.status)).toEqual(['succeeded', 'succeeded', 'failed', 'succeeded']);
    expect(compose.getCallCount()).toBe(1);
    expect(compose.getLastCall()?.input.values).toEqual({ enriched: ['acme+'], scores: null });
    expect(compose.getLastCall()?.input.absent).toEqual(['scores']);
  });

  test('queues successors in the order their predecessors finished', async () => {
    const harness = new EngineTestHarness({ maxConcurrentSteps: 2 });
    harness.registerMockSuccess('start');
    harness.register('slow', MockHandler.createSlow(60));
    harness.register('fast', MockHandler.createSlow(5));
    harness.registerMockSuccess('follow');
    const spec = defineWorkflow('race')
      .step(defineStep('start').handler('start').next('slow', 'fast'))
      .step(defineStep('slow').handler('slow').next('after-slow'))
      .step(defineStep('fast').handler('fast').next('after-fast'))
      .step(defineStep('after-slow').handler('follow'))
      .step(defineStep('after-fast').handler('follow'))
      .build();

    await harness.run(spec);

    const started = harness.eventsOfType(EngineEventType.STEP_STARTED).map((event) => event.stepId);
    expect(started).toEqual(['start', 'slow', 'fast', 'after-fast', 'after-slow']);
  });

  test('produces the same step outcomes when a workflow runs twice', async () => {
    const harness = new EngineTestHarness({ maxConcurrentSteps: 2 });
    harness.registerMockSuccess('search', { leads: ['acme'] });
    harness.registerMockSuccess('enrich', { enriched: ['acme+'] });
    harness.registerMockFailure('score', new Error('scoring api down'));
    harness.registerMockSuccess('compose', (input) => ({ drafts: 1, missing: input.absent.length }));
    const outcome = (result: WorkflowResult) =>
      result.steps.map((step) => ({
        stepId: step.stepId,
        status: step.status,
        output: step.status === 'succeeded' ? step.output : undefined,
        absentInputs: step.absentInputs,
      }));

    const first = await harness.run(fanIn);
    const second = await harness.run(fanIn);

    expect(second.runId).not.toBe(first.runId);
    expect(outcome(second)).toEqual(outcome(first));
    expect(outcome(first)[3]).toEqual({
      stepId: 'compose',
      status: 'succeeded',
      output: { drafts: 1, missing: 1 },
      absentInputs: ['scores'],
    });
  });

  test('keeps recorded outputs intact when a reader mutates its input', async () => {
    const harness = new EngineTestHarness();
    harness.registerMockSuccess('search', { leads: ['acme'] });
    harness.register('tamper', () => ({
      execute: (input) => {
        const leads = input.values.leads;
        if (Array.isArray(leads)) leads.push('INJECTED');
        return {};
      },
    }));
    const reader = harness.registerMockSuccess('reader');
    const spec = defineWorkflow('shared-leads')
      .step(defineStep('a').handler('search').next('b', 'c'))
      .step(defineStep('b').handler('tamper').input('leads', fromStep('a', 'leads')))
      .step(defineStep('c').handler('reader').input('leads', fromStep('a', 'leads')))
      .build();

    const result = await harness.run(spec);

    expect(result.steps[0]).toMatchObject({ status: 'succeeded', output: { leads: ['acme'] } });
    expect(result.steps[1]).toMatchObject({ status: 'failed', error: { name: 'HandlerFailed' } });
    expect(reader.getCallFor('c')?.input.values).toEqual({ leads: ['acme'] });
  });

  test('runs sequentially when the concurrency is not a usable number', async () => {
    const harness = new EngineTestHarness();
    harness.registerMockSuccess('ok');

    const result = await harness.run(single('ok'), { concurrency: Number.NaN });

    expect(result.steps[0]?.status).toBe('succeeded');
    expect(harness.eventsOfType(EngineEventType.WORKFLOW_STARTED)[0]?.payload).toMatchObject({ concurrency: 1 });
    expect([Number.NaN, Number.POSITIVE_INFINITY, 0, -3, undefined].map(normalizeConcurrency)).toEqual([1, 1, 1, 1, 1]);
    expect(normalizeConcurrency(2.7)).toBe(2);
  });

  test('records exactly one result per step', async () => {
    const harness = new EngineTestHarness({ maxConcurrentSteps: 4 });
    for (const type of ['search', 'enrich', 'score', 'compose']) {
      harness.registerMockSuccess(type, { enriched: [], scores: [] });
    }

    await harness.run(fanIn);

    const finished = harness
      .getEvents()
      .filter((event) => event.type === EngineEventType.STEP_COMPLETED)
      .map((event) => event.stepId);
    expect(finished.sort()).toEqual(['compose', 'enrich', 'score', 'search']);
  });

  test('never runs more steps at once than the concurrency limit', async () => {
    const spec = defineWorkflow('wide')
      .step(defineStep('start').handler('work').next('w1', 'w2', 'w3', 'w4'))
      .step(defineStep('w1').handler('work'))
      .step(defineStep('w2').handler('work'))
      .step(defineStep('w3').handler('work'))
      .step(defineStep('w4').handler('work'))
      .build();

    const limited = tracker(20);
    const harness = new EngineTestHarness();
    harness.register('work', limited.factory);
    await harness.run(spec, { concurrency: 2 });
    expect(limited.peak()).toBe(2);

    const sequential = tracker(5);
    const defaults = new EngineTestHarness();
    defaults.register('work', sequential.factory);
    await defaults.run(spec);
    expect(sequential.peak()).toBe(1);
  });

  test('fails a step that outlives its timeout and aborts its signal', async () => {
    const harness = new EngineTestHarness({ stepTimeoutMs: 20 });
    harness.register('slow', MockHandler.createSlow(1_000));

    const result = await harness.run(single('slow'));

    expect(result.status).toBe('failed');
    expect(result.steps[0]).toMatchObject({
      status: 'failed',
      error: { name: 'Timeout', code: ErrorCode.EXECUTION_TIMEOUT, message: 'Step timed out after 20ms' },
    });
  });

  test('fails a step whose handler returns something other than a mapping', async () => {
    const harness = new EngineTestHarness();
    harness.register('list', () => ({ execute: () => JSON.parse('[1, 2]') }));
    harness.register('text', () => ({ execute: () => JSON.parse('"done"') }));

    const list = await harness.run(single('list'));
    const text = await harness.run(single('text'));

    expect(list.steps[0]).toMatchObject({
      error: { name: 'InvalidOutput', message: 'Handler returned an array instead of an output mapping' },
    });
    expect(text.steps[0]).toMatchObject({
      error: { name: 'InvalidOutput', message: 'Handler returned string instead of an output mapping' },
    });
  });

  test('fails a step whose output lacks keys from its output schema', async () => {
    const harness = new EngineTestHarness();
    harness.registerMockSuccess('enrich', { enriched_leads: [] });

    const result = await harness.run(
      single('enrich', (step) => step.output('enriched_leads', 'list').output('count', 'number')),
    );

    expect(result.steps[0]).toMatchObject({
      error: { name: 'MissingOutputKeys', message: 'Output is missing required keys: count' },
    });
  });

  test('contains errors thrown by a handler factory', async () => {
    const harness = new EngineTestHarness();
    harness.register('search', () => {
      throw new Error('no api key');
    });

    const result = await harness.run(single('search'));

    expect(result.steps[0]).toMatchObject({
      error: { name: 'HandlerInitFailed', message: 'Could not create handler "search": no api key' },
    });
  });

  test('passes the workflow config and run metadata to handlers', async () => {
    const harness = new EngineTestHarness();
    const ok = harness.registerMockSuccess('ok', { lead: 'acme' });
    harness.registerMockSuccess('boom');

    const result = await harness.run(chain, { runId: 'run-42' });

    expect(result.runId).toBe('run-42');
    expect(ok.getLastCall()?.config).toEqual({ persona: { tone: 'warm' } });
    expect(harness.getEvents().every((event) => event.runId === 'run-42')).toBe(true);
  });

  test('returns a frozen result', async () => {
    const harness = new EngineTestHarness();
    harness.registerMockSuccess('ok');

    const result = await harness.run(single('ok'));

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.steps)).toBe(true);
    expect(Object.isFrozen(result.steps[0])).toBe(true);
  });

  test('ignores listeners that throw', async () => {
    const harness = new EngineTestHarness();
    harness.registerMockSuccess('ok');
    harness.engine.on(EngineEventType.STEP_COMPLETED, () => {
      throw new Error('listener broke');
    });

    const result = await harness.run(single('ok'));

    expect(result.status).toBe('succeeded');
  });

  describe('cancellation', () => {
    test('skips every step not yet dispatched', async () => {
      const controller = new AbortController();
      const harness = new EngineTestHarness();
      harness.register('abort', () => ({
        execute: () => {
          controller.abort();
          return { lead: 'acme' };
        },
      }));
      const ok = harness.registerMockSuccess('ok');
      harness.registerMockSuccess('boom');
      const spec = defineWorkflow('cancel')
        .step(defineStep('a').handler('abort').next('b'))
        .step(defineStep('b').handler('boom').next('c'))
        .step(defineStep('c').handler('ok'))
        .build();

      const result = await harness.run(spec, { signal: controller.signal });

      expect(result.status).toBe('cancelled');
      expect(result.cancelled).toBe(true);
      expect(ok.getCallCount()).toBe(0);
      expect(result.steps.map((step) => (step.status === 'skipped' ? step.reason : step.status))).toEqual([
        'succeeded',
        'cancelled',
        'cancelled',
      ]);
      expect(harness.getEventTrail(true)).toEqual([
        'workflow.started',
        'step.started:a',
        'step.completed:a',
        'workflow.cancelled',
        'step.skipped:b',
        'step.skipped:c',
        'workflow.completed',
      ]);
    });

    test('runs nothing when the signal is already aborted', async () => {
      const harness = new EngineTestHarness();
      const ok = harness.registerMockSuccess('ok');
      harness.registerMockSuccess('boom');

      const result = await harness.run(chain, { signal: AbortSignal.abort() });

      expect(result.status).toBe('cancelled');
      expect(ok.getCallCount()).toBe(0);
      expect(result.metadata.skippedSteps).toBe(3);
    });
  });

  describe('resume', () => {
    test('does not re-run steps already recorded in the given state', async () => {
      const harness = new EngineTestHarness();
      const ok = harness.registerMockSuccess('ok');
      const boom = harness.registerMockSuccess('boom', { draft: 'Hello' });
      const state = new ExecutionState('run-7', chain);
      const at = new Date();
      state.record({
        status: 'succeeded',
        stepId: 'a',
        handler: 'ok',
        output: { lead: 'acme' },
        absentInputs: [],
        startedAt: at,
        completedAt: at,
        duration: 0,
      });

      const result = await harness.run(chain, { state });

      expect(result.runId).toBe('run-7');
      expect(result.status).toBe('succeeded');
      expect(ok.getCallFor('a')).toBeUndefined();
      expect(boom.getLastCall()?.input.values).toEqual({ lead: 'acme' });
      expect(harness.eventsOfType(EngineEventType.WORKFLOW_STARTED)[0]?.payload).toMatchObject({
        resumedSteps: ['a'],
      });
    });

    test('rejects a state whose run has completed', async () => {
      const harness = new EngineTestHarness();
      harness.registerMockSuccess('ok');
      harness.registerMockSuccess('boom');
      const state = new ExecutionState('run-8', chain);
      await harness.run(chain, { state });

      const error = await captureRejection(harness.run(chain, { state }), StateError);

      expect(error.code).toBe(ErrorCode.STATE_ALREADY_COMPLETED);
    });

    test('rejects a state created for another workflow', async () => {
      const harness = new EngineTestHarness();
      harness.registerMockSuccess('ok');
      harness.registerMockSuccess('boom');
      const state = new ExecutionState('run-10', fanIn);

      const error = await captureRejection(harness.run(chain, { state }), StateError);

      expect(error.code).toBe(ErrorCode.STATE_WORKFLOW_MISMATCH);
      expect(error.message).toBe('Run run-10 was recorded for workflow "fan-in" and cannot resume "chain"');
      expect(harness.getEvents()).toEqual([]);
    });

    test('lets running steps finish before surfacing a result the state rejected', async () => {
      const harness = new EngineTestHarness({ maxConcurrentSteps: 2 });
      const state = new ExecutionState('run-11', fanIn);
      let enrichFinished = false;
      harness.registerMockSuccess('search', { leads: ['acme'] });
      harness.register('enrich', () => ({
        execute: async () => {
          await new Promise((resolve) => setTimeout(resolve, 30));
          enrichFinished = true;
          return { enriched: [] };
        },
      }));
      harness.register('score', () => ({
        execute: () => {
          const at = new Date();
          state.record({
            status: 'succeeded',
            stepId: 'score',
            handler: 'score',
            output: {},
            absentInputs: [],
            startedAt: at,
            completedAt: at,
            duration: 0,
          });
          return { scores: [] };
        },
      }));
      const compose = harness.registerMockSuccess('compose');

      const error = await captureRejection(harness.run(fanIn, { state }), StateError);

      expect(error.code).toBe(ErrorCode.STATE_DUPLICATE_RESULT);
      expect(enrichFinished).toBe(true);
      expect(state.get('enrich')?.status).toBe('succeeded');
      expect(compose.getCallCount()).toBe(0);
    });
  });

  describe('rejection before any step runs', () => {
    test('rejects an unregistered handler type', async () => {
      const harness = new EngineTestHarness();
      harness.registerMockSuccess('ok');

      const error = await captureRejection(harness.run(chain), RegistryError);

      expect(error.message).toBe('Unknown handler type "boom" (step "b")');
      expect(harness.getEvents()).toEqual([]);
    });

    test('rejects an invalid graph', async () => {
      const harness = new EngineTestHarness();
      harness.registerMockSuccess('ok');
      const cyclic = defineWorkflow('cyclic')
        .step(defineStep('a').handler('ok').next('b'))
        .step(defineStep('b').handler('ok').next('a'))
        .build();

      const error = await captureRejection(harness.run(cyclic), GraphError);

      expect(error.kind).toBe('CycleDetected');
      expect(harness.getEvents()).toEqual([]);
    });
  });
});
