import { describe, expect, test } from 'vitest';
import {
  DependencyResolver,
  GraphBuilder,
  GraphError,
  TopologicalSorter,
  defineStep,
  defineWorkflow,
  fromStep,
  type StepBuilder,
} from '../src/index.js';

function workflow(...steps: StepBuilder[]) {
  const builder = defineWorkflow('outreach');
  for (const step of steps) builder.step(step);
  return builder.build();
}

const step = (id: string, ...next: string[]) => defineStep(id).handler('noop').next(...next);

describe('GraphBuilder', () => {
  test('builds a linear chain with its entry and adjacency', () => {
    const graph = GraphBuilder.build(workflow(step('a', 'b'), step('b', 'c'), step('c')));

    expect(graph.entry).toBe('a');
    expect(graph.order).toEqual(['a', 'b', 'c']);
    expect(graph.successors.get('a')).toEqual(['b']);
    expect(graph.predecessors.get('c')).toEqual(['b']);
    expect([...(graph.ancestors.get('c') ?? [])].sort()).toEqual(['a', 'b']);
  });

  test('deduplicates repeated successors', () => {
    const graph = GraphBuilder.build(workflow(step('a', 'b', 'b'), step('b')));

    expect(graph.successors.get('a')).toEqual(['b']);
    expect(graph.predecessors.get('b')).toEqual(['a']);
  });

  test('rejects a cycle with the offending path', () => {
    const spec = workflow(step('a', 'b'), step('b', 'c'), step('c', 'b'));

    const analysis = GraphBuilder.analyze(spec);
    expect(analysis.graph).toBeUndefined();
    expect(analysis.errors.map((error) => error.kind)).toEqual(['CycleDetected']);
    expect(analysis.errors[0]?.message).toBe('Cycle detected: b -> c -> b');
    expect(() => GraphBuilder.build(spec)).toThrow(GraphError);
  });

  test('treats a self-successor as a cycle and reports the missing entry', () => {
    const analysis = GraphBuilder.analyze(workflow(step('a', 'a')));

    expect(analysis.errors.map((error) => error.kind)).toEqual(['CycleDetected', 'NoEntry']);
    expect(analysis.errors[0]?.context).toEqual({ cycle: ['a', 'a'] });
  });

  test('rejects an empty workflow', () => {
    const analysis = GraphBuilder.analyze(workflow());

    expect(analysis.errors.map((error) => error.kind)).toEqual(['EmptyWorkflow']);
    expect(analysis.errors[0]?.message).toBe('Workflow "outreach" declares no steps');
  });

  test('reports duplicate ids at the later declaration', () => {
    const analysis = GraphBuilder.analyze(workflow(step('a', 'b'), step('b'), step('a')));

    const [duplicate] = analysis.errors;
    expect(duplicate?.kind).toBe('DuplicateStep');
    expect(duplicate?.path).toBe('steps[2].id');
  });

  test('suggests the closest id for an unknown successor', () => {
    const analysis = GraphBuilder.analyze(workflow(step('a', 'enrch'), step('enrich')));

    expect(analysis.errors.map((error) => error.kind)).toEqual(['UnknownStep', 'AmbiguousEntry']);
    expect(analysis.errors[0]?.message).toBe('Step "a" references unknown step "enrch" in next');
    expect(analysis.errors[0]?.hint).toBe('Did you mean "enrich"?');
  });

  test('reports an unknown step referenced by a binding', () => {
    const spec = workflow(defineStep('a').handler('noop').input('leads', fromStep('ghost', 'leads')));

    const [error] = GraphBuilder.analyze(spec).errors;
    expect(error?.kind).toBe('UnknownStep');
    expect(error?.path).toBe('steps.a.inputs');
  });

  test('lists every entry candidate when there are several', () => {
    const analysis = GraphBuilder.analyze(workflow(step('a'), step('b')));

    expect(analysis.errors[0]?.message).toBe('Workflow has 2 entry candidates: a, b');
  });

  test('warns about steps only reachable through a detached cycle', () => {
    const analysis = GraphBuilder.analyze(workflow(step('a'), step('b', 'c'), step('c', 'b')));

    expect(analysis.errors.map((error) => error.kind)).toEqual(['CycleDetected']);
    expect(analysis.warnings.map((warning) => warning.message)).toEqual([
      'Step "b" is not reachable from entry step "a"',
      'Step "c" is not reachable from entry step "a"',
    ]);
  });

  test('warns about a binding to a step that does not precede the reader, but still builds', () => {
    const spec = workflow(
      step('a', 'b', 'c'),
      step('b'),
      defineStep('c').handler('noop').input('draft', fromStep('b', 'draft')),
    );

    const analysis = GraphBuilder.analyze(spec);
    expect(analysis.errors).toEqual([]);
    expect(analysis.warnings.map((warning) => warning.kind)).toEqual(['BindingNotUpstream']);
    expect(analysis.warnings[0]?.path).toBe('steps.c.inputs.draft');
    expect(analysis.graph?.entry).toBe('a');
  });
});

describe('TopologicalSorter', () => {
  test('groups a fan-out/fan-in graph into phases in declaration order', () => {
    const graph = GraphBuilder.build(
      workflow(step('search', 'enrich', 'score'), step('enrich', 'compose'), step('score', 'compose'), step('compose')),
    );

    const sorted = TopologicalSorter.sort(graph);
    expect(sorted.phases).toEqual([['search'], ['enrich', 'score'], ['compose']]);
    expect(sorted.order).toEqual(['search', 'enrich', 'score', 'compose']);
    expect(sorted.stepPhases.get('compose')).toBe(2);
  });

  test('places a step after its latest predecessor', () => {
    const graph = GraphBuilder.build(workflow(step('a', 'b', 'd'), step('b', 'c'), step('c', 'd'), step('d')));

    expect(TopologicalSorter.sort(graph).phases).toEqual([['a'], ['b'], ['c'], ['d']]);
  });
});

describe('DependencyResolver', () => {
  test('finds every step reachable from a start', () => {
    const resolved = DependencyResolver.resolve(workflow(step('a', 'b'), step('b'), step('c')));

    expect([...DependencyResolver.reachableFrom('a', resolved.successors)]).toEqual(['a', 'b']);
    expect(DependencyResolver.findEntryCandidates(resolved.order, resolved.predecessors)).toEqual(['a', 'c']);
  });
});
