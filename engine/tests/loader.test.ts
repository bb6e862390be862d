import { fileURLToPath } from 'node:url';
import { describe, expect, test } from 'vitest';
import {
  ErrorCode,
  SchemaError,
  WorkflowLoader,
  parseBindingValue,
  requireStep,
  GraphBuilder,
} from '../src/index.js';
import { captureError, captureRejection } from './helpers.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('WorkflowLoader.fromFile', () => {
  test('loads a YAML workflow and interpolates tool configs', async () => {
    const spec = await WorkflowLoader.fromFile(fixture('outreach.yaml'), { env: { PDL_API_KEY: 'test-key' } });

    expect(spec.name).toBe('outreach');
    expect(spec.version).toBe('2');
    expect(spec.steps.map((step) => step.id)).toEqual(['search', 'enrich', 'score', 'compose']);

    const [search] = spec.steps;
    expect(search?.tools).toEqual([{ name: 'pdl', config: { api_key: 'test-key', limit: 25 } }]);
    expect(search?.next).toEqual(['enrich', 'score']);
    expect(search?.outputSchema).toEqual({ leads: 'list' });
    expect(search?.instructions).toBe('Find companies in the target segment');
  });

  test('keeps placeholders whose variable is not set', async () => {
    const spec = await WorkflowLoader.fromFile(fixture('outreach.yaml'), { env: {} });

    expect(spec.config).toEqual({ persona: { tone: 'warm' }, crm: { api_key: '{{CRM_API_KEY}}' } });
  });

  test('turns input strings into bindings without touching the environment', async () => {
    const spec = await WorkflowLoader.fromFile(fixture('outreach.yaml'), { env: { SENDER: 'Dana' } });
    const compose = requireStep(GraphBuilder.build(spec), 'compose');

    expect(compose.inputs).toEqual([
      { key: 'enriched', source: { kind: 'step', stepId: 'enrich', outputKey: 'enriched_leads' } },
      { key: 'scores', source: { kind: 'step', stepId: 'score' } },
      { key: 'tone', source: { kind: 'config', path: ['persona', 'tone'], fallback: 'friendly' } },
      { key: 'signature', source: { kind: 'literal', value: 'Best, {{SENDER}}' } },
    ]);
  });

  test('accepts the snake_case field spellings', async () => {
    const spec = await WorkflowLoader.fromFile(fixture('outreach.json'), { env: {} });

    expect(spec.name).toBe('outreach-json');
    expect(spec.version).toBe('1.0.0');
    expect(spec.steps[0]).toMatchObject({
      handler: 'prospect_search',
      next: ['compose'],
      outputSchema: { leads: 'list' },
    });
    expect(spec.steps[1]?.inputs).toEqual([
      { key: 'leads', source: { kind: 'step', stepId: 'search', outputKey: 'leads' } },
      { key: 'limit', source: { kind: 'literal', value: 10 } },
    ]);
  });

  test('rejects a missing file', async () => {
    const error = await captureRejection(WorkflowLoader.fromFile('missing/workflow.yaml'), SchemaError);

    expect(error.code).toBe(ErrorCode.SCHEMA_FILE_NOT_FOUND);
    expect(error.message).toBe('Workflow file not found: missing/workflow.yaml');
  });

  test('fails on a placeholder without a value in strict mode', async () => {
    const error = await captureRejection(
      WorkflowLoader.fromFile(fixture('outreach.yaml'), { env: { PDL_API_KEY: 'test-key' }, strictEnv: true }),
      SchemaError,
    );

    expect(error.code).toBe(ErrorCode.SCHEMA_UNRESOLVED_VARIABLE);
    expect(error.message).toBe('Environment variable "CRM_API_KEY" is not set');
    expect(error.path).toBe('config.crm.api_key');
  });
});

describe('WorkflowLoader.fromString', () => {
  test('reports syntax errors with the source label', () => {
    const error = captureError(
      () => WorkflowLoader.fromString('name: "unterminated', { source: 'draft.yaml' }),
      SchemaError,
    );

    expect(error.code).toBe(ErrorCode.SCHEMA_PARSE_ERROR);
    expect(error.message.startsWith('Could not parse workflow from draft.yaml: ')).toBe(true);
  });

  test('parses inline JSON', () => {
    const spec = WorkflowLoader.fromString('{"name": "inline", "steps": [{"id": "a", "handler": "noop"}]}');

    expect(spec.steps[0]).toMatchObject({ id: 'a', handler: 'noop', next: [], inputs: [], tools: [] });
  });
});

describe('WorkflowLoader.fromObject', () => {
  test('suggests the intended field for an unknown one', () => {
    const error = captureError(
      () => WorkflowLoader.fromObject({ name: 'w', steps: [{ id: 'a', handler: 'noop', next_step: ['b'] }] }),
      SchemaError,
    );

    expect(error.code).toBe(ErrorCode.SCHEMA_INVALID_DOCUMENT);
    expect(error.path).toBe('steps[0].next_step');
    expect(error.message).toBe(
      'Invalid workflow document workflow object: steps[0].next_step: Unknown field "next_step" (did you mean "next_steps"?)',
    );
  });

  test('rejects both spellings of the same field', () => {
    const error = captureError(
      () => WorkflowLoader.fromObject({ name: 'w', workflow_name: 'w2', steps: [] }),
      SchemaError,
    );

    expect(error.path).toBe('workflow_name');
    expect(error.message).toContain('Use either "name" or "workflow_name", not both');
  });

  test('requires a handler type on every step', () => {
    const error = captureError(() => WorkflowLoader.fromObject({ name: 'w', steps: [{ id: 'a' }] }), SchemaError);

    expect(error.path).toBe('steps[0].handler');
    expect(error.message).toContain('Missing "handler" (or "agent")');
  });

  test('rejects step ids that cannot be referenced', () => {
    const error = captureError(
      () => WorkflowLoader.fromObject({ name: 'w', steps: [{ id: '1st', handler: 'noop' }] }),
      SchemaError,
    );

    expect(error.code).toBe(ErrorCode.SCHEMA_INVALID_STEP_DEFINITION);
    expect(error.path).toBe('steps.1st');
  });
});

describe('parseBindingValue', () => {
  test('keeps non-strings and plain text as literals', () => {
    expect(parseBindingValue(42)).toEqual({ kind: 'literal', value: 42 });
    expect(parseBindingValue('plain')).toEqual({ kind: 'literal', value: 'plain' });
    expect(parseBindingValue('Hi {{name}}')).toEqual({ kind: 'literal', value: 'Hi {{name}}' });
  });

  test('reads step references', () => {
    expect(parseBindingValue('{{ search }}')).toEqual({ kind: 'step', stepId: 'search' });
    expect(parseBindingValue('{{enrich.profile.email}}')).toEqual({
      kind: 'step',
      stepId: 'enrich',
      outputKey: 'profile.email',
    });
    expect(parseBindingValue('{{configuration.x}}')).toEqual({
      kind: 'step',
      stepId: 'configuration',
      outputKey: 'x',
    });
  });

  test('reads config references with optional fallbacks', () => {
    expect(parseBindingValue('{{config}}')).toEqual({ kind: 'config', path: [] });
    expect(parseBindingValue('{{config.persona.tone}}')).toEqual({ kind: 'config', path: ['persona', 'tone'] });
    expect(parseBindingValue('{{config.persona.tone | friendly tone}}')).toEqual({
      kind: 'config',
      path: ['persona', 'tone'],
      fallback: 'friendly tone',
    });
  });

  test('takes a fallback on a step reference literally', () => {
    expect(parseBindingValue('{{search.leads | none}}')).toEqual({
      kind: 'literal',
      value: '{{search.leads | none}}',
    });
  });
});
