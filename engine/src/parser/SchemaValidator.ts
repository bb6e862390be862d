/**
 * Schema Validator
 *
 * Validates a raw workflow document (already parsed from YAML/JSON)
 * with zod. Unknown fields are rejected with a "did you mean" hint, so
 * a typo like `next_step` never silently drops the successor list.
 *
 * Both spellings of the outreach pipeline's field names are accepted:
 * `name`/`workflow_name`, `handler`/`agent`, `next`/`next_steps`,
 * `outputSchema`/`output_schema`.
 *
 * @module parser
 */

import { z } from 'zod';
import { SchemaError, type SchemaIssue } from '../errors/SchemaError.js';
import { suggestClosest } from '../errors/Suggestions.js';

const toolSchema = z
  .object({
    name: z.string().min(1),
    config: z.record(z.unknown()).default({}),
  })
  .strict();

const inputEntrySchema = z
  .object({
    key: z.string().min(1),
    value: z.unknown(),
  })
  .strict();

const stepSchema = z
  .object({
    id: z.string().min(1),
    handler: z.string().min(1).optional(),
    agent: z.string().min(1).optional(),
    description: z.string().optional(),
    instructions: z.string().default(''),
    inputs: z.union([z.record(z.unknown()), z.array(inputEntrySchema)]).default({}),
    next: z.array(z.string().min(1)).optional(),
    next_steps: z.array(z.string().min(1)).optional(),
    tools: z.array(toolSchema).default([]),
    outputSchema: z.record(z.string()).optional(),
    output_schema: z.record(z.string()).optional(),
  })
  .strict()
  .superRefine((step, ctx) => {
    checkAlias(ctx, step.handler, step.agent, 'handler', 'agent');
    checkAlias(ctx, step.next, step.next_steps, 'next', 'next_steps');
    checkAlias(ctx, step.outputSchema, step.output_schema, 'outputSchema', 'output_schema');
  });

const documentSchema = z
  .object({
    name: z.string().min(1).optional(),
    workflow_name: z.string().min(1).optional(),
    version: z.union([z.string().min(1), z.number()]).optional(),
    description: z.string().optional(),
    config: z.record(z.unknown()).default({}),
    steps: z.array(stepSchema),
  })
  .strict()
  .superRefine((doc, ctx) => {
    checkAlias(ctx, doc.name, doc.workflow_name, 'name', 'workflow_name');
  });

export type RawStepDefinition = z.output<typeof stepSchema>;
export type RawWorkflowDocument = z.output<typeof documentSchema>;

const KNOWN_FIELDS: Readonly<Record<string, readonly string[]>> = {
  document: Object.keys(documentSchema.innerType().shape),
  step: Object.keys(stepSchema.innerType().shape),
  tool: Object.keys(toolSchema.shape),
  input: Object.keys(inputEntrySchema.shape),
};

/**
 * Exactly one of the two spellings must be present (optional pairs
 * such as next/next_steps may both be missing)
 */
function checkAlias(
  ctx: z.RefinementCtx,
  primary: unknown,
  alias: unknown,
  primaryName: string,
  aliasName: string,
): void {
  if (primary !== undefined && alias !== undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Use either "${primaryName}" or "${aliasName}", not both`,
      path: [aliasName],
    });
    return;
  }
  const required = primaryName === 'handler' || primaryName === 'name';
  if (required && primary === undefined && alias === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Missing "${primaryName}" (or "${aliasName}")`,
      path: [primaryName],
    });
  }
}

export class SchemaValidator {
  /**
   * @param source - File path or label used in error messages
   * @throws {SchemaError} InvalidDocument listing every issue found
   */
  static validate(raw: unknown, source: string): RawWorkflowDocument {
    const parsed = documentSchema.safeParse(raw);
    if (!parsed.success) {
      throw SchemaError.invalidDocument(source, this.toIssues(parsed.error));
    }
    return parsed.data;
  }

  /**
   * Flatten zod issues; unknown keys become one issue each with a suggestion
   */
  static toIssues(error: z.ZodError): SchemaIssue[] {
    const issues: SchemaIssue[] = [];

    for (const issue of error.issues) {
      const path = formatPath(issue.path);

      if (issue.code === z.ZodIssueCode.unrecognized_keys) {
        const known = KNOWN_FIELDS[scopeOf(issue.path)] ?? [];
        for (const key of issue.keys) {
          const suggestion = suggestClosest(key, known);
          issues.push({
            path: path ? `${path}.${key}` : key,
            message: suggestion ? `Unknown field "${key}" (did you mean "${suggestion}"?)` : `Unknown field "${key}"`,
          });
        }
        continue;
      }

      issues.push({ path, message: issue.message });
    }

    return issues;
  }
}

/**
 * `['steps', 2, 'next']` -> `steps[2].next`
 */
function formatPath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

function scopeOf(path: readonly (string | number)[]): string {
  const last = path[path.length - 1];
  const parent = path[path.length - 2];
  if (path.length === 0) return 'document';
  if (parent === 'steps' && typeof last === 'number') return 'step';
  if (parent === 'tools' && typeof last === 'number') return 'tool';
  if (parent === 'inputs' && typeof last === 'number') return 'input';
  return '';
}
