// Zod schemas for definition documents and configuration files

import { z } from 'zod';

const message = z.string().min(1).optional();

/**
 * A labelled position for items-equal / attributes-equal: [label, key]
 */
export const LabelledKeySchema = z.tuple([z.string().min(1), z.union([z.string(), z.number().int()])]);

const BoundSchema = z.union([z.number(), z.string()]);

/**
 * Validator declarations, discriminated by name
 */
export const ValidatorDefinitionSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('present'), message }),
  z.object({ name: z.literal('converted'), message }),
  z.object({ name: z.literal('is-true'), message }),
  z.object({ name: z.literal('is-false'), message }),
  z.object({ name: z.literal('shorter-than'), upperbound: z.number().int().nonnegative(), message }),
  z.object({ name: z.literal('longer-than'), lowerbound: z.number().int().nonnegative(), message }),
  z.object({
    name: z.literal('length-within-range'),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    message
  }),
  z.object({
    name: z.literal('contained-in'),
    options: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).min(1),
    message
  }),
  z.object({ name: z.literal('less-than'), upperbound: BoundSchema, message }),
  z.object({ name: z.literal('greater-than'), lowerbound: BoundSchema, message }),
  z.object({ name: z.literal('within-range'), start: BoundSchema, end: BoundSchema, message }),
  z.object({ name: z.literal('items-equal'), a: LabelledKeySchema, b: LabelledKeySchema, message }),
  z.object({ name: z.literal('attributes-equal'), a: LabelledKeySchema, b: LabelledKeySchema, message }),
  z.object({ name: z.literal('probably-an-email-address'), message }),
  z.object({ name: z.literal('matches-regex'), pattern: z.string().optional(), flags: z.string().optional(), message }),
  z.object({ name: z.literal('is-url'), message })
]);

export type ValidatorDefinition = z.infer<typeof ValidatorDefinitionSchema>;
export type ValidatorName = ValidatorDefinition['name'];

export const ScalarTypeSchema = z.enum(['boolean', 'integer', 'float', 'unicode', 'bytes']);
export type ScalarType = z.infer<typeof ScalarTypeSchema>;

/**
 * An element tree described as data
 */
export type ElementDefinition =
  | { type: ScalarType; validators?: ValidatorDefinition[] }
  | { type: 'dict' | 'ordered-dict'; key: ElementDefinition; value: ElementDefinition; validators?: ValidatorDefinition[] }
  | { type: 'list'; member: ElementDefinition; validators?: ValidatorDefinition[] }
  | { type: 'tuple'; members: ElementDefinition[]; validators?: ValidatorDefinition[] }
  | { type: 'form'; fields: Record<string, ElementDefinition>; validators?: ValidatorDefinition[] }
  | { type: 'maybe'; of: ElementDefinition; validators?: ValidatorDefinition[] };

const validators = z.array(ValidatorDefinitionSchema).optional();

export const ElementDefinitionSchema: z.ZodType<ElementDefinition> = z.lazy(() =>
  z.union([
    z.object({ type: ScalarTypeSchema, validators }).strict(),
    z.object({
      type: z.enum(['dict', 'ordered-dict']),
      key: ElementDefinitionSchema,
      value: ElementDefinitionSchema,
      validators
    }).strict(),
    z.object({ type: z.literal('list'), member: ElementDefinitionSchema, validators }).strict(),
    z.object({ type: z.literal('tuple'), members: z.array(ElementDefinitionSchema).min(1), validators }).strict(),
    z.object({ type: z.literal('form'), fields: z.record(ElementDefinitionSchema), validators }).strict(),
    z.object({ type: z.literal('maybe'), of: ElementDefinitionSchema, validators }).strict()
  ])
);

/**
 * formwork.config.yaml
 */
export const ConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  messages: z.record(z.string().min(1)).default({}),
  context: z.object({ name: z.string().optional() }).catchall(z.unknown()).default({})
}).strict();

export type FormworkConfig = z.infer<typeof ConfigSchema>;

/**
 * Flattens zod issues into `path: message` lines
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
