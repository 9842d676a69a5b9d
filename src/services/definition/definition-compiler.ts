/**
 * Definition Compiler
 *
 * Turns element trees described as data (YAML or JSON documents) into
 * element schemas. Validators are declared by name; their message comes
 * from the declaration, then from the configured overrides, then from the
 * validator's default.
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { DefinitionError } from '../../core/errors.js';
import {
  ElementDefinitionSchema,
  describeIssues,
  type ElementDefinition,
  type ValidatorDefinition
} from '../../core/schemas.js';
import { logger } from '../../core/logger.js';
import type { AnyElementSchema } from '../../schema/core.js';
import { Bool, Bytes, Float, Integer, Unicode } from '../../schema/scalars.js';
import { Dict, OrderedDict } from '../../schema/mappings.js';
import { List, Tuple } from '../../schema/sequences.js';
import { Form } from '../../schema/forms.js';
import { Maybe } from '../../schema/meta.js';
import type { Validator, ValidatorOptions } from '../../validation/validator.js';
import {
  AttributesEqual,
  ContainedIn,
  Converted,
  GreaterThan,
  IsFalse,
  IsTrue,
  IsURL,
  ItemsEqual,
  LengthWithinRange,
  LessThan,
  LongerThan,
  MatchesRegex,
  Present,
  ProbablyAnEmailAddress,
  ShorterThan,
  WithinRange
} from '../../validation/validators.js';

const log = logger.child({ scope: 'definition' });

export interface CompileOptions {
  /** Message template overrides keyed by validator name */
  messages?: Readonly<Record<string, string>>;
}

function patternOf(pattern: string | undefined, flags: string | undefined): RegExp | undefined {
  if (pattern === undefined) {
    return undefined;
  }
  try {
    return new RegExp(pattern, flags ?? '');
  } catch (error) {
    throw new DefinitionError(`Invalid pattern ${JSON.stringify(pattern)}`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }
}

/**
 * Instantiates one declared validator
 */
export function buildValidator(definition: ValidatorDefinition, options: CompileOptions = {}): Validator {
  const validatorOptions: ValidatorOptions = {
    message: definition.message ?? options.messages?.[definition.name]
  };

  switch (definition.name) {
    case 'present':
      return new Present(validatorOptions);
    case 'converted':
      return new Converted(validatorOptions);
    case 'is-true':
      return new IsTrue(validatorOptions);
    case 'is-false':
      return new IsFalse(validatorOptions);
    case 'shorter-than':
      return new ShorterThan(definition.upperbound, validatorOptions);
    case 'longer-than':
      return new LongerThan(definition.lowerbound, validatorOptions);
    case 'length-within-range':
      return new LengthWithinRange(definition.start, definition.end, validatorOptions);
    case 'contained-in':
      return new ContainedIn(definition.options, validatorOptions);
    case 'less-than':
      return new LessThan(definition.upperbound, validatorOptions);
    case 'greater-than':
      return new GreaterThan(definition.lowerbound, validatorOptions);
    case 'within-range':
      return new WithinRange(definition.start, definition.end, validatorOptions);
    case 'items-equal':
      return new ItemsEqual(definition.a, definition.b, validatorOptions);
    case 'attributes-equal':
      return new AttributesEqual(definition.a, definition.b, validatorOptions);
    case 'probably-an-email-address':
      return new ProbablyAnEmailAddress(validatorOptions);
    case 'matches-regex':
      return new MatchesRegex(patternOf(definition.pattern, definition.flags), validatorOptions);
    case 'is-url':
      return new IsURL(validatorOptions);
  }
}

function compileNode(definition: ElementDefinition, options: CompileOptions): AnyElementSchema {
  const schema = compileType(definition, options);
  const validators = (definition.validators ?? []).map((item) => buildValidator(item, options));
  return validators.length > 0 ? schema.validatedBy(...validators) : schema;
}

function compileType(definition: ElementDefinition, options: CompileOptions): AnyElementSchema {
  switch (definition.type) {
    case 'boolean':
      return Bool;
    case 'integer':
      return Integer;
    case 'float':
      return Float;
    case 'unicode':
      return Unicode;
    case 'bytes':
      return Bytes;
    case 'dict':
      return Dict.of(compileNode(definition.key, options), compileNode(definition.value, options));
    case 'ordered-dict':
      return OrderedDict.of(compileNode(definition.key, options), compileNode(definition.value, options));
    case 'list':
      return List.of(compileNode(definition.member, options));
    case 'tuple':
      return Tuple.of(...definition.members.map((member) => compileNode(member, options)));
    case 'form': {
      const fields: Record<string, AnyElementSchema> = {};
      for (const [name, field] of Object.entries(definition.fields)) {
        fields[name] = compileNode(field, options);
      }
      return Form.of(fields);
    }
    case 'maybe':
      return Maybe(compileNode(definition.of, options));
  }
}

/**
 * Validates `document` as an element definition and compiles it
 *
 * @throws DefinitionError when the document is not a valid definition
 */
export function compileDefinition(document: unknown, options: CompileOptions = {}): AnyElementSchema {
  const result = ElementDefinitionSchema.safeParse(document);
  if (!result.success) {
    throw new DefinitionError('Invalid element definition', describeIssues(result.error));
  }
  const schema = compileNode(result.data, options);
  log.debug('compiled definition', { type: schema.typeName });
  return schema;
}

/**
 * Reads and compiles a YAML or JSON definition file
 */
export async function loadDefinition(filePath: string, options: CompileOptions = {}): Promise<AnyElementSchema> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DefinitionError(`Cannot read definition ${filePath}`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  let document: unknown;
  try {
    document = yaml.parse(content);
  } catch (error) {
    throw new DefinitionError(`Definition ${filePath} does not parse`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }
  return compileDefinition(document, options);
}
