/**
 * Validation Service
 *
 * Ties the pieces together for file-based use: loads configuration and a
 * definition, reads an input document, coerces and validates it, and
 * reports the result.
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { InputError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { AnyElementSchema, Element } from '../../schema/core.js';
import type { TraversalPath, ValidationContext } from '../../models/types.js';
import { ConfigService } from '../config/config-service.js';
import { compileDefinition, loadDefinition } from '../definition/definition-compiler.js';
import { buildReport, describePath, type ValidationReport } from '../report/report-service.js';
import { isSentinel, isUnspecified } from '../../core/sentinels.js';
import { toPlain } from '../../schema/raw.js';

const log = logger.child({ scope: 'validation-service' });

export interface LeafEntry {
  path: TraversalPath;
  label: string;
  type: string;
  state: 'coerced' | 'unspecified' | 'unserializable';
  value: unknown;
}

export class ValidationService {
  private config: ConfigService;

  constructor(options: { config?: ConfigService } = {}) {
    this.config = options.config ?? new ConfigService();
  }

  /**
   * Reads a YAML or JSON document. YAML is a superset of JSON, so one
   * parser covers both.
   */
  async readInput(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new InputError(
        `Cannot read input: ${error instanceof Error ? error.message : String(error)}`,
        filePath
      );
    }
    try {
      return yaml.parse(content);
    } catch (error) {
      throw new InputError(
        `Input does not parse: ${error instanceof Error ? error.message : String(error)}`,
        filePath
      );
    }
  }

  async loadSchema(definitionPath: string): Promise<AnyElementSchema> {
    const messages = await this.config.getMessages();
    return loadDefinition(definitionPath, { messages });
  }

  async compileSchema(document: unknown): Promise<AnyElementSchema> {
    const messages = await this.config.getMessages();
    return compileDefinition(document, { messages });
  }

  /**
   * Creates an element from `raw`, validates it and builds the report
   */
  async validate(schema: AnyElementSchema, raw: unknown, context: ValidationContext = {}): Promise<{
    element: Element;
    report: ValidationReport;
  }> {
    const element = schema.create(raw);
    const effectiveContext = await this.config.getContext(context);
    const valid = element.validate(effectiveContext);
    const report = buildReport(element);
    log.debug('validated', { type: schema.typeName, valid, issues: report.issues.length });
    return { element, report };
  }

  async validateFiles(
    definitionPath: string,
    inputPath: string,
    context: ValidationContext = {}
  ): Promise<ValidationReport> {
    const schema = await this.loadSchema(definitionPath);
    const raw = await this.readInput(inputPath);
    const { report } = await this.validate(schema, raw, context);
    return report;
  }

  /**
   * Every leaf of the coerced tree with its path
   */
  leaves(element: Element): LeafEntry[] {
    const entries: LeafEntry[] = [];
    for (const { path, element: leaf } of element.traverse()) {
      const value = leaf.value;
      entries.push({
        path,
        label: describePath(element, path),
        type: leaf.typeName,
        state: isUnspecified(value) ? 'unspecified' : isSentinel(value) ? 'unserializable' : 'coerced',
        value: isSentinel(value) ? undefined : toPlain(value)
      });
    }
    return entries;
  }
}
