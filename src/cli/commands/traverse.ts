// Traverse command - list every leaf of a coerced document with its path

import { Command } from 'commander';
import { ConfigService } from '../../services/config/config-service.js';
import { ValidationService, type LeafEntry } from '../../services/validation/validation-service.js';
import { Logger, LogLevel } from '../../core/logger.js';
import { withErrorHandling } from '../utils/error-handler.js';

function renderLeaf(leaf: LeafEntry): string {
  const value = leaf.state === 'coerced' ? JSON.stringify(leaf.value) : `<${leaf.state}>`;
  return `[${leaf.path.join(', ')}]  ${leaf.label}  ${leaf.type} = ${value}`;
}

export const traverseCommand = new Command('traverse')
  .description('Print every leaf element of a coerced document with its path')
  .argument('<definition>', 'Definition file (YAML or JSON)')
  .argument('<input>', 'Input document (YAML or JSON)')
  .option('-c, --config <path>', 'Configuration file')
  .option('-v, --verbose', 'Enable debug logging')
  .action(withErrorHandling(async (definition: string, input: string, options: { config?: string; verbose?: boolean }) => {
    const config = new ConfigService({ configPath: options.config });
    Logger.configure({ level: options.verbose ? LogLevel.DEBUG : await config.getLogLevel() });

    const service = new ValidationService({ config });
    const schema = await service.loadSchema(definition);
    const element = schema.create(await service.readInput(input));
    const leaves = service.leaves(element);

    if (leaves.length === 0) {
      console.log('No leaf elements.');
      return;
    }
    for (const leaf of leaves) {
      console.log(renderLeaf(leaf));
    }
  }));
