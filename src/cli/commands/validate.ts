// Validate command - coerce an input document and report its errors

import { Command } from 'commander';
import { ConfigService } from '../../services/config/config-service.js';
import { ValidationService } from '../../services/validation/validation-service.js';
import { formatReport } from '../../services/report/report-service.js';
import { Logger, LogLevel } from '../../core/logger.js';
import { withErrorHandling } from '../utils/error-handler.js';

interface ValidateOptions {
  name?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export const validateCommand = new Command('validate')
  .description('Validate an input document against an element definition')
  .argument('<definition>', 'Definition file (YAML or JSON)')
  .argument('<input>', 'Input document (YAML or JSON)')
  .option('-n, --name <name>', 'Display name of the root element')
  .option('-c, --config <path>', 'Configuration file')
  .option('--json', 'Print the report as JSON')
  .option('-v, --verbose', 'Log every validator call')
  .action(withErrorHandling(async (definition: string, input: string, options: ValidateOptions) => {
    const config = new ConfigService({ configPath: options.config });
    Logger.configure({ level: options.verbose ? LogLevel.DEBUG : await config.getLogLevel() });

    const service = new ValidationService({ config });
    const context = options.name ? { name: options.name } : {};
    const report = await service.validateFiles(definition, input, context);

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(formatReport(report));
    }

    if (!report.valid) {
      process.exitCode = 1;
    }
  }));
