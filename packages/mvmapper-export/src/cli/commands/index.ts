/**
 * CLI Commands
 */

export {
  exportCommand,
  type ExportCommandOptions,
  type ExportCommandContext,
  type ExportCommandResult,
} from './export/index.js';
