import chalk from 'chalk';
import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { reportAction, type ReportCommandOptions } from './commands/report';

export const VERSION = '0.1.0';

export const USAGE = 'Usage: vm-report <PROJECT_ID> <INSTANCE_NAME> <ZONE>';

const USAGE_ERROR_CODES = new Set(['commander.missingArgument', 'commander.excessArguments']);

/**
 * True when commander rejected the positional argument count
 */
export function isUsageError(error: unknown): error is CommanderError {
  return error instanceof CommanderError && USAGE_ERROR_CODES.has(error.code);
}

export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  program
    .name('vm-report')
    .description('Write a Compute Engine VM report with ready-to-run disk backup commands')
    .version(VERSION)
    .argument('<project>', 'GCP project ID')
    .argument('<instance>', 'VM instance name')
    .argument('<zone>', 'Zone the instance runs in (e.g. us-east1-b)')
    .option('-o, --output-dir <dir>', 'Directory to write the report to (default: current directory)')
    .option('--print', 'Also print the report to stdout')
    .allowExcessArguments(false)
    .exitOverride()
    .action(async (project: string, instance: string, zone: string, options: ReportCommandOptions) => {
      await reportAction(project, instance, zone, options);
    });

  if (output) {
    program.configureOutput(output);
  }

  return program;
}

/**
 * Final handler for anything parseAsync rejects with
 */
export function handleCliError(error: unknown): never {
  if (isUsageError(error)) {
    console.error(USAGE);
    process.exit(1);
  }

  if (error instanceof CommanderError) {
    // --help and --version also arrive here, with exit code 0
    process.exit(error.exitCode);
  }

  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
}
