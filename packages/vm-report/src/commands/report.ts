/**
 * vm-report <project> <instance> <zone>
 *
 * Describe a Compute Engine VM and write a text report with backup commands
 * for each of its disks.
 */

import chalk from 'chalk';
import ora from 'ora';
import { GcloudCommandError } from '../errors';
import { isGcloudInstalled } from '../gcp';
import { createCommandLogger, getLogPath, logFullError } from '../logger';
import { writeVmReport } from '../services/report.service';

export interface ReportCommandOptions {
  outputDir?: string;
  print?: boolean;
}

export async function reportAction(
  projectId: string,
  instanceName: string,
  zone: string,
  options: ReportCommandOptions
): Promise<void> {
  const log = createCommandLogger('report');
  log.info('Starting report', { projectId, instanceName, zone, ...options });

  if (!(await isGcloudInstalled())) {
    log.error('gcloud CLI not found');
    console.error(chalk.red('\n  gcloud CLI not found.'));
    console.error(chalk.gray('  Install the Google Cloud SDK and run `gcloud auth login`:'));
    console.error(chalk.gray('  https://cloud.google.com/sdk/docs/install\n'));
    process.exit(1);
  }

  const spinner = ora(`Collecting information for ${instanceName}...`).start();

  try {
    const { filePath, report, content } = await writeVmReport(
      { projectId, instanceName, zone, outputDir: options.outputDir },
      { logger: log }
    );

    spinner.succeed(`VM information saved to: ${chalk.cyan(filePath)}`);

    for (const disk of report.disks.filter((d) => d.describeFailed)) {
      console.log(chalk.yellow(`  Warning: unable to describe disk '${disk.name}'; size and type are unknown.`));
    }

    if (options.print) {
      console.log('');
      console.log(content);
    }
  } catch (error) {
    spinner.fail('Failed to collect VM information');
    logFullError('report', error, { projectId, instanceName, zone });

    console.error(chalk.red(`\n  ${error instanceof Error ? error.message : String(error)}`));
    if (error instanceof GcloudCommandError && error.stderr) {
      console.error(chalk.gray(error.stderr.split('\n').map((line) => `  ${line}`).join('\n')));
    }
    console.error(chalk.gray(`\n  Debug log: ${getLogPath()}\n`));
    process.exit(1);
  }
}
