/**
 * gcloud CLI wrapper
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { z } from 'zod';
import { GcloudCommandError, GcloudOutputError } from '../errors';
import { logCommand, logStderr } from '../logger';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

/**
 * Runs gcloud with an argument vector and resolves with its stdout
 */
export type GcloudRunner = (args: string[]) => Promise<string>;

/**
 * gcloud binary to invoke (VM_REPORT_GCLOUD overrides the PATH lookup)
 */
export function getGcloudBinary(): string {
  return process.env.VM_REPORT_GCLOUD || 'gcloud';
}

/**
 * What to report for a failed call: its stderr, or the spawn error itself
 * (ENOENT and friends leave stderr empty)
 */
function describeFailure(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error) {
    const stderr = String(error.stderr).trim();
    if (stderr) {
      return stderr;
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export const runGcloud: GcloudRunner = async (args) => {
  const binary = getGcloudBinary();
  logCommand(`${binary} ${args.join(' ')}`);

  try {
    const { stdout, stderr } = await execFileAsync(binary, args, { maxBuffer: MAX_OUTPUT_BYTES });
    logStderr(stderr);
    return stdout;
  } catch (error) {
    throw new GcloudCommandError(args, describeFailure(error), { cause: error });
  }
};

/**
 * Run a gcloud command with --format=json and validate what it prints
 */
export async function runGcloudJson<S extends z.ZodTypeAny>(
  args: string[],
  schema: S,
  runner: GcloudRunner = runGcloud
): Promise<z.infer<S>> {
  const stdout = await runner([...args, '--format=json']);

  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new GcloudOutputError(args, 'output is not valid JSON', { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new GcloudOutputError(args, detail);
  }

  return result.data;
}

/**
 * Check if the gcloud CLI is installed
 */
export async function isGcloudInstalled(): Promise<boolean> {
  try {
    await execFileAsync('which', [getGcloudBinary()]);
    return true;
  } catch {
    return false;
  }
}
