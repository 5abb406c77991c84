/**
 * Error types raised by vm-report
 */

/**
 * A gcloud invocation exited non-zero
 */
export class GcloudCommandError extends Error {
  args: string[];
  stderr: string;

  constructor(args: string[], stderr: string, options?: { cause?: unknown }) {
    super(`gcloud ${args.join(' ')} failed${stderr ? `: ${firstLine(stderr)}` : ''}`, options);
    this.name = 'GcloudCommandError';
    this.args = args;
    this.stderr = stderr;
  }
}

/**
 * gcloud succeeded but printed something we could not use
 */
export class GcloudOutputError extends Error {
  args: string[];

  constructor(args: string[], detail: string, options?: { cause?: unknown }) {
    super(`Unexpected output from gcloud ${args.join(' ')}: ${detail}`, options);
    this.name = 'GcloudOutputError';
    this.args = args;
  }
}

function firstLine(text: string): string {
  const line = text
    .split('\n')
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  return line ?? '';
}
