/**
 * vm-report CLI entry point
 */

import { createProgram, handleCliError } from './program';

createProgram().parseAsync().catch(handleCliError);
