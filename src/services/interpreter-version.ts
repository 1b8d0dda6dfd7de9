import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { InterpreterVersionResult } from '../types/report-gate.js';
import { logSystemCommand } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const MAX_OUTPUT_BYTES = 64 * 1024;

export const MAJOR_VERSION_SCRIPT = 'import sys; print(sys.version_info[0])';

/** Drop trailing `\n` characters only, as shell command substitution does. A `\r` stays. */
export function stripTrailingNewlines(output: string): string {
  return output.replace(/\n+$/, '');
}

function readCapturedStdout(error: unknown): string {
  if (error instanceof Error && 'stdout' in error && typeof error.stdout === 'string') {
    return error.stdout;
  }
  return '';
}

function describeFailure(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
    return `exited with code ${error.code}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Ask the interpreter for its major version. Never rejects; any failure comes
 * back with `ok: false` and whatever stdout was captured before it.
 */
export async function queryInterpreterMajorVersion(
  interpreter: string,
  timeoutMs: number,
): Promise<InterpreterVersionResult> {
  const args = ['-c', MAJOR_VERSION_SCRIPT];
  const commandPreview = `${interpreter} -c "${MAJOR_VERSION_SCRIPT}"`;

  try {
    const { stdout } = await execFileAsync(interpreter, args, {
      encoding: 'utf8',
      timeout: timeoutMs,
      windowsHide: true,
      maxBuffer: MAX_OUTPUT_BYTES,
    });
    const output = stripTrailingNewlines(stdout);
    await logSystemCommand(commandPreview, output, 0);
    return { output, ok: true, detail: `${interpreter} reported '${output}'.` };
  } catch (error: unknown) {
    const output = stripTrailingNewlines(readCapturedStdout(error));
    const failure = describeFailure(error);
    await logSystemCommand(commandPreview, output || failure, 1);
    return { output, ok: false, detail: `${interpreter} version query failed (${failure}).` };
  }
}
