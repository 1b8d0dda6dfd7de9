import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import type { ReporterCommand, ReporterRunResult } from '../types/report-gate.js';

export const EXIT_COMMAND_NOT_FOUND = 127;
export const EXIT_COMMAND_NOT_EXECUTABLE = 126;
const SIGNAL_EXIT_BASE = 128;

/** Exit status a POSIX shell reports for a process killed by `signal`. */
export function signalExitCode(signal: NodeJS.Signals): number {
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal && typeof value === 'number') {
      return SIGNAL_EXIT_BASE + value;
    }
  }
  return SIGNAL_EXIT_BASE;
}

/** Exit status a POSIX shell reports when it cannot start the command at all. */
export function spawnFailureExitCode(error: Error): number {
  const code = 'code' in error ? error.code : undefined;
  if (code === 'ENOENT') {
    return EXIT_COMMAND_NOT_FOUND;
  }
  if (code === 'EACCES') {
    return EXIT_COMMAND_NOT_EXECUTABLE;
  }
  return 1;
}

export function formatReporterCommand(command: ReporterCommand): string {
  return [command.executable, ...command.args].join(' ');
}

/**
 * Start the reporter in `cwd` with the parent's stdio and environment, and
 * resolve with its exit status once it is gone. Never rejects.
 */
export function runReporter(command: ReporterCommand, cwd: string): Promise<ReporterRunResult> {
  const started = Date.now();

  return new Promise((resolve) => {
    let settled = false;
    const settle = (result: Omit<ReporterRunResult, 'durationMs'>): void => {
      if (settled) {
        return;
      }
      settled = true;
      resolve({ ...result, durationMs: Date.now() - started });
    };

    const child = spawn(command.executable, command.args, {
      cwd,
      env: process.env,
      stdio: 'inherit',
      windowsHide: true,
    });

    child.once('error', (error: Error) => {
      settle({ exitCode: spawnFailureExitCode(error), signal: null, spawnError: error.message });
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (code !== null) {
        settle({ exitCode: code, signal: null });
        return;
      }
      settle({ exitCode: signal ? signalExitCode(signal) : 1, signal });
    });
  });
}
