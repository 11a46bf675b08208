/**
 * Utilities for executing system commands
 */

import { exec } from 'child_process';
import { promisify } from 'util';

const execAsync = promisify(exec);

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

interface ExecFailure {
  stdout?: string;
  stderr?: string;
  code?: number | string;
  message?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null;
}

/**
 * Execute a command through the shell and return the result.
 * Never rejects: failures are reported through a non-zero exit code.
 */
export async function executeCommand(
  command: string,
  options?: { timeout?: number; cwd?: string }
): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execAsync(command, {
      timeout: options?.timeout ?? 30000,
      cwd: options?.cwd,
      maxBuffer: 10 * 1024 * 1024, // 10MB
    });

    return {
      stdout: stdout.trim(),
      stderr: stderr.trim(),
      exitCode: 0,
    };
  } catch (error: unknown) {
    const failure: ExecFailure = isExecFailure(error) ? error : { message: String(error) };
    return {
      stdout: failure.stdout ? failure.stdout.trim() : '',
      stderr: failure.stderr ? failure.stderr.trim() : failure.message ?? '',
      exitCode: typeof failure.code === 'number' ? failure.code : 1,
    };
  }
}

/**
 * Check if a command exists in PATH
 */
export async function commandExists(command: string): Promise<boolean> {
  const result = await executeCommand(`command -v ${command}`);
  return result.exitCode === 0;
}
