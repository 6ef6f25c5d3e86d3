import { spawn } from 'child_process';
import type { ExecCommand, ExecOptions, ExecResult } from './types';

/**
 * ExecCommand backed by child_process.spawn. Never rejects: spawn failures
 * come back as exit code 1 with the error message on stderr.
 */
export function createExecCommand(defaultCwd: string = process.cwd()): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions) =>
    new Promise<ExecResult>((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd ?? defaultCwd,
        env: { ...process.env, ...options?.env },
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('close', (code: number | null) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      proc.on('error', (error: Error) => {
        resolve({ exitCode: 1, stdout, stderr: error.message });
      });
    });
}
