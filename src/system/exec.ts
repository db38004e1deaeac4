import { execFile } from 'node:child_process';

const TIMEOUT_MS = 30_000;
const MAX_BUFFER = 16 * 1024 * 1024;

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export type Exec = (command: string, args: readonly string[]) => Promise<ExecResult>;

/**
 * Runs a short-lived command without a shell and collects its output.
 * Rejects when the command cannot be spawned or exits non-zero.
 */
export const execSimple: Exec = (command, args) => {
  const commandLine = [command, ...args].join(' ');
  return new Promise<ExecResult>((resolve, reject) => {
    execFile(
      command,
      [...args],
      { timeout: TIMEOUT_MS, maxBuffer: MAX_BUFFER, env: { ...process.env } },
      (error, stdout, stderr) => {
        if (error) {
          const detail = stderr.trim() ? `\n${stderr.trim()}` : '';
          reject(new Error(`'${commandLine}' failed (exit code ${error.code ?? 'unknown'}): ${error.message}${detail}`));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });
};
