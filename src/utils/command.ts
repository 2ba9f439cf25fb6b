import { execFile } from 'node:child_process';

/** Runs an executable and resolves with its stdout. */
export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<string>;

export function isCommandMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export const runCommand: CommandRunner = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(file, args, { timeout: timeoutMs, encoding: 'utf-8' }, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });
