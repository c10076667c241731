import { execFile } from 'child_process';
import { describeError, errorCode } from '../types/errors';

export type CommandOutcome =
  | { kind: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { kind: 'timeout' }
  | { kind: 'missing' }
  | { kind: 'failed'; detail: string };

export interface RunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type CommandRunner = (file: string, args: string[], opts: RunOptions) => Promise<CommandOutcome>;

/**
 * Runs a command once and reports how it ended. The child is killed when
 * `timeoutMs` elapses or `signal` aborts, so nothing outlives the call.
 */
export const execCommand: CommandRunner = (file, args, opts) =>
  new Promise(resolve => {
    execFile(
      file,
      args,
      { timeout: opts.timeoutMs, killSignal: 'SIGKILL', signal: opts.signal, windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ kind: 'exited', exitCode: 0, stdout, stderr });
          return;
        }
        const code = errorCode(error);
        if (code === 'ENOENT') {
          resolve({ kind: 'missing' });
        } else if (code === 'ABORT_ERR' || (error.killed && error.signal === 'SIGKILL')) {
          resolve({ kind: 'timeout' });
        } else if (typeof error.code === 'number') {
          resolve({ kind: 'exited', exitCode: error.code, stdout, stderr });
        } else {
          resolve({ kind: 'failed', detail: describeError(error) });
        }
      }
    );
  });
