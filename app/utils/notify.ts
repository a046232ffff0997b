/**
 * Desktop notification process runner.
 * Spawns the notifier binary, captures its output and reports the outcome as
 * a tagged result instead of throwing.
 */

import { spawn, type SpawnOptions } from 'child_process';
import type { Readable } from 'stream';

export type NotifierResult =
  | { kind: 'success'; stdout: string; stderr: string }
  | {
      kind: 'process-failure';
      /** Human-readable reason: exit code, signal or spawn error. */
      reason: string;
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
    }
  | { kind: 'binary-not-found'; binary: string };

export type NotifierRunner = (binary: string, args: readonly string[]) => Promise<NotifierResult>;

/** The part of a ChildProcess the runner relies on. */
export interface SpawnedProcess {
  stdout: Readable | null;
  stderr: Readable | null;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedProcess;

function errorCode(err: Error): unknown {
  return 'code' in err ? err.code : undefined;
}

/**
 * Build a runner that starts `binary` with `args` and waits for it to exit.
 * No timeout is applied: notify-send returns as soon as the notification is
 * handed to the daemon.
 */
export function createNotifierRunner(spawnProcess: SpawnFn = spawn): NotifierRunner {
  return (binary, args) => new Promise<NotifierResult>((resolve) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const settle = (result: NotifierResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const proc = spawnProcess(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    proc.stdout?.on('data', (d: Buffer) => { stdout += d.toString(); });
    proc.stderr?.on('data', (d: Buffer) => { stderr += d.toString(); });

    proc.on('error', (err) => {
      if (errorCode(err) === 'ENOENT') {
        settle({ kind: 'binary-not-found', binary });
        return;
      }
      settle({
        kind: 'process-failure',
        reason: err.message,
        exitCode: null,
        signal: null,
        stdout,
        stderr,
      });
    });

    proc.on('close', (code, signal) => {
      if (code === 0) {
        settle({ kind: 'success', stdout, stderr });
        return;
      }
      settle({
        kind: 'process-failure',
        reason: signal ? `${binary} terminated by signal ${signal}` : `${binary} exited with code ${code}`,
        exitCode: code,
        signal,
        stdout,
        stderr,
      });
    });
  });
}

export const execNotifier = createNotifierRunner();
