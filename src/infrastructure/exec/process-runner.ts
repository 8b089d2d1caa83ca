import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { ExecutionError } from '../../domain/index.js';

/**
 * Runs `program` directly (no shell) and resolves with stdout and stderr
 * interleaved in arrival order.
 *
 * A non-zero exit or a spawn failure rejects with `ExecutionError`.
 * No timeout is applied here; a slow program stalls only its own request.
 */
export function runProcess(program: string, args: readonly string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let proc: ChildProcess;

    try {
      proc = spawn(program, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (err: unknown) {
      reject(new ExecutionError(`failed to spawn ${program}`, null, '', { cause: err }));
      return;
    }

    proc.stdout?.on('data', (chunk: Buffer) => chunks.push(chunk));
    proc.stderr?.on('data', (chunk: Buffer) => chunks.push(chunk));

    proc.on('error', (err) => {
      reject(new ExecutionError(`failed to run ${program}: ${err.message}`, null, '', { cause: err }));
    });

    proc.on('close', (code, signal) => {
      const output = Buffer.concat(chunks).toString('utf8');
      if (code === 0) {
        resolve(output);
        return;
      }
      reject(new ExecutionError(`${program} exited with ${code ?? signal}`, code, output));
    });
  });
}
