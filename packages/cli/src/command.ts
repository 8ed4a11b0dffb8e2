import { spawn } from 'child_process';

/** Runs a command to completion, optionally writing `input` to its stdin. */
export type CommandRunner = (command: string, args: readonly string[], input?: string) => Promise<void>;

export const runCommand: CommandRunner = (command, args, input) =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['pipe', 'ignore', 'pipe'] });
    let stderr = '';
    proc.stderr.setEncoding('utf8');
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    proc.on('error', reject);
    proc.on('close', (code: number | null) => {
      if (code === 0) {
        resolve();
      } else {
        const detail = stderr.trim();
        reject(new Error(`${command} exited with code ${code}${detail ? `: ${detail}` : ''}`));
      }
    });
    proc.stdin.on('error', reject);
    proc.stdin.end(input ?? '');
  });
