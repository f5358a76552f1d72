/**
 * Runs the Vespa CLI (`vespa deploy`, `vespa status`). The CLI must be on PATH
 * or configured through VESPA_CLI.
 */

import { spawn } from 'child_process';

export interface CliResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: string;
}

export type CliRunner = (executable: string, args: string[]) => Promise<CliResult>;

export const runCli: CliRunner = (executable, args) => new Promise((resolve) => {
  let stdout = '';
  let stderr = '';

  const proc = spawn(executable, args, {
    shell: false,
    stdio: ['ignore', 'pipe', 'pipe']
  });

  proc.stdout?.on('data', (chunk: Buffer) => {
    stdout += chunk.toString();
  });

  proc.stderr?.on('data', (chunk: Buffer) => {
    stderr += chunk.toString();
  });

  proc.on('close', (code) => {
    resolve({ exitCode: code ?? null, stdout: stdout.trim(), stderr: stderr.trim() });
  });

  proc.on('error', (err) => {
    resolve({ exitCode: null, stdout: stdout.trim(), stderr: stderr.trim(), error: err.message });
  });
});

export function deployArgs(configUrl: string, appPath: string, waitSeconds: number): string[] {
  return ['deploy', '--wait', String(waitSeconds), '--target', configUrl, appPath];
}

export function statusArgs(configUrl: string, waitSeconds: number): string[] {
  return ['status', '--wait', String(waitSeconds), '--target', configUrl];
}
