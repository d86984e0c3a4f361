// ============================================================================
// bluefind — Subprocess Runner
// One blocking call per query; no shell, no timeout
// ============================================================================
import { spawnSync } from 'child_process';
import { AdapterUnavailableError } from '../errors.js';

export interface CommandOutput {
  status: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: string[]): CommandOutput;
}

const MISSING_CODES = new Set(['ENOENT', 'EACCES']);

function errnoCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

export class SpawnRunner implements CommandRunner {
  run(command: string, args: string[]): CommandOutput {
    const result = spawnSync(command, args, { encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] });
    if (result.error) {
      const code = errnoCode(result.error);
      if (code && MISSING_CODES.has(code)) {
        throw new AdapterUnavailableError(command, code === 'EACCES' ? 'not executable' : 'not found on PATH');
      }
      throw result.error;
    }
    return {
      status: result.status,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}
