import type { Device } from '@bluefind/shared';
import type { CommandOutput, CommandRunner } from '../src/bluetooth/runner.js';
import { AdapterUnavailableError } from '../src/errors.js';
import type { Prompter } from '../src/prompt/prompter.js';

export const ok = (stdout: string): CommandOutput => ({ status: 0, stdout, stderr: '' });
export const fail = (status: number, stderr: string): CommandOutput => ({ status, stdout: '', stderr });

/** Answers commands from a table keyed by the full command line. */
export class FakeRunner implements CommandRunner {
  readonly calls: string[] = [];

  constructor(private responses: Record<string, CommandOutput | Error>) {}

  run(command: string, args: string[]): CommandOutput {
    const key = [command, ...args].join(' ');
    this.calls.push(key);
    const response = this.responses[key];
    if (response === undefined) throw new Error(`unexpected command: ${key}`);
    if (response instanceof Error) throw response;
    return response;
  }
}

export class MissingToolRunner implements CommandRunner {
  run(command: string): CommandOutput {
    throw new AdapterUnavailableError(command, 'not found on PATH');
  }
}

export class FakePrompter implements Prompter {
  readonly printed: string[] = [];
  readonly questions: string[] = [];
  closed = false;

  constructor(private answer: string) {}

  print(line: string): void {
    this.printed.push(line);
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answer;
  }

  close(): void {
    this.closed = true;
  }
}

export function device(name: string, address: string, connected = false): Device {
  return { name, address, connected, paired: true };
}

export function pairedLine(d: Device): string {
  const state = d.connected ? 'connected (master, -52 dBm)' : 'not connected';
  return `address: ${d.address}, ${state}, not favourite, paired, name: "${d.name}", recent access date: 2024-05-01 10:00:00 +0000`;
}

export function pairedOutput(devices: Device[]): string {
  return devices.map(pairedLine).join('\n') + '\n';
}
