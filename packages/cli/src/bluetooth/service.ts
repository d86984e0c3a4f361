// ============================================================================
// bluefind — Bluetooth Query Service
// Wraps blueutil (and SwitchAudioSource for the audio route)
// ============================================================================
import { EventEmitter } from 'events';
import type { CommandEvent, Device, StatusIssue, StatusQuery, SystemStatus } from '@bluefind/shared';
import { AdapterQueryError, AdapterUnavailableError } from '../errors.js';
import { parseFlag, parsePairedDevices } from './parser.js';
import type { CommandOutput, CommandRunner } from './runner.js';

export interface BluetoothServiceOptions {
  runner: CommandRunner;
  blueutilPath: string;
  audioToolPath: string;
}

export class BluetoothService extends EventEmitter {
  private readonly runner: CommandRunner;
  private readonly blueutil: string;
  private readonly audioTool: string;

  constructor(opts: BluetoothServiceOptions) {
    super();
    this.runner = opts.runner;
    this.blueutil = opts.blueutilPath;
    this.audioTool = opts.audioToolPath;
  }

  /** Runs blueutil with the given arguments and reports the call as a `command` event. */
  exec(args: string[]): CommandOutput {
    return this.execTool(this.blueutil, args);
  }

  listDevices(): Device[] {
    const out = this.query('paired devices', this.blueutil, ['--paired']);
    return parsePairedDevices(out);
  }

  getPower(): boolean {
    return parseFlag(this.query('power state', this.blueutil, ['--power']), 'power state');
  }

  getDiscoverable(): boolean {
    return parseFlag(this.query('discoverable state', this.blueutil, ['--discoverable']), 'discoverable state');
  }

  getAudioOutput(): string {
    const name = this.query('audio output', this.audioTool, ['-c', '-t', 'output']).trim();
    if (!name) throw new AdapterQueryError('audio output', 'empty output');
    return name;
  }

  getStatus(): SystemStatus {
    const issues: StatusIssue[] = [];
    const powered = this.capture('power', issues, () => this.getPower());
    const discoverable = this.capture('discoverable', issues, () => this.getDiscoverable());
    const audioOutput = this.capture('audio-output', issues, () => this.getAudioOutput(), true);
    const devices = this.capture('devices', issues, () => this.listDevices()) ?? [];
    return { powered, discoverable, audioOutput, devices, issues };
  }

  // Query errors become issues; a missing tool is fatal unless the query is optional
  private capture<T>(query: StatusQuery, issues: StatusIssue[], fn: () => T, optional = false): T | null {
    try {
      return fn();
    } catch (err) {
      if (err instanceof AdapterQueryError) {
        issues.push({ query, kind: 'query-error', message: err.message });
        return null;
      }
      if (optional && err instanceof AdapterUnavailableError) {
        issues.push({ query, kind: 'unavailable', message: err.message });
        return null;
      }
      throw err;
    }
  }

  private query(what: string, command: string, args: string[]): string {
    const out = this.execTool(command, args);
    if (out.status !== 0) {
      const detail = out.stderr.trim() || out.stdout.trim() || `exit code ${out.status ?? 'unknown'}`;
      throw new AdapterQueryError(what, detail);
    }
    return out.stdout;
  }

  private execTool(command: string, args: string[]): CommandOutput {
    const out = this.runner.run(command, args);
    const event: CommandEvent = { command, args, status: out.status };
    this.emit('command', event);
    return out;
  }
}
