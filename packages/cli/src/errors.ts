// ============================================================================
// bluefind — Error Taxonomy
// ============================================================================
import type { ActionError, DeviceAction } from '@bluefind/shared';

export type ErrorCode =
  | 'ADAPTER_UNAVAILABLE'
  | 'ADAPTER_QUERY_ERROR'
  | 'NO_MATCH_FOUND'
  | 'INVALID_SELECTION'
  | 'ACTION_FAILED'
  | 'ABORTED';

export const EXIT_CODES: Record<ErrorCode, number> = {
  ADAPTER_UNAVAILABLE: 2,
  ADAPTER_QUERY_ERROR: 3,
  NO_MATCH_FOUND: 4,
  INVALID_SELECTION: 5,
  ACTION_FAILED: 6,
  ABORTED: 130,
};

export class BluefindError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

const INSTALL_HINTS: Record<string, string> = {
  blueutil: 'brew install blueutil',
  SwitchAudioSource: 'brew install switchaudio-osx',
};

export class AdapterUnavailableError extends BluefindError {
  readonly tool: string;

  constructor(tool: string, reason?: string) {
    const base = tool.split('/').pop() || tool;
    const hint = INSTALL_HINTS[base];
    let message = `'${tool}' is not available${reason ? ` (${reason})` : ''}.`;
    if (hint) message += ` Install it with: ${hint}`;
    super('ADAPTER_UNAVAILABLE', message);
    this.tool = tool;
  }
}

export class AdapterQueryError extends BluefindError {
  readonly query: string;

  constructor(query: string, message: string) {
    super('ADAPTER_QUERY_ERROR', `Could not read ${query}: ${message}`);
    this.query = query;
  }
}

export class NoMatchFoundError extends BluefindError {
  readonly searchQuery: string;

  constructor(searchQuery: string) {
    super('NO_MATCH_FOUND', `No paired device matches '${searchQuery}'`);
    this.searchQuery = searchQuery;
  }
}

export class InvalidSelectionError extends BluefindError {
  readonly input: string;

  constructor(input: string, count: number) {
    const shown = input.trim() === '' ? 'empty input' : `'${input.trim()}'`;
    super('INVALID_SELECTION', `Invalid selection ${shown}: expected a number from 1 to ${count}`);
    this.input = input;
  }
}

export class ActionFailedError extends BluefindError {
  readonly action: DeviceAction;
  readonly detail: ActionError;

  constructor(action: DeviceAction, deviceName: string, detail: ActionError) {
    const reason = detail.kind === 'DeviceNotReachable'
      ? `device not reachable (${detail.message})`
      : `exit code ${detail.exitCode ?? 'unknown'}: ${detail.message}`;
    super('ACTION_FAILED', `Failed to ${action} ${deviceName}: ${reason}`);
    this.action = action;
    this.detail = detail;
  }
}

export class PromptAbortedError extends BluefindError {
  constructor() {
    super('ABORTED', 'Aborted');
  }
}
