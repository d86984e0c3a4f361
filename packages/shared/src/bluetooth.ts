// Bluetooth Control Types

export interface Device {
  name: string;
  address: string;
  connected: boolean;
  paired: boolean;
}

export type StatusQuery = 'power' | 'discoverable' | 'audio-output' | 'devices';
export type StatusIssueKind = 'unavailable' | 'query-error';

export interface StatusIssue {
  query: StatusQuery;
  kind: StatusIssueKind;
  message: string;
}

// null fields are the ones whose query failed; see issues
export interface SystemStatus {
  powered: boolean | null;
  discoverable: boolean | null;
  audioOutput: string | null;
  devices: Device[];
  issues: StatusIssue[];
}

export type MatchStrategy = 'substring' | 'fuzzy';

export interface MatchResult {
  strategy: MatchStrategy;
  devices: Device[];
}

export type DeviceAction = 'connect' | 'disconnect';

export interface ActionAck {
  action: DeviceAction;
  address: string;
}

export type ActionError =
  | { kind: 'DeviceNotReachable'; address: string; message: string }
  | { kind: 'ExternalToolFailure'; exitCode: number | null; message: string };

export type ActionResult =
  | { ok: true; ack: ActionAck }
  | { ok: false; error: ActionError };

export interface CommandEvent {
  command: string;
  args: string[];
  status: number | null;
}
