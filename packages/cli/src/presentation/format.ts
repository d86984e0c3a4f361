// ============================================================================
// bluefind — Terminal Formatting
// ============================================================================
import Table from 'cli-table3';
import type { ActionAck, Device, StatusIssue, SystemStatus } from '@bluefind/shared';
import type { Palette } from './palette.js';

const LABEL_WIDTH = 14;

export function displayName(device: Device): string {
  return device.name || '(unnamed)';
}

export function stateLabel(device: Device, p: Palette): string {
  return device.connected ? p.connected('connected') : p.disconnected('disconnected');
}

function onOff(value: boolean | null, p: Palette): string {
  if (value === null) return p.dim('unknown');
  return value ? p.powerOn('on') : p.powerOff('off');
}

// Borderless table, two-space gutters
function renderTable(head: string[], rows: string[][], p: Palette): string {
  const table = new Table({
    head: head.map(h => p.bold(h)),
    style: { head: [], border: [], compact: true, 'padding-left': 0, 'padding-right': 0 },
    chars: {
      'top': '', 'top-mid': '', 'top-left': '', 'top-right': '',
      'bottom': '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
      'left': '  ', 'left-mid': '', 'mid': '', 'mid-mid': '',
      'right': '', 'right-mid': '', 'middle': '  ',
    },
  });
  for (const row of rows) table.push(row);
  return table.toString();
}

export function formatDeviceList(devices: Device[], p: Palette): string {
  if (devices.length === 0) return p.dim('No paired devices.');

  const rows = devices.map(d => [displayName(d), p.dim(d.address), stateLabel(d, p)]);
  return renderTable(['Name', 'Address', 'State'], rows, p);
}

function formatIssue(issue: StatusIssue, p: Palette): string {
  return issue.kind === 'query-error'
    ? p.error(`  ✗ ${issue.message}`)
    : p.warn(`  ! ${issue.message}`);
}

export function formatStatus(status: SystemStatus, p: Palette): string {
  const row = (label: string, value: string) => `  ${label.padEnd(LABEL_WIDTH)}${value}`;
  const connected = status.devices.filter(d => d.connected).length;

  const lines = [
    p.bold('Bluetooth'),
    row('Power', onOff(status.powered, p)),
    row('Discoverable', onOff(status.discoverable, p)),
    row('Audio output', status.audioOutput ?? p.dim('unknown')),
    row('Devices', `${status.devices.length} paired, ${connected} connected`),
  ];

  if (status.devices.length > 0) lines.push('', formatDeviceList(status.devices, p));
  if (status.issues.length > 0) lines.push('', ...status.issues.map(i => formatIssue(i, p)));
  return lines.join('\n');
}

export function formatChoices(matches: Device[], p: Palette): string[] {
  const width = String(matches.length).length;
  return matches.map((d, i) =>
    `  ${String(i + 1).padStart(width)}. ${p.bold(displayName(d))}  ${p.dim(d.address)}  ${stateLabel(d, p)}`,
  );
}

export function formatActionResult(ack: ActionAck, device: Device, p: Palette): string {
  return ack.action === 'connect'
    ? p.success(`Connected to ${displayName(device)}`)
    : p.success(`Disconnected from ${displayName(device)}`);
}
