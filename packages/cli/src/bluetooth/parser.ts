// ============================================================================
// bluefind — blueutil Output Parsers
// ============================================================================
import type { Device } from '@bluefind/shared';
import { AdapterQueryError } from '../errors.js';

// address: 04-52-c7-0b-1a-2f, connected (master, -46 dBm), not favourite, paired, name: "Bose QC35 II", recent access date: ...
const ADDRESS_RE = /^address:\s*([0-9a-f]{2}(?:[-:][0-9a-f]{2}){5})\b/i;
// Greedy up to the last quote whose remainder holds no quote, so names may contain quotes
const NAME_RE = /\bname:\s*"(.*)"(?:,[^"]*)?$/;
const CONNECTED_RE = /(?:^|,\s*)connected\b/;
const PAIRED_RE = /(?:^|,\s*)paired\b/;

export function parseDeviceLine(line: string): Device | null {
  const trimmed = line.trim();
  const addressMatch = trimmed.match(ADDRESS_RE);
  if (!addressMatch) return null;

  const nameMatch = trimmed.match(NAME_RE);
  // state flags are only read before the name, which may contain anything
  const fields = nameMatch ? trimmed.slice(0, nameMatch.index) : trimmed;
  return {
    address: addressMatch[1].toLowerCase(),
    name: nameMatch ? nameMatch[1] : '',
    connected: CONNECTED_RE.test(fields),
    paired: PAIRED_RE.test(fields),
  };
}

export function parsePairedDevices(output: string): Device[] {
  if (!output.trim()) return [];

  const devices: Device[] = [];
  for (const line of output.split('\n')) {
    const device = parseDeviceLine(line);
    if (device) devices.push(device);
  }

  if (devices.length === 0) {
    const first = output.trim().split('\n')[0];
    throw new AdapterQueryError('paired devices', `unrecognized output "${first}"`);
  }
  return devices;
}

export function parseFlag(output: string, query: string): boolean {
  const value = output.trim().toLowerCase();
  if (value === '1' || value === 'on') return true;
  if (value === '0' || value === 'off') return false;
  throw new AdapterQueryError(query, `unexpected value "${output.trim()}"`);
}
