import { describe, it, expect } from 'vitest';
import type { SystemStatus } from '@bluefind/shared';
import { formatActionResult, formatChoices, formatDeviceList, formatStatus } from '../../../src/presentation/format.js';
import { createPalette } from '../../../src/presentation/palette.js';
import { device } from '../../helpers.js';

const p = createPalette(false);
const PRO = device('AirPods Pro', '11-11-11-11-11-11');
const MAX = device('AirPods Max', '22-22-22-22-22-22', true);

describe('formatDeviceList', () => {
  it('renders one row per device', () => {
    const lines = formatDeviceList([PRO, MAX], p).split('\n').filter(l => l.trim());
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\s*Name\s+Address\s+State\s*$/);
    expect(lines[1]).toMatch(/^\s*AirPods Pro\s+11-11-11-11-11-11\s+disconnected\s*$/);
    expect(lines[2]).toMatch(/^\s*AirPods Max\s+22-22-22-22-22-22\s+connected\s*$/);
  });

  it('names unnamed devices', () => {
    expect(formatDeviceList([device('', '33-33-33-33-33-33')], p)).toContain('(unnamed)');
  });

  it('says so when there are no devices', () => {
    expect(formatDeviceList([], p)).toBe('No paired devices.');
  });
});

describe('formatStatus', () => {
  it('renders the summary block', () => {
    const status: SystemStatus = { powered: true, discoverable: false, audioOutput: 'AirPods Max', devices: [], issues: [] };
    expect(formatStatus(status, p)).toBe([
      'Bluetooth',
      '  Power         on',
      '  Discoverable  off',
      '  Audio output  AirPods Max',
      '  Devices       0 paired, 0 connected',
    ].join('\n'));
  });

  it('shows failed queries as unknown and lists the issues', () => {
    const status: SystemStatus = {
      powered: null,
      discoverable: true,
      audioOutput: null,
      devices: [],
      issues: [
        { query: 'power', kind: 'query-error', message: 'Could not read power state: unexpected value "x"' },
        { query: 'audio-output', kind: 'unavailable', message: "'SwitchAudioSource' is not available" },
      ],
    };
    const lines = formatStatus(status, p).split('\n');
    expect(lines[1]).toBe('  Power         unknown');
    expect(lines[3]).toBe('  Audio output  unknown');
    expect(lines.slice(-2)).toEqual([
      '  ✗ Could not read power state: unexpected value "x"',
      "  ! 'SwitchAudioSource' is not available",
    ]);
  });

  it('counts connected devices and appends the table', () => {
    const status: SystemStatus = { powered: true, discoverable: false, audioOutput: 'Speakers', devices: [PRO, MAX], issues: [] };
    const out = formatStatus(status, p);
    expect(out.split('\n')[4]).toBe('  Devices       2 paired, 1 connected');
    expect(out).toMatch(/AirPods Max\s+22-22-22-22-22-22\s+connected/);
  });
});

describe('formatChoices', () => {
  it('pads the numbers to the widest index', () => {
    const many = Array.from({ length: 10 }, (_, i) => device(`Speaker ${i + 1}`, `00-00-00-00-00-${String(i).padStart(2, '0')}`));
    const lines = formatChoices(many, p);
    expect(lines[0]).toBe('   1. Speaker 1  00-00-00-00-00-00  disconnected');
    expect(lines[9]).toBe('  10. Speaker 10  00-00-00-00-00-09  disconnected');
  });
});

describe('formatActionResult', () => {
  it('confirms the action', () => {
    expect(formatActionResult({ action: 'connect', address: MAX.address }, MAX, p)).toBe('Connected to AirPods Max');
    expect(formatActionResult({ action: 'disconnect', address: MAX.address }, MAX, p)).toBe('Disconnected from AirPods Max');
  });
});
