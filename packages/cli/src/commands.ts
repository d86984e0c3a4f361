// ============================================================================
// bluefind — Command Pipeline
// fetch devices → resolve → disambiguate → act → render
// ============================================================================
import type { Device, DeviceAction } from '@bluefind/shared';
import type { ActionDispatcher } from './actions/dispatcher.js';
import type { BluetoothService } from './bluetooth/service.js';
import type { CliConfig } from './config.js';
import { ActionFailedError, EXIT_CODES, NoMatchFoundError } from './errors.js';
import type { Logger } from './logger.js';
import { displayName, formatActionResult, formatDeviceList, formatStatus } from './presentation/format.js';
import type { Palette } from './presentation/palette.js';
import { disambiguate } from './prompt/disambiguate.js';
import type { Prompter } from './prompt/prompter.js';
import { resolve } from './resolver/resolve.js';

export interface CommandContext {
  config: CliConfig;
  service: BluetoothService;
  dispatcher: ActionDispatcher;
  palette: Palette;
  logger: Logger;
  createPrompter: () => Prompter;
  print: (text: string) => void;
}

export interface ListOptions {
  json?: boolean;
  connected?: boolean;
}

export function runList(ctx: CommandContext, opts: ListOptions): number {
  let devices = ctx.service.listDevices();
  if (opts.connected) devices = devices.filter(d => d.connected);

  ctx.print(opts.json ? JSON.stringify(devices, null, 2) : formatDeviceList(devices, ctx.palette));
  return 0;
}

export function runStatus(ctx: CommandContext, opts: { json?: boolean }): number {
  const status = ctx.service.getStatus();
  ctx.print(opts.json ? JSON.stringify(status, null, 2) : formatStatus(status, ctx.palette));

  const failed = status.issues.filter(i => i.kind === 'query-error');
  return failed.length > 0 ? EXIT_CODES.ADAPTER_QUERY_ERROR : 0;
}

export async function selectDevice(ctx: CommandContext, query: string, devices: Device[]): Promise<Device> {
  const result = resolve(query, devices, { threshold: ctx.config.fuzzyThreshold });
  ctx.logger.debug(`resolve "${query}": ${result.devices.length} ${result.strategy} match(es)`);

  if (result.devices.length === 0) throw new NoMatchFoundError(query);
  if (result.devices.length === 1) return result.devices[0];

  const prompter = ctx.createPrompter();
  try {
    return await disambiguate(result.devices, prompter, ctx.palette);
  } finally {
    prompter.close();
  }
}

export async function runAction(ctx: CommandContext, action: DeviceAction, query: string): Promise<number> {
  const device = await selectDevice(ctx, query, ctx.service.listDevices());

  const verb = action === 'connect' ? 'Connecting to' : 'Disconnecting from';
  ctx.print(ctx.palette.dim(`${verb} ${displayName(device)} (${device.address})...`));
  const result = action === 'connect'
    ? ctx.dispatcher.connect(device.address)
    : ctx.dispatcher.disconnect(device.address);

  if (!result.ok) throw new ActionFailedError(action, displayName(device), result.error);
  ctx.print(formatActionResult(result.ack, device, ctx.palette));
  return 0;
}
