// ============================================================================
// bluefind — Action Dispatcher
// Always addresses the device by its address; single attempt, no retry
// ============================================================================
import type { ActionResult, DeviceAction } from '@bluefind/shared';
import type { BluetoothService } from '../bluetooth/service.js';

const UNREACHABLE_RE = /failed to connect|not found|not in range|not reachable|timed? ?out/i;

export class ActionDispatcher {
  constructor(private service: BluetoothService) {}

  connect(address: string): ActionResult {
    return this.dispatch('connect', address);
  }

  disconnect(address: string): ActionResult {
    return this.dispatch('disconnect', address);
  }

  dispatch(action: DeviceAction, address: string): ActionResult {
    const out = this.service.exec([`--${action}`, address]);
    if (out.status === 0) return { ok: true, ack: { action, address } };

    const message = out.stderr.trim() || out.stdout.trim() || `${action} failed`;
    if (UNREACHABLE_RE.test(message)) {
      return { ok: false, error: { kind: 'DeviceNotReachable', address, message } };
    }
    return { ok: false, error: { kind: 'ExternalToolFailure', exitCode: out.status, message } };
  }
}
