/**
 * Device Registry
 *
 * Tracks worker devices by id, their last-known datagram endpoint and
 * liveness. Records are never removed: a stale or unregistered device is
 * only deactivated, and a later REGISTER with the same id reuses its record.
 * The number of distinct ids is bounded by `capacity`.
 */

import { MAX_DEVICE_ID_BYTES } from "../protocol/codec.js";
import type { Endpoint } from "../types.js";

/** One known worker device. */
export interface DeviceRecord {
  deviceId: string;
  address: Endpoint;
  /** Epoch ms of the last REGISTER or HEARTBEAT. */
  lastHeartbeat: number;
  active: boolean;
  /** Epoch ms of the first registration under this id. */
  registeredAt: number;
}

export type RegisterFailureReason = "capacity-exceeded" | "invalid-device-id";

export type RegisterResult =
  | { ok: true; record: DeviceRecord; created: boolean }
  | { ok: false; reason: RegisterFailureReason };

export interface DeviceRegistryOptions {
  /** Maximum number of distinct device ids. */
  capacity: number;
  /** Heartbeat silence (ms) after which sweep() deactivates a device. */
  livenessTimeoutMs: number;
}

/** Device ids are a single wire field: non-empty, short, free of delimiters. */
export function isValidDeviceId(deviceId: string): boolean {
  return (
    deviceId.length > 0 &&
    Buffer.byteLength(deviceId, "utf8") <= MAX_DEVICE_ID_BYTES &&
    !/[:\n\0]/.test(deviceId)
  );
}

function copyRecord(record: DeviceRecord): DeviceRecord {
  return { ...record, address: { ...record.address } };
}

export class DeviceRegistry {
  private devices = new Map<string, DeviceRecord>();
  readonly capacity: number;
  private readonly livenessTimeoutMs: number;

  constructor(opts: DeviceRegistryOptions) {
    this.capacity = opts.capacity;
    this.livenessTimeoutMs = opts.livenessTimeoutMs;
  }

  /**
   * Register or re-register a device. Re-registration (active or not)
   * overwrites the address, refreshes the heartbeat and reactivates.
   */
  register(deviceId: string, address: Endpoint, now: number): RegisterResult {
    if (!isValidDeviceId(deviceId)) {
      return { ok: false, reason: "invalid-device-id" };
    }

    const existing = this.devices.get(deviceId);
    if (existing) {
      existing.address = { ...address };
      existing.lastHeartbeat = now;
      existing.active = true;
      return { ok: true, record: copyRecord(existing), created: false };
    }

    if (this.devices.size >= this.capacity) {
      return { ok: false, reason: "capacity-exceeded" };
    }

    const record: DeviceRecord = {
      deviceId,
      address: { ...address },
      lastHeartbeat: now,
      active: true,
      registeredAt: now,
    };
    this.devices.set(deviceId, record);
    return { ok: true, record: copyRecord(record), created: true };
  }

  /**
   * Refresh the heartbeat of a known device. Does not reactivate a device
   * the sweep has already deactivated. Returns false for unknown ids.
   */
  heartbeat(deviceId: string, now: number): boolean {
    const record = this.devices.get(deviceId);
    if (!record) return false;
    record.lastHeartbeat = now;
    return true;
  }

  /** Deactivate a device immediately. Returns false for unknown ids. */
  unregister(deviceId: string): boolean {
    const record = this.devices.get(deviceId);
    if (!record) return false;
    record.active = false;
    return true;
  }

  /**
   * Deactivate every active device whose heartbeat is older than the
   * liveness timeout. Returns the devices deactivated by this call.
   */
  sweep(now: number, timeoutMs = this.livenessTimeoutMs): DeviceRecord[] {
    const deactivated: DeviceRecord[] = [];
    for (const record of this.devices.values()) {
      if (record.active && now - record.lastHeartbeat > timeoutMs) {
        record.active = false;
        deactivated.push(copyRecord(record));
      }
    }
    return deactivated;
  }

  /** Number of active devices. */
  activeCount(): number {
    let count = 0;
    for (const record of this.devices.values()) {
      if (record.active) count++;
    }
    return count;
  }

  /** Active devices, in registration order. */
  activeDevices(): DeviceRecord[] {
    return this.list().filter((r) => r.active);
  }

  get(deviceId: string): DeviceRecord | null {
    const record = this.devices.get(deviceId);
    return record ? copyRecord(record) : null;
  }

  /** All records, active or not, in registration order. */
  list(): DeviceRecord[] {
    return Array.from(this.devices.values(), copyRecord);
  }

  has(deviceId: string): boolean {
    return this.devices.has(deviceId);
  }

  /** Number of records, active or not. */
  get size(): number {
    return this.devices.size;
  }
}
