export interface ControlPair {
  label: string;
  value: number;
}

export interface HubDevice {
  ref: number;
  name: string;
  location?: string;
  location2?: string;
  value?: number;
  status?: string;
  associatedDevices?: number[];
}

/** A hub event exactly as the hub reported it (`Group`, `Name`, `id` and the rest). */
export type HubEvent = Record<string, unknown>;

/** The `getevents` envelope; top-level fields such as `Name` and `Version` pass through. */
export interface EventsEnvelope {
  Events: HubEvent[];
  [key: string]: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function getPath(input: unknown, path: string): unknown {
  let current: unknown = input;
  for (const part of path.split('.')) {
    if (Array.isArray(current)) {
      current = current[Number(part)];
      continue;
    }
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function firstArray(input: unknown, paths: string[]): unknown[] {
  for (const path of paths) {
    const candidate = getPath(input, path);
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }
  return [];
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function toOptionalNumber(value: unknown): number | undefined {
  const parsed = toNumber(value);
  return parsed === null ? undefined : parsed;
}

function toStringValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return String(value);
}

function toOptionalString(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return String(value);
}

function normalizeAssociatedRefs(record: Record<string, unknown>): number[] | undefined {
  const candidates = record.associated_devices ?? record.AssociatedDevices;
  if (!Array.isArray(candidates)) {
    return undefined;
  }
  const refs: number[] = [];
  for (const candidate of candidates) {
    const ref = isRecord(candidate)
      ? toOptionalNumber(candidate.ref ?? candidate.Ref)
      : toOptionalNumber(candidate);
    if (ref !== undefined && !refs.includes(ref)) {
      refs.push(ref);
    }
  }
  return refs;
}

export function normalizeDevice(record: Record<string, unknown>): HubDevice | undefined {
  const ref = toNumber(record.ref ?? record.Ref);
  if (ref === null) {
    return undefined;
  }

  const device: HubDevice = {
    ref,
    name: toStringValue(record.name ?? record.Name)
  };

  const location = toOptionalString(record.location ?? record.Location);
  if (location !== undefined) {
    device.location = location;
  }
  const location2 = toOptionalString(record.location2 ?? record.Location2);
  if (location2 !== undefined) {
    device.location2 = location2;
  }
  const value = toOptionalNumber(record.value ?? record.Value);
  if (value !== undefined) {
    device.value = value;
  }
  const status = toOptionalString(record.status ?? record.Status);
  if (status !== undefined) {
    device.status = status;
  }
  const associatedDevices = normalizeAssociatedRefs(record);
  if (associatedDevices) {
    device.associatedDevices = associatedDevices;
  }

  return device;
}

/** Decodes a `getstatus` envelope. Entries without a numeric ref are dropped. */
export function normalizeStatusPayload(payload: unknown): HubDevice[] {
  const devices: HubDevice[] = [];
  for (const raw of firstArray(payload, ['Devices', 'devices'])) {
    if (!isRecord(raw)) {
      continue;
    }
    const device = normalizeDevice(raw);
    if (device) {
      devices.push(device);
    }
  }
  return devices;
}

/**
 * Decodes a `getcontrol` envelope. Older hubs return `ControlPairs` at the top
 * level, HS4 nests them under the requested device.
 */
export function normalizeControlPayload(payload: unknown): ControlPair[] {
  const candidates = firstArray(payload, ['ControlPairs', 'Devices.0.ControlPairs', 'Devices.0.control_pairs']);
  const result: ControlPair[] = [];

  for (const pair of candidates) {
    if (!isRecord(pair)) {
      continue;
    }

    const value = toNumber(pair.ControlValue ?? pair.value ?? pair.Value);
    if (value === null) {
      continue;
    }

    result.push({
      label: toStringValue(pair.Label ?? pair.label ?? pair.Status),
      value
    });
  }

  return result;
}

/** Decodes a `getevents` envelope. Events are kept as the hub sent them. */
export function normalizeEventsPayload(payload: unknown): EventsEnvelope {
  const events = firstArray(payload, ['Events', 'events']).filter(isRecord);
  const root = isRecord(payload) ? payload : {};
  return {
    ...root,
    Events: events
  };
}
