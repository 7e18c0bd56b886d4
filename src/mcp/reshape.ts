import type { HubDevice, HubEvent } from '../homeseer/normalizer.js';

export interface DeviceSummary {
  ref: number;
  name: string;
}

export interface DeviceSummaryWithRoom extends DeviceSummary {
  location: string;
  location2: string;
}

export interface DeviceInfo {
  name: string;
  location: string | null;
  location2: string | null;
  value: number | null;
  status: string | null;
  associated_devices: number[] | null;
}

function matchesText(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function filterDevicesByName(devices: HubDevice[], freeTextSearch?: string): HubDevice[] {
  if (!freeTextSearch) {
    return devices;
  }
  return devices.filter((device) => matchesText(device.name, freeTextSearch));
}

export function summarizeDevices(
  devices: HubDevice[],
  needRoomInformation: boolean
): Array<DeviceSummary | DeviceSummaryWithRoom> {
  if (needRoomInformation) {
    return devices.map((device) => ({
      ref: device.ref,
      name: device.name,
      location: device.location ?? '',
      location2: device.location2 ?? ''
    }));
  }
  return devices.map((device) => ({ ref: device.ref, name: device.name }));
}

export function toDeviceInfo(device: HubDevice): DeviceInfo {
  return {
    name: device.name,
    location: device.location ?? null,
    location2: device.location2 ?? null,
    value: device.value ?? null,
    status: device.status ?? null,
    associated_devices: device.associatedDevices ?? null
  };
}

function eventText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/** Keeps events whose `Name` or `Group` contains the search text. */
export function filterEvents(events: HubEvent[], freeTextSearch?: string): HubEvent[] {
  if (!freeTextSearch) {
    return events;
  }
  return events.filter(
    (event) =>
      matchesText(eventText(event.Name), freeTextSearch) || matchesText(eventText(event.Group), freeTextSearch)
  );
}
