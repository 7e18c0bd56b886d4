import type { Logger } from 'pino';
import { Agent, fetch as undiciFetch, type Dispatcher } from 'undici';

import { baseUrl, requestParams, type HubConfig } from '../config.js';
import { HomeSeerMcpError } from '../errors.js';
import {
  isRecord,
  normalizeControlPayload,
  normalizeEventsPayload,
  normalizeStatusPayload,
  type ControlPair,
  type EventsEnvelope,
  type HubDevice
} from './normalizer.js';

export interface HubRequestInit {
  method: 'GET';
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface HubResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (input: URL, init: HubRequestInit) => Promise<HubResponse>;

export interface HomeSeerClientOptions {
  config: HubConfig;
  logger: Logger;
  fetchImpl?: FetchLike;
}

export type RunEventArgs = {
  id?: number;
  group?: string;
  name?: string;
};

/** The hub operations the tool surface depends on. */
export interface HubApi {
  listDevices(): Promise<HubDevice[]>;
  getDevice(ref: number): Promise<HubDevice>;
  setDeviceStatus(ref: number, value: number): Promise<boolean>;
  controlDeviceByLabel(ref: number, label: string): Promise<boolean>;
  getControls(ref: number): Promise<ControlPair[]>;
  getEvents(): Promise<EventsEnvelope>;
  runEvent(args: RunEventArgs): Promise<boolean>;
}

const CREDENTIAL_PARAMS = ['user', 'pass', 'token'];

function sanitizeUrlForLog(url: URL): string {
  const sanitized = new URL(url.toString());
  sanitized.username = '';
  sanitized.password = '';
  for (const key of CREDENTIAL_PARAMS) {
    sanitized.searchParams.delete(key);
  }
  return sanitized.toString();
}

function hasText(value: string | undefined): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

export class HomeSeerClient implements HubApi {
  private readonly fetchImpl: FetchLike;
  private readonly dispatcher?: Agent;

  constructor(private readonly options: HomeSeerClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => undiciFetch(input, init));
    if (!options.config.verifyTls) {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
    }
    options.logger.info({ url: options.config.url }, 'HomeSeer API client initialized');
  }

  private buildUrl(request: string, params: Record<string, string | number>): URL {
    const url = new URL(baseUrl(this.options.config));
    const query = requestParams(this.options.config, { request, ...params });
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    return url;
  }

  private transportError(error: unknown, url: URL): HomeSeerMcpError {
    if (error instanceof Error && error.name === 'AbortError') {
      return new HomeSeerMcpError(
        'TIMEOUT',
        `Request timed out after ${this.options.config.timeout}s for ${url.pathname}`,
        { cause: error }
      );
    }
    return new HomeSeerMcpError('NETWORK', `Network failure for ${url.pathname}`, { cause: error });
  }

  private async executeFetch(url: URL, signal: AbortSignal): Promise<HubResponse> {
    try {
      return await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json'
        },
        signal,
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {})
      });
    } catch (error) {
      throw this.transportError(error, url);
    }
  }

  private async parseResponse(response: HubResponse, request: string, url: URL): Promise<Record<string, unknown>> {
    let rawText: string;
    try {
      rawText = await response.text();
    } catch (error) {
      throw this.transportError(error, url);
    }

    if (!response.ok) {
      throw new HomeSeerMcpError('HTTP_ERROR', `HTTP ${response.status} ${response.statusText}: ${rawText}`, {
        statusCode: response.status,
        details: { request }
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(rawText);
    } catch (error) {
      throw new HomeSeerMcpError('INVALID_RESPONSE', `Response to ${request} is not valid JSON`, {
        cause: error,
        details: { request, body: rawText.slice(0, 200) }
      });
    }

    if (!isRecord(parsed)) {
      throw new HomeSeerMcpError('INVALID_RESPONSE', `Response to ${request} is not a JSON object`, {
        details: { request }
      });
    }

    return parsed;
  }

  private async requestJson(
    request: string,
    params: Record<string, string | number> = {}
  ): Promise<Record<string, unknown>> {
    const url = this.buildUrl(request, params);

    this.options.logger.debug(
      { request, url: sanitizeUrlForLog(url), params: Object.keys(params) },
      'HomeSeer JSON request'
    );

    // The timeout covers the body as well as the headers.
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.config.timeout * 1000);
    try {
      const response = await this.executeFetch(url, controller.signal);
      const parsed = await this.parseResponse(response, request, url);
      this.options.logger.debug({ request, status: response.status }, 'HomeSeer JSON response');
      return parsed;
    } finally {
      clearTimeout(timeout);
    }
  }

  async listDevices(): Promise<HubDevice[]> {
    const payload = await this.requestJson('getstatus');
    return normalizeStatusPayload(payload);
  }

  async getDevice(ref: number): Promise<HubDevice> {
    const payload = await this.requestJson('getstatus', { ref });
    const [device] = normalizeStatusPayload(payload);
    if (!device) {
      throw new HomeSeerMcpError('NOT_FOUND', `Device with ref ${ref} not found`, {
        details: { ref }
      });
    }
    return device;
  }

  async setDeviceStatus(ref: number, value: number): Promise<boolean> {
    await this.requestJson('setdevicestatus', { ref, value });
    return true;
  }

  async controlDeviceByLabel(ref: number, label: string): Promise<boolean> {
    await this.requestJson('controldevicebylabel', { ref, label });
    return true;
  }

  async getControls(ref: number): Promise<ControlPair[]> {
    const payload = await this.requestJson('getcontrol', { ref });
    const controls = normalizeControlPayload(payload);
    this.options.logger.debug({ ref, controls: controls.length }, 'Fetched device controls');
    return controls;
  }

  async getEvents(): Promise<EventsEnvelope> {
    const payload = await this.requestJson('getevents');
    const envelope = normalizeEventsPayload(payload);
    this.options.logger.debug({ events: envelope.Events.length }, 'Fetched events');
    return envelope;
  }

  /**
   * Runs an event by id, or by group and name together. The id wins when both
   * forms are given.
   */
  async runEvent(args: RunEventArgs): Promise<boolean> {
    if (args.id !== undefined) {
      await this.requestJson('runevent', { id: args.id });
      this.options.logger.info({ id: args.id }, 'Executed event');
      return true;
    }

    if (hasText(args.group) && hasText(args.name)) {
      await this.requestJson('runevent', { group: args.group, name: args.name });
      this.options.logger.info({ group: args.group, name: args.name }, 'Executed event');
      return true;
    }

    throw new HomeSeerMcpError('INVALID_ARGUMENTS', 'Must provide either event_id OR both group and name', {
      details: {
        hasGroup: hasText(args.group),
        hasName: hasText(args.name)
      }
    });
  }

  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}
