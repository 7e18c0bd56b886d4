import pino from 'pino';
import { Agent } from 'undici';
import { afterEach, describe, expect, test, vi, type Mock } from 'vitest';

import { createHubConfig, type HubConfig } from '../../src/config.js';
import { HomeSeerMcpError } from '../../src/errors.js';
import { HomeSeerClient, type FetchLike, type HubResponse } from '../../src/homeseer/client.js';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: {
      'content-type': 'application/json'
    },
    ...init
  });
}

function makeConfig(overrides: Partial<HubConfig> = {}): HubConfig {
  return createHubConfig({
    url: 'https://hub.test/json/',
    username: 'testuser',
    password: 'testpass',
    source: 'test-mcp',
    timeout: 10,
    ...overrides
  });
}

function makeClient(fetchImpl: FetchLike, config: HubConfig = makeConfig()) {
  return new HomeSeerClient({
    config,
    logger: pino({ level: 'silent' }),
    fetchImpl
  });
}

function requestedUrl(fetchMock: Mock<FetchLike>, call = 0): string {
  return String(fetchMock.mock.calls[call]?.[0]);
}

describe('HomeSeerClient', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('lists devices with source and credentials on the query string', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({
        Name: 'HomeSeer Devices',
        Version: '1.0',
        Devices: [
          { ref: 10, name: 'Kitchen Light', location: 'Kitchen', location2: 'Main', value: 0, status: 'Off' },
          { ref: 11, name: 'Porch Light' }
        ]
      })
    );

    const client = makeClient(fetchMock);
    const devices = await client.listDevices();

    expect(devices.map((device) => device.ref)).toEqual([10, 11]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestedUrl(fetchMock)).toBe(
      'https://hub.test/json?source=test-mcp&user=testuser&pass=testpass&request=getstatus'
    );
    expect(fetchMock.mock.calls[0]?.[1].method).toBe('GET');
  });

  test('returns an empty list when the hub sends no Devices key', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Name: 'HomeSeer Devices' }));

    const client = makeClient(fetchMock);
    await expect(client.listDevices()).resolves.toEqual([]);
  });

  test('sends only the token when token and username/password are both configured', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Devices: [] }));

    const client = makeClient(fetchMock, makeConfig({ token: 'test-token' }));
    await client.listDevices();

    const url = new URL(requestedUrl(fetchMock));
    expect(url.searchParams.get('token')).toBe('test-token');
    expect(url.searchParams.has('user')).toBe(false);
    expect(url.searchParams.has('pass')).toBe(false);
  });

  test('sends no auth params when credentials are incomplete', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Devices: [] }));

    const client = makeClient(fetchMock, makeConfig({ password: undefined }));
    await client.listDevices();

    expect(requestedUrl(fetchMock)).toBe('https://hub.test/json?source=test-mcp&request=getstatus');
  });

  test('gets a device by ref', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({
        Devices: [{ ref: 42, name: 'Hall Dimmer', value: 55, status: 'Dim 55%', associated_devices: [41] }]
      })
    );

    const client = makeClient(fetchMock);
    const device = await client.getDevice(42);

    expect(device).toMatchObject({ ref: 42, name: 'Hall Dimmer', value: 55, status: 'Dim 55%', associatedDevices: [41] });
    expect(new URL(requestedUrl(fetchMock)).searchParams.get('ref')).toBe('42');
  });

  test('fails with NOT_FOUND when the hub returns no device for a ref', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Devices: [] }));

    const client = makeClient(fetchMock);
    const error = await client.getDevice(999).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HomeSeerMcpError);
    expect(error).toMatchObject({ code: 'NOT_FOUND', message: 'Device with ref 999 not found' });
  });

  test('sets device status by value', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Response: 'ok' }));

    const client = makeClient(fetchMock);
    await expect(client.setDeviceStatus(42, 100)).resolves.toBe(true);

    expect(requestedUrl(fetchMock)).toBe(
      'https://hub.test/json?source=test-mcp&user=testuser&pass=testpass&request=setdevicestatus&ref=42&value=100'
    );
  });

  test('controls a device by label verbatim', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Response: 'ok' }));

    const client = makeClient(fetchMock);
    await expect(client.controlDeviceByLabel(42, 'Dim 50%')).resolves.toBe(true);

    const url = new URL(requestedUrl(fetchMock));
    expect(url.searchParams.get('request')).toBe('controldevicebylabel');
    expect(url.searchParams.get('label')).toBe('Dim 50%');
  });

  test('reads control pairs nested under the requested device', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({
        Devices: [
          {
            ref: 42,
            ControlPairs: [
              { Label: 'Off', ControlValue: 0 },
              { Label: 'On', ControlValue: 100 }
            ]
          }
        ]
      })
    );

    const client = makeClient(fetchMock);
    await expect(client.getControls(42)).resolves.toEqual([
      { label: 'Off', value: 0 },
      { label: 'On', value: 100 }
    ]);
    expect(new URL(requestedUrl(fetchMock)).searchParams.get('request')).toBe('getcontrol');
  });

  test('passes the events envelope through', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({
        Name: 'HomeSeer Events',
        Version: '1.0',
        Events: [{ Group: 'Lighting', Name: 'Outside Lights Off', id: 5, voice_command: '' }]
      })
    );

    const client = makeClient(fetchMock);
    await expect(client.getEvents()).resolves.toEqual({
      Name: 'HomeSeer Events',
      Version: '1.0',
      Events: [{ Group: 'Lighting', Name: 'Outside Lights Off', id: 5, voice_command: '' }]
    });
  });

  test('runs an event by id', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Response: 'ok' }));

    const client = makeClient(fetchMock);
    await expect(client.runEvent({ id: 5 })).resolves.toBe(true);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestedUrl(fetchMock)).toBe(
      'https://hub.test/json?source=test-mcp&user=testuser&pass=testpass&request=runevent&id=5'
    );
  });

  test('runs an event by group and name', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Response: 'ok' }));

    const client = makeClient(fetchMock);
    await expect(client.runEvent({ group: 'Lighting', name: 'Outside Lights Off' })).resolves.toBe(true);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestedUrl(fetchMock)).toBe(
      'https://hub.test/json?source=test-mcp&user=testuser&pass=testpass&request=runevent&group=Lighting&name=Outside+Lights+Off'
    );
  });

  test.each([
    { label: 'no arguments', args: {} },
    { label: 'group only', args: { group: 'Lighting' } },
    { label: 'name only', args: { name: 'Outside Lights Off' } }
  ])('rejects runEvent with $label before any request', async ({ args }) => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Response: 'ok' }));

    const client = makeClient(fetchMock);
    await expect(client.runEvent(args)).rejects.toMatchObject({ code: 'INVALID_ARGUMENTS' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test('maps non-2xx responses to HTTP_ERROR with the status code', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => new Response('denied', { status: 401, statusText: 'Unauthorized' }));

    const client = makeClient(fetchMock);
    await expect(client.listDevices()).rejects.toMatchObject({
      code: 'HTTP_ERROR',
      statusCode: 401,
      message: 'HTTP 401 Unauthorized: denied'
    });
  });

  test('maps connection failures to NETWORK', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });

    const client = makeClient(fetchMock);
    await expect(client.listDevices()).rejects.toMatchObject({ code: 'NETWORK' });
  });

  test('aborts after the configured timeout', async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<FetchLike>(
      (_input, init) =>
        new Promise<HubResponse>((_resolve, reject) => {
          init.signal.addEventListener('abort', () => {
            const error = new Error('This operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        })
    );

    const client = makeClient(fetchMock, makeConfig({ timeout: 2 }));
    const assertion = expect(client.listDevices()).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Request timed out after 2s for /json'
    });
    await vi.advanceTimersByTimeAsync(2_000);
    await assertion;
  });

  test('keeps the timeout running while the body is read', async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<FetchLike>(async (_input, init) => ({
      ok: true,
      status: 200,
      statusText: 'OK',
      text: () =>
        new Promise<string>((_resolve, reject) => {
          init.signal.addEventListener('abort', () => {
            const error = new Error('This operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        })
    }));

    const client = makeClient(fetchMock, makeConfig({ timeout: 3 }));
    const assertion = expect(client.getEvents()).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Request timed out after 3s for /json'
    });
    await vi.advanceTimersByTimeAsync(3_000);
    await assertion;
  });

  test('rejects bodies that are not JSON objects', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => new Response('<html>login</html>', { status: 200 }));

    const client = makeClient(fetchMock);
    await expect(client.listDevices()).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
  });

  test('uses a non-verifying dispatcher only when TLS verification is off', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Devices: [] }));

    const verifying = makeClient(fetchMock);
    await verifying.listDevices();
    expect(fetchMock.mock.calls[0]?.[1].dispatcher).toBeUndefined();

    const insecure = makeClient(fetchMock, makeConfig({ verifyTls: false }));
    await insecure.listDevices();
    expect(fetchMock.mock.calls[1]?.[1].dispatcher).toBeInstanceOf(Agent);
    await insecure.close();
  });

  test('keeps credentials out of debug logs', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ Devices: [] }));
    const lines: string[] = [];
    const logger = pino(
      { level: 'debug', base: undefined },
      {
        write: (line: string) => {
          lines.push(line);
        }
      }
    );

    const client = new HomeSeerClient({
      config: makeConfig({ token: 'test-token' }),
      logger,
      fetchImpl: fetchMock
    });
    await client.listDevices();

    const requestLine = lines.find((line) => line.includes('"msg":"HomeSeer JSON request"'));
    expect(requestLine).toBeDefined();
    expect(JSON.parse(requestLine ?? '{}')).toMatchObject({
      request: 'getstatus',
      url: 'https://hub.test/json?source=test-mcp&request=getstatus'
    });
    expect(lines.some((line) => line.includes('test-token'))).toBe(false);
    expect(lines.some((line) => line.includes('testpass'))).toBe(false);
  });
});
