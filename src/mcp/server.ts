import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';
import type { Logger } from 'pino';

import { actionableErrorFields, asHomeSeerMcpError, type ErrorCode } from '../errors.js';
import type { HubApi } from '../homeseer/client.js';
import { filterDevicesByName, filterEvents, summarizeDevices, toDeviceInfo } from './reshape.js';

export interface ServerDependencies {
  logger: Logger;
  client: HubApi;
}

const deviceRefSchema = z.number().int().positive();

function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function successResult(data: unknown) {
  const structuredContent: Record<string, unknown> = {
    result: data
  };
  return {
    content: [
      {
        type: 'text' as const,
        text: toJsonText(data)
      }
    ],
    structuredContent
  };
}

function errorResult(code: ErrorCode, message: string, details?: Record<string, unknown>) {
  const error = {
    code,
    message,
    ...actionableErrorFields(code),
    ...(details === undefined ? {} : { details })
  };
  return {
    isError: true,
    content: [
      {
        type: 'text' as const,
        text: toJsonText({
          error
        })
      }
    ],
    structuredContent: {
      error
    }
  };
}

export function buildMcpServer(deps: ServerDependencies): McpServer {
  const { client, logger } = deps;

  const server = new McpServer(
    {
      name: 'homeseer-mcp',
      version: '1.0.0',
      websiteUrl: 'https://docs.homeseer.com/hspi/json-api'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  async function runTool<T>(tool: string, details: Record<string, unknown>, fn: () => Promise<T>) {
    const started = Date.now();
    try {
      const data = await fn();
      logger.info({ tool, durationMs: Date.now() - started, ...details }, 'Tool call succeeded');
      return successResult(data);
    } catch (error) {
      const mapped = asHomeSeerMcpError(error);
      logger.warn(
        {
          tool,
          durationMs: Date.now() - started,
          code: mapped.code,
          statusCode: mapped.statusCode,
          ...details
        },
        mapped.message
      );
      return errorResult(mapped.code, mapped.message, mapped.details);
    }
  }

  server.registerTool(
    'list_all_devices',
    {
      description: 'List HomeSeer devices with optional name filtering and location info.',
      inputSchema: {
        free_text_search: z.string().optional().describe('Filter by device name (case-insensitive)'),
        need_room_information: z.boolean().optional().default(false).describe('Include location/room fields')
      }
    },
    async ({ free_text_search, need_room_information }) => {
      return runTool('list_all_devices', { free_text_search, need_room_information }, async () => {
        const devices = await client.listDevices();
        const filtered = filterDevicesByName(devices, free_text_search);
        logger.debug({ listed: filtered.length, total: devices.length }, 'Listed devices');
        return summarizeDevices(filtered, need_room_information);
      });
    }
  );

  server.registerTool(
    'get_device_info',
    {
      description:
        'Get detailed information about a specific device by reference ID: name, location, value, status and associated devices.',
      inputSchema: {
        device_ref: deviceRefSchema.describe('Device reference ID')
      }
    },
    async ({ device_ref }) => {
      return runTool('get_device_info', { device_ref }, async () => {
        const device = await client.getDevice(device_ref);
        return toDeviceInfo(device);
      });
    }
  );

  server.registerTool(
    'control_homeseer_device',
    {
      description:
        'Control a device using numeric device ID and control value. Use get_control to find available values for a device.',
      inputSchema: {
        device_id: deviceRefSchema.describe('Device reference ID'),
        control_id: z.number().int().describe('Control value to set')
      }
    },
    async ({ device_id, control_id }) => {
      return runTool('control_homeseer_device', { device_id, control_id }, async () => {
        return client.setDeviceStatus(device_id, control_id);
      });
    }
  );

  server.registerTool(
    'control_homeseer_device_by_label',
    {
      description:
        'Control a device using a human-readable label like "On", "Off", "Close". Use get_control to see available labels for a device.',
      inputSchema: {
        device_ref: deviceRefSchema.describe('Device reference ID'),
        label: z.string().describe('Control label (e.g., "On", "Off", "Dim 50%")')
      }
    },
    async ({ device_ref, label }) => {
      return runTool('control_homeseer_device_by_label', { device_ref, label }, async () => {
        return client.controlDeviceByLabel(device_ref, label);
      });
    }
  );

  server.registerTool(
    'get_control',
    {
      description: 'Get available control options for a device (e.g., On/Off, dimmer levels) as label/value pairs.',
      inputSchema: {
        device_ref: deviceRefSchema.describe('Device reference ID')
      }
    },
    async ({ device_ref }) => {
      return runTool('get_control', { device_ref }, async () => {
        return client.getControls(device_ref);
      });
    }
  );

  server.registerTool(
    'get_events',
    {
      description:
        'List HomeSeer automation events with optional filtering by name or group. Each event has a Group and Name that can be used with run_event.',
      inputSchema: {
        free_text_search: z.string().optional().describe('Filter by event name or group (case-insensitive)')
      }
    },
    async ({ free_text_search }) => {
      return runTool('get_events', { free_text_search }, async () => {
        const envelope = await client.getEvents();
        const events = filterEvents(envelope.Events, free_text_search);
        logger.debug({ listed: events.length, total: envelope.Events.length }, 'Listed events');
        return events;
      });
    }
  );

  server.registerTool(
    'run_event',
    {
      description:
        'Execute a HomeSeer automation event by ID or by group+name. Use get_events to find available events. Provide either event_id OR both group and name.',
      inputSchema: {
        group: z.string().optional().describe('Event group (required with name)'),
        name: z.string().optional().describe('Event name (required with group)'),
        event_id: z.number().int().nullish().describe('Event ID (alternative to group+name)')
      }
    },
    async ({ group, name, event_id }) => {
      return runTool('run_event', { group, name, event_id }, async () => {
        // null from callers means the id was not given
        return client.runEvent({ id: event_id ?? undefined, group, name });
      });
    }
  );

  return server;
}
