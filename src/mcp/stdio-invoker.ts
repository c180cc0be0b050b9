import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { type Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  type CapabilityRequest,
  type CapabilityResponse,
  type McpServerConfig,
} from '../types';
import { toErrorMessage } from '../utils/errors';
import { serverLog } from '../utils/logger';
import { type CapabilityInvoker } from './capability-gateway';
import { type HealthProbe } from './health-monitor';

const CLIENT_INFO = { name: 'prompt-chain-orchestrator', version: '0.4.0' };

export type TransportFactory = (server: McpServerConfig) => Promise<Transport>;

/** Spawns the server's configured command and talks to it over stdio. */
export async function stdioTransport(server: McpServerConfig): Promise<Transport> {
  if (!server.transport) {
    throw new Error(`MCP server "${server.id}" has no transport configured`);
  }
  const { command, args, env } = server.transport;
  return new StdioClientTransport({ command, args, env });
}

/**
 * Calls MCP capability servers, over stdio unless another transport factory
 * is given. One client connection per server, opened lazily and kept until `close()`.
 */
export class StdioCapabilityInvoker implements CapabilityInvoker {
  private clients: Map<string, Promise<Client>> = new Map();

  constructor(private readonly createTransport: TransportFactory = stdioTransport) {}

  async invoke(server: McpServerConfig, request: CapabilityRequest, signal?: AbortSignal): Promise<CapabilityResponse> {
    const toolName = server.toolMap?.[request.capability] ?? request.capability;
    const started = Date.now();
    const client = await this.connect(server);

    const result: unknown = await client.callTool(
      { name: toolName, arguments: { query: request.query, ...request.payload } },
      undefined,
      { signal },
    );

    const isError = typeof result === 'object' && result !== null && Reflect.get(result, 'isError') === true;
    return {
      result: extractPayload(result),
      latencyMs: Date.now() - started,
      success: !isError,
    };
  }

  /** Health probe: a server is healthy when it answers `listTools`. */
  readonly probe: HealthProbe = async (server, signal) => {
    const client = await this.connect(server);
    await client.listTools(undefined, { signal });
    return true;
  };

  async close(): Promise<void> {
    const pending = [...this.clients.entries()];
    this.clients.clear();
    const results = await Promise.allSettled(pending.map(async ([, client]) => (await client).close()));
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        serverLog(pending[i][0], `close failed: ${toErrorMessage(r.reason)}`, 'warn');
      }
    });
  }

  private connect(server: McpServerConfig): Promise<Client> {
    const existing = this.clients.get(server.id);
    if (existing) return existing;

    const connecting = (async () => {
      const transport = await this.createTransport(server);
      const client = new Client(CLIENT_INFO);
      await client.connect(transport);
      serverLog(server.id, 'connected', 'debug');
      return client;
    })();

    connecting.catch(() => {
      this.clients.delete(server.id);
    });
    this.clients.set(server.id, connecting);
    return connecting;
  }
}

/** Prefers structured content; otherwise joins the text parts and parses them as JSON when they are JSON. */
export function extractPayload(result: unknown): unknown {
  if (typeof result !== 'object' || result === null) return result;
  const structured: unknown = Reflect.get(result, 'structuredContent');
  if (structured !== undefined) return structured;

  const content: unknown = Reflect.get(result, 'content');
  if (!Array.isArray(content)) return result;

  const text = content
    .map((part: unknown) => (typeof part === 'object' && part !== null ? Reflect.get(part, 'text') : undefined))
    .filter((t): t is string => typeof t === 'string')
    .join('\n');
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
