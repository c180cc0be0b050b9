import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { z } from 'zod';
import { StdioCapabilityInvoker, extractPayload } from '../../src/mcp/stdio-invoker';
import { type McpServerConfig, CapabilityTag } from '../../src/types';

function buildServer(): McpServer {
  const server = new McpServer({ name: 'capabilities-test', version: '1.0.0' });
  server.tool(
    'search_docs',
    'Searches documentation.',
    { query: z.string(), limit: z.number().optional() },
    async ({ query, limit }) => ({
      content: [{ type: 'text', text: JSON.stringify({ query, limit: limit ?? null }) }],
    }),
  );
  server.tool('reasoning', 'Thinks out loud.', { query: z.string() }, async ({ query }) => ({
    content: [{ type: 'text', text: `thinking about ${query}` }],
  }));
  server.tool('run_tests', 'Always fails.', { query: z.string() }, async () => ({
    content: [{ type: 'text', text: 'no test runner' }],
    isError: true,
  }));
  return server;
}

const CONFIG: McpServerConfig = {
  id: 'local',
  capabilityTags: [CapabilityTag.DOCUMENTATION, CapabilityTag.REASONING, CapabilityTag.TEST_AUTOMATION],
  priority: 1,
  healthCheck: { intervalMs: 60_000, timeoutMs: 100 },
  maxConcurrentLeases: 2,
  toolMap: { [CapabilityTag.DOCUMENTATION]: 'search_docs', [CapabilityTag.TEST_AUTOMATION]: 'run_tests' },
};

describe('StdioCapabilityInvoker', () => {
  let connections: number;
  let invoker: StdioCapabilityInvoker;

  beforeEach(() => {
    connections = 0;
    invoker = new StdioCapabilityInvoker(async () => {
      connections++;
      const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
      await buildServer().connect(serverSide);
      return clientSide;
    });
  });

  afterEach(async () => {
    await invoker.close();
  });

  it('calls the mapped tool with the query and payload', async () => {
    const response = await invoker.invoke(CONFIG, {
      capability: CapabilityTag.DOCUMENTATION,
      query: 'retries',
      payload: { limit: 3 },
    });
    expect(response.success).toBe(true);
    expect(response.result).toEqual({ query: 'retries', limit: 3 });
    expect(response.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('uses the capability tag as the tool name when unmapped', async () => {
    const response = await invoker.invoke(CONFIG, { capability: CapabilityTag.REASONING, query: 'caching' });
    expect(response).toMatchObject({ success: true, result: 'thinking about caching' });
  });

  it('reports tool errors as unsuccessful calls', async () => {
    const response = await invoker.invoke(CONFIG, { capability: CapabilityTag.TEST_AUTOMATION, query: 'login' });
    expect(response).toMatchObject({ success: false, result: 'no test runner' });
  });

  it('keeps one connection per server until closed', async () => {
    expect(await invoker.probe(CONFIG, new AbortController().signal)).toBe(true);
    await invoker.invoke(CONFIG, { capability: CapabilityTag.REASONING, query: 'a' });
    expect(connections).toBe(1);

    await invoker.close();
    await invoker.invoke(CONFIG, { capability: CapabilityTag.REASONING, query: 'b' });
    expect(connections).toBe(2);
  });

  it('rejects a server without a transport', async () => {
    await expect(new StdioCapabilityInvoker().invoke(
      { ...CONFIG, id: 'bare' },
      { capability: CapabilityTag.REASONING, query: 'x' },
    )).rejects.toThrow('MCP server "bare" has no transport configured');
  });
});

describe('extractPayload', () => {
  it('prefers structured content', () => {
    expect(extractPayload({ structuredContent: { score: 0.9 }, content: [] })).toEqual({ score: 0.9 });
  });

  it('joins text parts and parses JSON when possible', () => {
    expect(extractPayload({ content: [{ type: 'text', text: '{"score":' }, { type: 'text', text: '0.5}' }] }))
      .toEqual({ score: 0.5 });
    expect(extractPayload({ content: [{ type: 'text', text: 'plain' }, { type: 'image', data: '' }] })).toBe('plain');
  });

  it('returns non-object results unchanged', () => {
    expect(extractPayload('raw')).toBe('raw');
    expect(extractPayload({ other: 1 })).toEqual({ other: 1 });
  });
});
