import { describe, it, expect, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createMcpServer } from './server.js';
import { ALL_TOOLS } from './tools/index.js';
import { FakeCatalog, jsonOf, makeContext, makeVideo, textOf } from './test-helpers.js';

describe('createMcpServer', () => {
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    client = undefined;
  });

  async function connect(catalog: FakeCatalog): Promise<Client> {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const server = createMcpServer(makeContext(catalog));
    await server.connect(serverTransport);

    const c = new Client({ name: 'test-client', version: '0.0.0' });
    await c.connect(clientTransport);
    client = c;
    return c;
  }

  it('registers every tool', async () => {
    const c = await connect(new FakeCatalog());
    const { tools } = await c.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual(ALL_TOOLS.map((t) => t.name).sort());
    expect(tools).toHaveLength(24);
  });

  it('runs a tool end to end', async () => {
    const c = await connect(new FakeCatalog().addVideo(makeVideo({ videoId: 'abc' })));

    const result = CallToolResultSchema.parse(
      await c.callTool({ name: 'get_video_performance_score', arguments: { video_id: 'abc' } }),
    );

    expect(jsonOf(result)).toMatchObject({ videoId: 'abc', grade: 'C' });
  });

  it('returns domain failures as error text', async () => {
    const c = await connect(new FakeCatalog());

    const result = CallToolResultSchema.parse(
      await c.callTool({ name: 'get_video_info', arguments: { video_id: 'missing' } }),
    );

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Error: Video not found: missing');
  });
});
