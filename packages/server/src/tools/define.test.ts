import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { NotFoundError } from '@tubepulse/shared';
import { defineTool } from './define.js';
import { FakeCatalog, makeContext, textOf } from '../test-helpers.js';

const ctx = makeContext(new FakeCatalog());

const echo = defineTool({
  name: 'echo',
  description: 'Echo the count back',
  input: {
    count: z.number().int().min(1),
    label: z.string().default('none'),
  },
  handler: async ({ count, label }) => ({ count, label }),
});

describe('defineTool', () => {
  it('returns the handler value as indented JSON', async () => {
    const result = await echo.run({ count: 2 }, ctx);

    expect(result.isError).toBeUndefined();
    expect(textOf(result)).toBe('{\n  "count": 2,\n  "label": "none"\n}');
  });

  it('reports missing arguments', async () => {
    const result = await echo.run({}, ctx);

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Error: Invalid arguments: count: Required');
  });

  it('treats undefined arguments as an empty object', async () => {
    const result = await echo.run(undefined, ctx);
    expect(textOf(result)).toBe('Error: Invalid arguments: count: Required');
  });

  it('turns a thrown error into an error result', async () => {
    const failing = defineTool({
      name: 'failing',
      description: 'Always fails',
      input: {},
      handler: async () => {
        throw new NotFoundError('Video not found: abc');
      },
    });

    const result = await failing.run({}, ctx);
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Video not found: abc' }],
      isError: true,
    });
  });

  it('exposes the raw input shape', () => {
    expect(Object.keys(echo.inputSchema)).toEqual(['count', 'label']);
  });
});
