/**
 * Tests for the tool registry
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod/v4';
import { createToolRegistry, defineTool, ToolRegistrationError } from '../core/tools/index.js';

const divide = defineTool({
  name: 'divide',
  description: 'Divide a by b',
  schema: z.object({ a: z.number(), b: z.number().default(1) }),
  execute: ({ a, b }) => {
    if (b === 0) throw new Error('Division by zero is not allowed');
    return { result: a / b };
  },
});

describe('createToolRegistry', () => {
  it('should advertise JSON schemas with only required fields marked required', () => {
    const registry = createToolRegistry([divide]);

    const [schema] = registry.schemas();

    expect(schema?.name).toBe('divide');
    expect(schema?.description).toBe('Divide a by b');
    expect(schema?.inputSchema.type).toBe('object');
    expect(Object.keys(schema?.inputSchema.properties ?? {})).toEqual(['a', 'b']);
    expect(schema?.inputSchema.required).toEqual(['a']);
  });

  it('should dispatch a call with validated arguments', async () => {
    const registry = createToolRegistry([divide]);

    const result = await registry.dispatch({ id: 'call_1', name: 'divide', arguments: '{"a":9,"b":3}' });

    expect(result).toEqual({ callId: 'call_1', name: 'divide', output: { result: 3 }, isError: false });
  });

  it('should apply schema defaults', async () => {
    const registry = createToolRegistry([divide]);

    const result = await registry.dispatch({ id: 'call_2', name: 'divide', arguments: '{"a":4}' });

    expect(result.output).toEqual({ result: 4 });
  });

  it('should return an error record for an unknown tool', async () => {
    const registry = createToolRegistry([divide]);

    const result = await registry.dispatch({ id: 'call_3', name: 'launch', arguments: '{}' });

    expect(result).toEqual({ callId: 'call_3', name: 'launch', output: { error: 'Unknown tool: launch' }, isError: true });
  });

  it('should return executor failures as error records', async () => {
    const registry = createToolRegistry([divide]);

    const result = await registry.dispatch({ id: 'call_4', name: 'divide', arguments: '{"a":1,"b":0}' });

    expect(result.output).toEqual({ error: 'Division by zero is not allowed' });
    expect(result.isError).toBe(true);
  });

  it('should reject malformed JSON and invalid arguments without throwing', async () => {
    const registry = createToolRegistry([divide]);

    const malformed = await registry.dispatch({ id: 'call_5', name: 'divide', arguments: '{a:' });
    const invalid = await registry.dispatch({ id: 'call_6', name: 'divide', arguments: '{"a":"x"}' });

    expect(malformed.isError).toBe(true);
    expect(String(malformed.output.error)).toMatch(/^Invalid arguments for divide: /);
    expect(invalid.isError).toBe(true);
    expect(String(invalid.output.error)).toMatch(/^Invalid arguments for divide: a: /);
  });

  it('should treat empty arguments as an empty object', async () => {
    const ping = defineTool({
      name: 'ping',
      description: 'Ping',
      schema: z.object({}),
      execute: () => ({ pong: true }),
    });
    const registry = createToolRegistry([ping]);

    const result = await registry.dispatch({ id: 'call_7', name: 'ping', arguments: '' });

    expect(result.output).toEqual({ pong: true });
  });

  it('should reject duplicate and malformed names', () => {
    expect(() => createToolRegistry([divide, divide])).toThrow(ToolRegistrationError);
    expect(() => createToolRegistry([{ ...divide, name: 'bad name' }])).toThrow('Invalid tool name: "bad name"');
  });

  it('should reject tools whose schema is not an object', () => {
    expect(() => defineTool({
      name: 'scalar',
      description: 'Takes a bare number',
      schema: z.number(),
      execute: () => ({}),
    })).toThrow(ToolRegistrationError);
  });

  it('should narrow names with has()', () => {
    const registry = createToolRegistry([divide]);

    expect(registry.has('divide')).toBe(true);
    expect(registry.has('multiply')).toBe(false);
    expect(registry.names).toEqual(['divide']);
  });
});
