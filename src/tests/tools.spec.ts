import { describe, it, expect } from 'vitest';
import { executeTool, parseToolCallRequest, NO_CONTENT } from '../tools/execute.js';
import { ToolExecutionError } from '../errors.js';
import { FakeBackend, TOOLS, text } from './fakes.js';

describe('parseToolCallRequest', () => {
  it('accepts a name with arguments', () => {
    expect(parseToolCallRequest({ tool_name: 'list_tables', arguments: { database: 'goteth_mainnet' } }))
      .toEqual({ tool_name: 'list_tables', arguments: { database: 'goteth_mainnet' } });
  });

  it('defaults missing arguments to an empty object', () => {
    expect(parseToolCallRequest({ tool_name: 'list_databases' })).toEqual({ tool_name: 'list_databases', arguments: {} });
  });

  it('rejects a missing or blank tool name', () => {
    expect(() => parseToolCallRequest({ arguments: {} })).toThrow(ToolExecutionError);
    expect(() => parseToolCallRequest({ tool_name: '  ' })).toThrow('Tool call is missing a tool_name');
  });

  it('rejects non-object arguments', () => {
    expect(() => parseToolCallRequest({ tool_name: 'q', arguments: ['SELECT 1'] }))
      .toThrow('Tool call arguments for q must be a JSON object');
  });
});

describe('executeTool', () => {
  it('returns the text of the first content item', async () => {
    const backend = new FakeBackend(TOOLS, async () => ({
      content: [{ type: 'text', text: 'first' }, { type: 'text', text: 'second' }],
      isError: false
    }));
    await expect(executeTool(backend, { tool_name: 'list_databases', arguments: {} })).resolves.toBe('first');
  });

  it('falls back to data, then to the serialized item', async () => {
    const image = new FakeBackend(TOOLS, async () => ({ content: [{ type: 'image', data: 'aGk=', mimeType: 'image/png' }], isError: false }));
    await expect(executeTool(image, { tool_name: 'plot', arguments: {} })).resolves.toBe('aGk=');

    const other = new FakeBackend(TOOLS, async () => ({ content: [{ type: 'resource', uri: 'file:///x' }], isError: false }));
    await expect(executeTool(other, { tool_name: 'r', arguments: {} })).resolves.toBe('{"type":"resource","uri":"file:///x"}');
  });

  it('reports empty content', async () => {
    const backend = new FakeBackend(TOOLS, async () => ({ content: [], isError: false }));
    await expect(executeTool(backend, { tool_name: 'list_databases', arguments: {} })).resolves.toBe(NO_CONTENT);
  });

  it('raises on a tool-reported error', async () => {
    const backend = new FakeBackend(TOOLS, async () => text('UNKNOWN_TABLE', true));
    const err = await executeTool(backend, { tool_name: 'run_select_query', arguments: { query: 'SELECT 1' } }).catch(e => e);
    expect(err).toBeInstanceOf(ToolExecutionError);
    expect(err.message).toBe('Tool execution failed: UNKNOWN_TABLE');
    expect(err.toolName).toBe('run_select_query');
  });

  it('wraps channel failures', async () => {
    const backend = new FakeBackend(TOOLS, async () => { throw new Error('EPIPE'); });
    await expect(executeTool(backend, { tool_name: 'list_databases', arguments: {} }))
      .rejects.toThrow('list_databases failed: EPIPE');
  });
});
