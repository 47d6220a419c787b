import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { END } from '../../../src/graph/types';
import { noopLogger } from '../../../src/lib/logger';
import type { MessagesState } from '../../../src/prebuilt/messages';
import { ToolNode, toolsCondition } from '../../../src/prebuilt/tool-node';
import { defineTool, toToolDefinition } from '../../../src/prebuilt/tools';
import { callTools, say } from '../../mocks/scripted-chat-model';

const add = defineTool({
    name: 'add',
    description: 'Add two numbers',
    schema: z.object({ a: z.number(), b: z.number() }),
    invoke: ({ a, b }) => a + b,
});

const lookup = defineTool({
    name: 'lookup',
    description: 'Look up a record',
    schema: z.object({ id: z.string() }),
    invoke: async ({ id }) => ({ id, found: true }),
});

const broken = defineTool({
    name: 'broken',
    description: 'Always fails',
    schema: z.object({}),
    invoke: () => { throw new Error('backend unavailable'); },
});

describe('ToolNode', () => {
    const node = new ToolNode([add, lookup, broken]);

    it('should run every call and keep call order', async () => {
        const messages = await node.run([
            { id: 'call-1', name: 'add', args: { a: 2, b: 3 } },
            { id: 'call-2', name: 'lookup', args: { id: 'r1' } },
        ]);

        expect(messages).toEqual([
            { role: 'tool', content: '5', toolCallId: 'call-1', name: 'add' },
            { role: 'tool', content: '{"id":"r1","found":true}', toolCallId: 'call-2', name: 'lookup' },
        ]);
    });

    it('should report unknown tools as error messages', async () => {
        const [message] = await node.run([{ id: 'c', name: 'search', args: {} }]);

        expect(message.content).toBe('Error: Tool "search" not found');
    });

    it('should report invalid arguments without invoking the tool', async () => {
        const invoke = vi.fn();
        const guarded = new ToolNode([defineTool({ ...add, invoke })]);

        const [message] = await guarded.run([{ id: 'c', name: 'add', args: { a: 1 } }]);

        expect(message.content.startsWith('Error: Invalid arguments for tool "add": b: ')).toBe(true);
        expect(invoke).not.toHaveBeenCalled();
    });

    it('should turn thrown errors into error messages', async () => {
        const [message] = await node.run([{ id: 'c', name: 'broken', args: {} }]);

        expect(message).toEqual({ role: 'tool', content: 'Error: backend unavailable', toolCallId: 'c', name: 'broken' });
    });

    it('should act on the last assistant message as a graph node', async () => {
        const state: MessagesState = {
            messages: [
                { role: 'user', content: 'add please' },
                callTools({ id: 'call-9', name: 'add', args: { a: 1, b: 1 } }),
            ],
        };

        const update = await node.node()(state, { node: 'tools', step: 1, config: {}, logger: noopLogger });

        expect(update).toEqual({ messages: [{ role: 'tool', content: '2', toolCallId: 'call-9', name: 'add' }] });
    });

    it('should expose the tool names', () => {
        expect(node.toolNames).toEqual(['add', 'lookup', 'broken']);
    });
});

describe('toolsCondition', () => {
    it('should route to tools while calls are pending', () => {
        expect(toolsCondition({ messages: [callTools({ id: '1', name: 'add', args: {} })] })).toBe('tools');
    });

    it('should end on a plain answer or a non-assistant message', () => {
        expect(toolsCondition({ messages: [say('done')] })).toBe(END);
        expect(toolsCondition({ messages: [{ role: 'user', content: 'hi' }] })).toBe(END);
        expect(toolsCondition({ messages: [] })).toBe(END);
    });
});

describe('toToolDefinition', () => {
    it('should describe arguments as JSON Schema', () => {
        const definition = toToolDefinition(add);

        expect(definition.name).toBe('add');
        expect(definition.description).toBe('Add two numbers');
        expect(definition.parameters).toMatchObject({
            type: 'object',
            properties: { a: { type: 'number' }, b: { type: 'number' } },
            required: ['a', 'b'],
        });
    });
});
