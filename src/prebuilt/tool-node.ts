/**
 * ToolNode - executes the tool calls of the latest assistant message.
 *
 * Failures never abort the graph: an unknown tool, arguments rejected by the
 * tool's schema, or an exception thrown by the tool each become a tool
 * message starting with `Error:` so the model can react to them.
 */

import type { NodeFunction } from '../graph/types';
import { END } from '../graph/types';
import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import type { MessagesState, ToolCall, ToolMessage } from './messages';
import { hasToolCalls, lastAssistantMessage } from './messages';
import type { GraphTool } from './tools';

export interface ToolNodeOptions {
    logger?: Logger;
}

export class ToolNode {
    private readonly tools = new Map<string, GraphTool>();
    private readonly logger: Logger;

    constructor(tools: GraphTool[], options: ToolNodeOptions = {}) {
        for (const tool of tools) {
            this.tools.set(tool.name, tool);
        }
        this.logger = options.logger ?? noopLogger;
    }

    get toolNames(): string[] {
        return Array.from(this.tools.keys());
    }

    /**
     * Run every call concurrently. Results keep the order of `calls`.
     */
    async run(calls: ToolCall[], signal?: AbortSignal): Promise<ToolMessage[]> {
        return Promise.all(calls.map(call => this.runOne(call, signal)));
    }

    /** Graph node over MessagesState */
    node(): NodeFunction<MessagesState> {
        return async (state, context) => {
            const calls = lastAssistantMessage(state.messages)?.toolCalls ?? [];
            return { messages: await this.run(calls, context.signal) };
        };
    }

    private async runOne(call: ToolCall, signal?: AbortSignal): Promise<ToolMessage> {
        const reply = (content: string): ToolMessage => ({
            role: 'tool',
            content,
            toolCallId: call.id,
            name: call.name,
        });

        const tool = this.tools.get(call.name);
        if (!tool) {
            this.logger.warn('Unknown tool requested', { tool: call.name });
            return reply(`Error: Tool "${call.name}" not found`);
        }

        const parsed = tool.schema.safeParse(call.args);
        if (!parsed.success) {
            const detail = parsed.error.issues
                .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
                .join('; ');
            return reply(`Error: Invalid arguments for tool "${call.name}": ${detail}`);
        }

        try {
            const result = await tool.invoke(parsed.data, { toolCallId: call.id, signal });
            return reply(typeof result === 'string' ? result : JSON.stringify(result ?? null));
        } catch (error) {
            this.logger.warn('Tool failed', { tool: call.name, error: error instanceof Error ? error.message : String(error) });
            return reply(`Error: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}

/**
 * Router for the agent node: `'tools'` while the model asks for tools,
 * END otherwise.
 */
export function toolsCondition(state: Readonly<MessagesState>): string {
    return hasToolCalls(lastAssistantMessage(state.messages)) ? 'tools' : END;
}
