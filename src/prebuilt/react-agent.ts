/**
 * ReAct agent: the model and its tools in a loop until the model stops
 * asking for tools.
 *
 *   START → agent ⇄ tools
 *            └──→ END
 */

import type { Checkpointer } from '../graph/checkpointer';
import type { CompiledGraph } from '../graph/compiled-graph';
import { StateGraph } from '../graph/state-graph';
import { END, START } from '../graph/types';
import type { Logger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { AssistantMessage, Message, MessagesState } from './messages';
import { messagesStateSchema, systemMessage } from './messages';
import { ToolNode, toolsCondition } from './tool-node';
import type { ChatModel, GraphTool } from './tools';
import { toToolDefinition } from './tools';

export type ReactAgentNode = 'agent' | 'tools';

export interface ReactAgentOptions {
    model: ChatModel;
    tools?: GraphTool[];
    /** Prepended to every model call; never stored in state */
    systemPrompt?: string;
    /** Also tags assistant messages and names the compiled graph */
    name?: string;
    checkpointer?: Checkpointer<MessagesState>;
    interruptBefore?: ReactAgentNode[];
    interruptAfter?: ReactAgentNode[];
    logger?: Logger;
    tracer?: Tracer;
}

/** Model call with an optional system prompt in front */
export function withSystemPrompt(messages: Message[], systemPrompt?: string): Message[] {
    return systemPrompt ? [systemMessage(systemPrompt), ...messages] : messages;
}

/** Attach the producing agent's name */
export function tagMessage(message: AssistantMessage, name?: string): AssistantMessage {
    return name ? { ...message, name } : message;
}

export function createReactAgent(options: ReactAgentOptions): CompiledGraph<MessagesState> {
    const { model, tools = [], systemPrompt, name } = options;
    const toolNode = new ToolNode(tools, { logger: options.logger });
    const definitions = tools.map(toToolDefinition);

    return new StateGraph<MessagesState>(messagesStateSchema)
        .addNode('agent', async (state, context) => {
            const reply = await model.invoke(withSystemPrompt(state.messages, systemPrompt), {
                tools: definitions,
                signal: context.signal,
            });
            return { messages: [tagMessage(reply, name)] };
        })
        .addNode('tools', toolNode.node())
        .addEdge(START, 'agent')
        .addConditionalEdges('agent', toolsCondition, { tools: 'tools', [END]: END })
        .addEdge('tools', 'agent')
        .interruptBefore(...(options.interruptBefore ?? []))
        .interruptAfter(...(options.interruptAfter ?? []))
        .compile({
            name: name ?? 'react-agent',
            checkpointer: options.checkpointer,
            logger: options.logger,
            tracer: options.tracer,
        });
}
