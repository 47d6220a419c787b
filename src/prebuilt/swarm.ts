/**
 * Swarm - peer agents that hand the conversation to each other directly.
 *
 * Every agent owns two nodes: `<name>` calls its model and `<name>:tools`
 * runs its ordinary tool calls before returning to it. A handoff call jumps
 * straight to the peer's node; there is no coordinator. Ordinary calls made
 * in the same turn as a handoff run before control moves.
 */

import type { Checkpointer } from '../graph/checkpointer';
import { Command } from '../graph/command';
import type { CompiledGraph } from '../graph/compiled-graph';
import type { StateSchema } from '../graph/state';
import { appendReducer, reducers } from '../graph/state';
import { StateGraph } from '../graph/state-graph';
import { START } from '../graph/types';
import type { Logger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import { answerHandoffTurn, createHandoffTool, findHandoff } from './handoff';
import type { Message, MessagesState } from './messages';
import { hasToolCalls, lastAssistantMessage } from './messages';
import { tagMessage, withSystemPrompt } from './react-agent';
import { ToolNode } from './tool-node';
import type { ChatModel, GraphTool } from './tools';
import { toToolDefinition } from './tools';

export interface SwarmState extends MessagesState {
    /** Agent that currently holds the conversation */
    activeAgent?: string;
}

export const swarmStateSchema: Partial<StateSchema<SwarmState>> = {
    merge: reducers<SwarmState>({ messages: appendReducer<Message>() }),
};

export interface SwarmAgent {
    name: string;
    model: ChatModel;
    tools?: GraphTool[];
    systemPrompt?: string;
    /** Peers this agent may hand off to (default: every other agent) */
    handoffs?: string[];
    description?: string;
}

export interface SwarmOptions {
    agents: SwarmAgent[];
    /** Agent that receives the first turn */
    defaultAgent: string;
    name?: string;
    checkpointer?: Checkpointer<SwarmState>;
    logger?: Logger;
    tracer?: Tracer;
}

export function toolStepName(agent: string): string {
    return `${agent}:tools`;
}

export function createSwarm(options: SwarmOptions): CompiledGraph<SwarmState> {
    const { agents, defaultAgent } = options;
    const descriptions = new Map(agents.map(agent => [agent.name, agent.description]));
    const graph = new StateGraph<SwarmState>(swarmStateSchema).addEdge(START, defaultAgent);

    for (const agent of agents) {
        const peers = agent.handoffs ?? agents.map(peer => peer.name).filter(peer => peer !== agent.name);
        const peerSet = new Set(peers);
        const toolNode = new ToolNode(agent.tools ?? [], { logger: options.logger });
        const definitions = [
            ...(agent.tools ?? []).map(toToolDefinition),
            ...peers.map(peer => toToolDefinition(createHandoffTool(peer, descriptions.get(peer)))),
        ];
        const toolStep = toolStepName(agent.name);

        graph
            .addNode(agent.name, async (state, context) => {
                const reply = tagMessage(
                    await agent.model.invoke(withSystemPrompt(state.messages, agent.systemPrompt), {
                        tools: definitions,
                        signal: context.signal,
                    }),
                    agent.name,
                );

                const handoff = findHandoff(reply, peerSet);
                if (handoff) {
                    context.logger.info('Agent handoff', { from: agent.name, to: handoff.agent });
                    const replies = await answerHandoffTurn(reply, handoff, calls => toolNode.run(calls, context.signal));
                    return Command.gotoWithUpdate<SwarmState>(handoff.agent, {
                        messages: [reply, ...replies],
                        activeAgent: handoff.agent,
                    });
                }

                if (hasToolCalls(reply)) {
                    return Command.gotoWithUpdate<SwarmState>(toolStep, { messages: [reply], activeAgent: agent.name });
                }

                return Command.end<SwarmState>({ messages: [reply], activeAgent: agent.name });
            })
            .addNode(toolStep, async (state, context) => {
                const calls = lastAssistantMessage(state.messages)?.toolCalls ?? [];
                return { messages: await toolNode.run(calls, context.signal) };
            })
            .addEdge(toolStep, agent.name);
    }

    return graph.compile({
        name: options.name ?? 'swarm',
        checkpointer: options.checkpointer,
        logger: options.logger,
        tracer: options.tracer,
    });
}
