/**
 * Supervisor - a coordinating model delegates to worker agents.
 *
 * Each worker is an independently compiled graph run as a single node;
 * control always returns to the supervisor, which ends the run by answering
 * without a handoff.
 *
 * A worker that pauses pauses the whole run. Its partial turn is reported in
 * the interrupt payload (`WorkerInterrupt`) rather than merged into the
 * history, and the run resumes at the supervisor.
 */

import type { Checkpointer } from '../graph/checkpointer';
import { Command } from '../graph/command';
import type { CompiledGraph } from '../graph/compiled-graph';
import { StateGraph } from '../graph/state-graph';
import type { NodeName } from '../graph/types';
import { START } from '../graph/types';
import type { Logger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import { answerHandoffTurn, createHandoffTool, findHandoff } from './handoff';
import type { Message, MessagesState } from './messages';
import { messagesStateSchema } from './messages';
import { tagMessage, withSystemPrompt } from './react-agent';
import { ToolNode } from './tool-node';
import type { ChatModel } from './tools';
import { toToolDefinition } from './tools';

export interface SupervisedAgent {
    /** Node name and handoff target */
    name: string;
    /** Shown to the supervisor in the handoff tool description */
    description?: string;
    graph: CompiledGraph<MessagesState>;
}

export interface SupervisorOptions {
    model: ChatModel;
    agents: SupervisedAgent[];
    systemPrompt?: string;
    /** Node name of the supervisor (default: 'supervisor') */
    name?: string;
    /**
     * What a worker contributes back: every message it produced, or only
     * its final one (default: 'full_history')
     */
    outputMode?: 'full_history' | 'last_message';
    checkpointer?: Checkpointer<MessagesState>;
    logger?: Logger;
    tracer?: Tracer;
}

/** Payload of the interrupt raised when a worker pauses */
export interface WorkerInterrupt {
    agent: string;
    /** Node the worker paused in front of */
    nextNode: NodeName;
    /** The worker's own interrupt payload, if any */
    payload?: unknown;
    /** Messages the worker produced before pausing */
    messages: Message[];
}

export function createSupervisor(options: SupervisorOptions): CompiledGraph<MessagesState> {
    const { model, agents, systemPrompt, outputMode = 'full_history' } = options;
    const supervisorName = options.name ?? 'supervisor';
    const agentNames = new Set(agents.map(agent => agent.name));
    const handoffTools = agents.map(agent => toToolDefinition(createHandoffTool(agent.name, agent.description)));
    // The supervisor owns no tools; any other call it makes is answered as unknown
    const noTools = new ToolNode([], { logger: options.logger });

    const graph = new StateGraph<MessagesState>(messagesStateSchema)
        .addNode(supervisorName, async (state, context) => {
            const reply = tagMessage(
                await model.invoke(withSystemPrompt(state.messages, systemPrompt), {
                    tools: handoffTools,
                    signal: context.signal,
                }),
                supervisorName,
            );

            const handoff = findHandoff(reply, agentNames);
            if (!handoff) {
                return Command.end<MessagesState>({ messages: [reply] });
            }

            context.logger.info('Delegating to agent', { agent: handoff.agent });
            const replies = await answerHandoffTurn(reply, handoff, calls => noTools.run(calls, context.signal));
            return Command.gotoWithUpdate<MessagesState>(handoff.agent, { messages: [reply, ...replies] });
        })
        .addEdge(START, supervisorName);

    for (const agent of agents) {
        graph
            .addNode(agent.name, async (state, context) => {
                const result = await agent.graph.invoke({ messages: state.messages }, { signal: context.signal });
                const produced = result.state.messages.slice(state.messages.length);

                if (result.status === 'interrupted') {
                    context.logger.info('Agent paused', { agent: agent.name, nextNode: result.nextNode });
                    const paused: WorkerInterrupt = {
                        agent: agent.name,
                        nextNode: result.nextNode,
                        payload: result.payload,
                        messages: produced,
                    };
                    return Command.interrupt<MessagesState>(paused);
                }

                return { messages: outputMode === 'last_message' ? produced.slice(-1) : produced };
            })
            .addEdge(agent.name, supervisorName);
    }

    return graph.compile({
        name: supervisorName,
        checkpointer: options.checkpointer,
        logger: options.logger,
        tracer: options.tracer,
    });
}
