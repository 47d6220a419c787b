/**
 * Handoff tools: how one agent passes control to another.
 */

import { z } from 'zod';
import type { AssistantMessage, ToolCall, ToolMessage } from './messages';
import type { GraphTool } from './tools';
import { defineTool } from './tools';

const HANDOFF_PREFIX = 'transfer_to_';

const handoffArgs = z.object({
    /** Why control moves; surfaced to the receiving agent through history */
    reason: z.string().optional(),
});

export type HandoffArgs = z.infer<typeof handoffArgs>;

export function handoffToolName(agent: string): string {
    return `${HANDOFF_PREFIX}${agent}`;
}

/**
 * Tool named `transfer_to_<agent>`. Invoking it only acknowledges the
 * transfer; routing is done by the graph that sees the call.
 */
export function createHandoffTool(agent: string, description?: string): GraphTool<HandoffArgs> {
    return defineTool({
        name: handoffToolName(agent),
        description: description ?? `Transfer the conversation to ${agent}`,
        schema: handoffArgs,
        invoke: () => `Transferred to ${agent}`,
    });
}

export interface Handoff {
    agent: string;
    call: ToolCall;
}

/**
 * First handoff call in `message` whose target is in `agents`.
 */
export function findHandoff(message: AssistantMessage, agents: ReadonlySet<string>): Handoff | undefined {
    for (const call of message.toolCalls ?? []) {
        if (!call.name.startsWith(HANDOFF_PREFIX)) continue;
        const agent = call.name.slice(HANDOFF_PREFIX.length);
        if (agents.has(agent)) {
            return { agent, call };
        }
    }
    return undefined;
}

/** Tool reply closing the handoff call, so the history stays well formed */
export function handoffAck(handoff: Handoff): ToolMessage {
    return {
        role: 'tool',
        content: `Transferred to ${handoff.agent}`,
        toolCallId: handoff.call.id,
        name: handoff.call.name,
    };
}

/**
 * Tool replies for every call of a turn that hands off: the chosen handoff is
 * acknowledged, other handoff calls are declined, and `runTools` answers the
 * ordinary calls. Replies keep the order of the calls.
 */
export async function answerHandoffTurn(
    message: AssistantMessage,
    handoff: Handoff,
    runTools: (calls: ToolCall[]) => Promise<ToolMessage[]>,
): Promise<ToolMessage[]> {
    const calls = message.toolCalls ?? [];
    const ordinary = calls.filter(call => !call.name.startsWith(HANDOFF_PREFIX));
    const results = new Map((await runTools(ordinary)).map(result => [result.toolCallId, result]));

    return calls.map(call => {
        if (call.id === handoff.call.id) {
            return handoffAck(handoff);
        }
        return results.get(call.id) ?? {
            role: 'tool',
            content: `Error: Not transferred; control already moved to ${handoff.agent}`,
            toolCallId: call.id,
            name: call.name,
        };
    });
}
