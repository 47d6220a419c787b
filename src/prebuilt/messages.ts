/**
 * Chat message types shared by the prebuilt agents.
 */

import type { StateSchema } from '../graph/state';
import { appendReducer, reducers } from '../graph/state';

export interface ToolCall {
    id: string;
    name: string;
    /** Raw arguments; validated against the tool's schema before execution */
    args: unknown;
}

export interface SystemMessage {
    role: 'system';
    content: string;
}

export interface UserMessage {
    role: 'user';
    content: string;
}

export interface AssistantMessage {
    role: 'assistant';
    content: string;
    toolCalls?: ToolCall[];
    /** Agent that produced the message, in multi-agent graphs */
    name?: string;
}

export interface ToolMessage {
    role: 'tool';
    content: string;
    toolCallId: string;
    /** Tool that produced the result */
    name: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

/** State of every prebuilt agent graph */
export interface MessagesState {
    messages: Message[];
}

/** Messages append; every other field is replaced */
export const messagesStateSchema: Partial<StateSchema<MessagesState>> = {
    merge: reducers<MessagesState>({ messages: appendReducer<Message>() }),
};

export function userMessage(content: string): UserMessage {
    return { role: 'user', content };
}

export function systemMessage(content: string): SystemMessage {
    return { role: 'system', content };
}

/** The final message when it is an assistant turn, otherwise undefined */
export function lastAssistantMessage(messages: readonly Message[]): AssistantMessage | undefined {
    const last = messages[messages.length - 1];
    return last?.role === 'assistant' ? last : undefined;
}

export function hasToolCalls(message: AssistantMessage | undefined): boolean {
    return (message?.toolCalls?.length ?? 0) > 0;
}
