/**
 * Tool and chat model contracts for the prebuilt agents.
 * No provider is bundled; adapt any chat API to `ChatModel`.
 */

import type { ZodType } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { AssistantMessage, Message } from './messages';

// ============================================================================
// Tools
// ============================================================================

/** Passed to every tool invocation */
export interface ToolContext {
    toolCallId: string;
    signal?: AbortSignal;
}

/**
 * Executable tool. Arguments are validated with `schema` before `invoke`.
 */
export interface GraphTool<A = unknown> {
    name: string;
    description: string;
    schema: ZodType<A>;
    invoke(args: A, context: ToolContext): Promise<unknown> | unknown;
}

/**
 * Identity helper that infers the argument type from the schema.
 *
 * @example
 * ```typescript
 * const add = defineTool({
 *     name: 'add',
 *     description: 'Add two numbers',
 *     schema: z.object({ a: z.number(), b: z.number() }),
 *     invoke: ({ a, b }) => a + b,
 * });
 * ```
 */
export function defineTool<A>(tool: GraphTool<A>): GraphTool<A> {
    return tool;
}

/** What the model sees of a tool */
export interface ToolDefinition {
    name: string;
    description: string;
    /** JSON Schema of the arguments */
    parameters: ReturnType<typeof zodToJsonSchema>;
}

export function toToolDefinition(tool: GraphTool): ToolDefinition {
    return {
        name: tool.name,
        description: tool.description,
        parameters: zodToJsonSchema(tool.schema),
    };
}

// ============================================================================
// Chat model
// ============================================================================

export interface ChatModelCallOptions {
    tools: ToolDefinition[];
    signal?: AbortSignal;
}

/**
 * Minimal chat completion contract: messages in, one assistant turn out.
 */
export interface ChatModel {
    invoke(messages: Message[], options: ChatModelCallOptions): Promise<AssistantMessage>;
}
