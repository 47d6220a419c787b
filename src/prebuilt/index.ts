/**
 * Prebuilt agent graphs.
 */

export { userMessage, systemMessage, lastAssistantMessage, hasToolCalls, messagesStateSchema } from './messages';
export type {
    Message,
    SystemMessage,
    UserMessage,
    AssistantMessage,
    ToolMessage,
    ToolCall,
    MessagesState,
} from './messages';

export { defineTool, toToolDefinition } from './tools';
export type { GraphTool, ToolContext, ToolDefinition, ChatModel, ChatModelCallOptions } from './tools';

export { ToolNode, toolsCondition } from './tool-node';
export type { ToolNodeOptions } from './tool-node';

export { createReactAgent, withSystemPrompt, tagMessage } from './react-agent';
export type { ReactAgentOptions, ReactAgentNode } from './react-agent';

export { createHandoffTool, handoffToolName, findHandoff, handoffAck, answerHandoffTurn } from './handoff';
export type { Handoff, HandoffArgs } from './handoff';

export { createSupervisor } from './supervisor';
export type { SupervisorOptions, SupervisedAgent, WorkerInterrupt } from './supervisor';

export { createSwarm, swarmStateSchema, toolStepName } from './swarm';
export type { SwarmOptions, SwarmAgent, SwarmState } from './swarm';
