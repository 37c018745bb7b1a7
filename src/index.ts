/**
 * Main entry point for the agent loop SDK.
 *
 * Exports the agent, its collaborators and the types that flow between them.
 */

// Agent class
export { Agent } from './agent/agent.js'
export type { AgentOptions } from './agent/agent.js'
export { createAgentFromSettings, createModelGateway } from './agent/factory.js'

// Agent state
export type {
  AgentState,
  AgentStateType,
  TerminalState,
  IdleState,
  AwaitingModelState,
  ToolProposedState,
  AwaitingApprovalState,
  ExecutingToolState,
  CompletedState,
  FailedState,
} from './agent/state.js'
export { canTransition, isTerminal } from './agent/state.js'

// Proposals and streamed tool-call assembly
export type { ToolCallProposal } from './agent/proposal.js'
export { ToolCallAssembler } from './agent/tool-call-assembler.js'
export type { AssembledToolCall, AssemblyResult } from './agent/tool-call-assembler.js'

// Notifications and results
export type { AgentNotification, AgentListener, AgentResult, MessageDelta } from './types/agent.js'

// Error types
export {
  ToolError,
  ToolNotFoundError,
  ToolDisabledError,
  InvalidArgumentsError,
  MissingRequiredParameterError,
  ExecutionFailedError,
  TransportError,
  MaxToolCallsExceededError,
  ToolFailureLimitError,
  CancelledError,
  AlreadyRunningError,
  StaleProposalError,
  ConfigurationError,
} from './errors.js'
export type { ToolErrorCode } from './errors.js'

// JSON types
export type { JSONSchema, JSONValue } from './types/json.js'

// Messages
export { Message } from './types/messages.js'
export type { Role, StopReason, ToolCallReference, MessageData } from './types/messages.js'

// Configuration
export { loadSettings } from './config/settings.js'
export type { LoadSettingsOptions } from './config/settings.js'
export { SettingsSchema, AgentConfigSchema } from './config/schema.js'
export type {
  ApprovalMode,
  AgentConfig,
  AgentConfigInput,
  ModelSettings,
  ToolSettings,
  Settings,
} from './config/schema.js'

// Approval
export { PolicyApprovalGate, decideApproval } from './approval/approval-gate.js'
export type { ApprovalGate, ApprovalDecision } from './approval/approval-gate.js'

// Conversation
export { InMemoryConversationStore } from './conversation/conversation-store.js'
export type { ConversationStore } from './conversation/conversation-store.js'

// Tools
export type { Tool, ToolSpec, ToolUse, ToolContext } from './tools/tool.js'
export { tool } from './tools/zod-tool.js'
export type { ToolConfig, ToolOutput, ToolInputSchema } from './tools/zod-tool.js'
export { RegistryToolExecutor, parseToolArguments } from './tools/executor.js'
export type { ToolExecutor, ExecuteOptions } from './tools/executor.js'
export { ToolRegistry } from './registry/tool-registry.js'
export { createDefaultToolRegistry } from './registry/default-tools.js'

// Vended tools
export { createFileSystemTools, FileSystemError } from './vended-tools/file_system/index.js'
export type { FileSystemToolsOptions, DirectoryEntry } from './vended-tools/file_system/index.js'
export { createWebSearchTool } from './vended-tools/web_search/index.js'
export type { WebSearchToolOptions, SearchResult } from './vended-tools/web_search/index.js'

// Streaming event types
export type {
  Usage,
  Metrics,
  ModelMessageStartEvent,
  ToolUseStart,
  ContentBlockStart,
  ModelContentBlockStartEvent,
  TextDelta,
  ToolUseInputDelta,
  ContentBlockDelta,
  ModelContentBlockDeltaEvent,
  ModelContentBlockStopEvent,
  ModelMessageStopEvent,
  ModelMetadataEvent,
  ModelStreamEvent,
} from './models/streaming.js'

// Model gateways
export type { ModelGateway, StreamOptions } from './models/model.js'
export { BedrockModel } from './models/bedrock.js'
export type { BedrockModelConfig, BedrockModelOptions, BedrockTransport } from './models/bedrock.js'
export { OpenRouterModel } from './models/openrouter.js'
export type { OpenRouterModelOptions } from './models/openrouter.js'

// Prompts and logging
export { BASE_SYSTEM_PROMPT, buildSystemPrompt } from './prompts/system-prompt.js'
export { createLogger, setLogLevel } from './logging/logger.js'
export type { Logger } from './logging/logger.js'
