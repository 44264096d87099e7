// Orchestrator Module - Main exports

export { AgentOrchestrator, buildVerifierTools, DEFAULT_ORCHESTRATOR_CONFIG, ORCHESTRATION_PHASES } from './orchestrator.js';
export type { AgentOrchestratorConfig, OrchestrationPhase, OrchestrationResult, OrchestratorEvent, PhaseReport } from './orchestrator.js';
export { ToolLoopRunner, MAX_TOOL_ITERATIONS, runBoundedToolLoop } from './tool-loop.js';
export type { ToolLoopResult, CorrectionKind } from './tool-loop.js';
export { ToolExecutor, resolveTool, TOOL_ALIASES } from './executor.js';
export { AIInteractionGateway } from './gateway.js';
export { ProjectContextBuilder, WorkspaceFileIndex } from './context-builder.js';
export type { ContextBuilder, ProjectIndex } from './context-builder.js';
export { ToolArgumentResolver } from './argument-resolver.js';
export { createMessage, decodeEnvelope, makeToolExecutionMessage } from './messages.js';
export type { ToolExecutionEnvelope } from './messages.js';
export { parseToolCallsFromResponse } from './parser.js';
export type { AIMode, AIResponse, ChatMessage, InferenceBackend, InferenceRequest, ToolCall } from './types.js';
