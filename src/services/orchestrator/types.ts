// Orchestrator Types

import type { JsonObject } from '../../utils/json-value.js';
import type { ToolDefinition } from '../tools/types.js';

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export type ToolExecutionStatus = 'executing' | 'completed' | 'failed';

export type AIMode = 'chat' | 'agent';

export interface ToolCall {
  id: string;
  name: string;
  arguments: JsonObject;
}

export interface ToolMessageContext {
  toolName: string;
  status: ToolExecutionStatus;
  targetFile?: string;
  toolCallId: string;
}

export interface ChatMessage {
  id: string;
  role: MessageRole;
  content: string;
  reasoning?: string;
  toolCalls?: ToolCall[];
  tool?: ToolMessageContext;
  createdAt: string;
}

export interface AIResponse {
  content?: string;
  toolCalls?: ToolCall[];
}

export interface InferenceRequest {
  messages: ChatMessage[];
  /** Augmented context, rebuilt for each attempt. */
  context: string;
  tools: ToolDefinition[];
  mode: AIMode;
  signal?: AbortSignal;
}

/** Remote model backend. Treated as a black box that can fail. */
export interface InferenceBackend {
  send(request: InferenceRequest): Promise<AIResponse>;
}

export type ProgressCallback = (message: ChatMessage) => void;
