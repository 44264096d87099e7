// Provider Interface
// Common interface for OpenAI-compatible chat completion backends

import type { OpenAIFunctionDef } from '../services/tools/registry.js';

export interface ProviderToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

export interface ProviderTool {
  type: 'function';
  function: OpenAIFunctionDef;
}

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system' | 'tool';
  content: string;
  tool_calls?: ProviderToolCall[]; // For assistant messages with tool calls
  tool_call_id?: string; // For tool result messages
  name?: string; // Tool name for tool messages
}

export interface ProviderOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  tools?: ProviderTool[];
  tool_choice?: 'auto' | 'none';
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ProviderResponse {
  content: string;
  toolCalls: ProviderToolCall[];
  usage: ProviderUsage;
}

export interface Provider {
  name: string;
  sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse>;
}
