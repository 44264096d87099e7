// Adapts a chat completion provider to the orchestrator's InferenceBackend

import { getLogger, type Logger } from '../logger.js';
import { parseJsonObject } from '../utils/json-value.js';
import { toOpenAIFunction } from '../services/tools/registry.js';
import { parseToolCallsFromResponse } from '../services/orchestrator/parser.js';
import type {
  AIResponse,
  ChatMessage,
  InferenceBackend,
  InferenceRequest,
  ToolCall,
} from '../services/orchestrator/types.js';
import type { Provider, ProviderMessage, ProviderToolCall } from './types.js';

export interface ProviderInferenceBackendOptions {
  provider: Provider;
  model: string;
  maxTokens?: number;
  temperature?: number;
  logger?: Logger;
}

export function toProviderMessages(messages: ChatMessage[], context: string): ProviderMessage[] {
  const mapped: ProviderMessage[] = [];
  if (context.trim()) {
    mapped.push({ role: 'system', content: context });
  }

  for (const message of messages) {
    if (message.role === 'tool') {
      // Placeholders never reach the model; only terminal results do
      if (!message.tool || message.tool.status === 'executing') continue;
      mapped.push({
        role: 'tool',
        content: message.content,
        tool_call_id: message.tool.toolCallId,
        name: message.tool.toolName,
      });
      continue;
    }

    if (message.role === 'assistant' && message.toolCalls?.length) {
      mapped.push({
        role: 'assistant',
        content: message.content,
        tool_calls: message.toolCalls.map(call => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: JSON.stringify(call.arguments) },
        })),
      });
      continue;
    }

    mapped.push({ role: message.role, content: message.content });
  }

  return mapped;
}

export class ProviderInferenceBackend implements InferenceBackend {
  private readonly provider: Provider;
  private readonly model: string;
  private readonly maxTokens?: number;
  private readonly temperature?: number;
  private readonly logger: Logger;

  constructor(options: ProviderInferenceBackendOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.logger = options.logger ?? getLogger('inference-backend');
  }

  async send(request: InferenceRequest): Promise<AIResponse> {
    const response = await this.provider.sendChat(toProviderMessages(request.messages, request.context), {
      model: this.model,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      signal: request.signal,
      tools: request.tools.map(tool => ({ type: 'function' as const, function: toOpenAIFunction(tool) })),
    });

    this.logger.debug(
      { provider: this.provider.name, mode: request.mode, usage: response.usage, toolCalls: response.toolCalls.length },
      'Inference response received',
    );

    let toolCalls = response.toolCalls.map(call => this.toToolCall(call));
    if (toolCalls.length === 0 && request.tools.length > 0 && response.content) {
      toolCalls = parseToolCallsFromResponse(response.content, request.tools.map(tool => tool.name));
    }

    return {
      content: response.content,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
    };
  }

  private toToolCall(call: ProviderToolCall): ToolCall {
    const parsed = parseJsonObject(call.function.arguments);
    if (!parsed) {
      this.logger.warn(
        { toolCallId: call.id, tool: call.function.name, raw: call.function.arguments.slice(0, 200) },
        'Tool call arguments are not a JSON object; using {}',
      );
    }
    return { id: call.id, name: call.function.name, arguments: parsed ?? {} };
  }
}
