// OpenAI-compatible Provider
// DeepSeek, Moonshot and OpenAI all accept the same chat/completions payload
// with function calling.

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  id: z.string().optional(),
                  function: z.object({
                    name: z.string(),
                    arguments: z.string().optional(),
                  }),
                }),
              )
              .nullish(),
          })
          .optional(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export interface OpenAICompatibleConfig {
  name: string;
  baseUrl: string;
  apiKey: string;
  defaultModel: string;
}

export class OpenAICompatibleProvider implements Provider {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly defaultModel: string;

  constructor(config: OpenAICompatibleConfig) {
    if (!config.apiKey) {
      throw new Error(`${config.name} API key not configured`);
    }
    this.name = config.name;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.defaultModel = config.defaultModel;
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const hasTools = (options.tools?.length ?? 0) > 0;
    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: options.model || this.defaultModel,
        messages,
        max_tokens: options.maxTokens ?? 4096,
        temperature: options.temperature ?? 0.2,
        stream: false,
        tools: hasTools ? options.tools : undefined,
        tool_choice: hasTools ? (options.tool_choice ?? 'auto') : undefined,
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.name} API error (${response.status}): ${error}`);
    }

    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`${this.name} API returned an unexpected payload: ${parsed.error.message}`);
    }

    const data = parsed.data;
    const message = data.choices[0]?.message;

    return {
      content: message?.content ?? '',
      toolCalls: (message?.tool_calls ?? []).map(call => ({
        id: call.id || `call_${randomUUID()}`,
        type: 'function' as const,
        function: {
          name: call.function.name,
          arguments: call.function.arguments ?? '{}',
        },
      })),
      usage: {
        promptTokens: data.usage?.prompt_tokens ?? 0,
        completionTokens: data.usage?.completion_tokens ?? 0,
        totalTokens: data.usage?.total_tokens ?? 0,
      },
    };
  }
}
