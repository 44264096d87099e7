// AI Interaction Gateway
// Sends the transcript to the inference backend with a fixed retry policy.

import { getLogger, type Logger } from '../../logger.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import { errorMessage, InferenceError } from '../../utils/errors.js';
import type { ToolDefinition } from '../tools/types.js';
import type { ContextBuilder } from './context-builder.js';
import type { AIMode, AIResponse, ChatMessage, InferenceBackend } from './types.js';

export const MAX_ATTEMPTS = 3;
export const RETRY_DELAY_MS = 2000;

export interface SendRequest {
  messages: ChatMessage[];
  explicitContext?: string;
  tools: ToolDefinition[];
  mode: AIMode;
  projectRoot: string;
  signal?: AbortSignal;
  /** Label for logs, e.g. the orchestration phase. */
  stage?: string;
}

export interface AIInteractionGatewayOptions {
  backend: InferenceBackend;
  contextBuilder: ContextBuilder;
  clock?: Clock;
  logger?: Logger;
}

function latestUserInput(messages: ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') return messages[i].content;
  }
  return '';
}

export class AIInteractionGateway {
  private readonly backend: InferenceBackend;
  private readonly contextBuilder: ContextBuilder;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: AIInteractionGatewayOptions) {
    this.backend = options.backend;
    this.contextBuilder = options.contextBuilder;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? getLogger('ai-gateway');
  }

  /**
   * Up to three attempts with a fixed two-second pause between them. The
   * augmented context is rebuilt for every attempt.
   */
  async sendWithRetry(request: SendRequest): Promise<AIResponse> {
    const userInput = latestUserInput(request.messages);
    let lastError: unknown;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      request.signal?.throwIfAborted();

      try {
        const context = await this.contextBuilder.build({
          userInput,
          explicitContext: request.explicitContext,
          projectRoot: request.projectRoot,
        });

        return await this.backend.send({
          messages: request.messages,
          context,
          tools: request.tools,
          mode: request.mode,
          signal: request.signal,
        });
      } catch (error) {
        lastError = error;
        if (request.signal?.aborted) {
          throw error;
        }

        this.logger.warn(
          { attempt, maxAttempts: MAX_ATTEMPTS, stage: request.stage, err: error },
          'Inference request failed',
        );

        if (attempt < MAX_ATTEMPTS) {
          await this.clock.sleep(RETRY_DELAY_MS, request.signal);
        }
      }
    }

    throw new InferenceError(
      `Inference failed after ${MAX_ATTEMPTS} attempts: ${errorMessage(lastError)}`,
      MAX_ATTEMPTS,
      { cause: lastError },
    );
  }
}
