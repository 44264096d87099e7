import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { ChatMessage, MessageRole, ToolExecutionStatus } from './types.js';

export function createMessage(
  role: MessageRole,
  content: string,
  extras: Pick<ChatMessage, 'reasoning' | 'toolCalls' | 'tool'> = {},
): ChatMessage {
  const message: ChatMessage = {
    id: randomUUID(),
    role,
    content,
    createdAt: new Date().toISOString(),
  };
  if (extras.reasoning) message.reasoning = extras.reasoning;
  if (extras.toolCalls && extras.toolCalls.length > 0) message.toolCalls = extras.toolCalls;
  if (extras.tool) message.tool = extras.tool;
  return message;
}

export interface ToolExecutionEnvelope {
  status: ToolExecutionStatus;
  message: string;
  payload?: string;
  preview?: string;
  toolName: string;
  toolCallId: string;
  targetFile?: string;
}

const envelopeSchema = z.object({
  status: z.enum(['executing', 'completed', 'failed']),
  message: z.string(),
  payload: z.string().optional(),
  preview: z.string().optional(),
  toolName: z.string(),
  toolCallId: z.string(),
  targetFile: z.string().optional(),
});

export function decodeEnvelope(content: string): ToolExecutionEnvelope | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }
  const result = envelopeSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export interface ToolMessageInput {
  content: string;
  toolName: string;
  toolCallId: string;
  status: ToolExecutionStatus;
  targetFile?: string;
  preview?: string;
}

function envelopeText(status: ToolExecutionStatus, content: string): Pick<ToolExecutionEnvelope, 'message' | 'payload'> {
  const hasContent = content.trim().length > 0;
  switch (status) {
    case 'executing':
      return { message: 'Tool execution in progress.', payload: hasContent ? content : undefined };
    case 'completed':
      return hasContent
        ? { message: 'Tool completed successfully.', payload: content }
        : { message: 'Tool completed with no payload.' };
    case 'failed':
      return { message: hasContent ? content : 'Tool failed with no error details.' };
  }
}

/** Builds a tool message whose content is the JSON envelope. */
export function makeToolExecutionMessage(input: ToolMessageInput): ChatMessage {
  const envelope: ToolExecutionEnvelope = {
    status: input.status,
    ...envelopeText(input.status, input.content),
    toolName: input.toolName,
    toolCallId: input.toolCallId,
  };
  if (input.preview) envelope.preview = input.preview;
  if (input.targetFile) envelope.targetFile = input.targetFile;

  return createMessage('tool', JSON.stringify(envelope), {
    tool: {
      toolName: input.toolName,
      status: input.status,
      targetFile: input.targetFile,
      toolCallId: input.toolCallId,
    },
  });
}

