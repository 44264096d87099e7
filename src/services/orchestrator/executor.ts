// Tool Executor
// Resolves, schedules and supervises the tool calls of one model response

import { getLogger, type Logger } from '../../logger.js';
import {
  errorMessage,
  ToolCancelledError,
  ToolExecutionCrashError,
  ToolNotFoundError,
} from '../../utils/errors.js';
import type { ToolContext, ToolDefinition } from '../tools/types.js';
import { ToolScheduler } from '../scheduler/tool-scheduler.js';
import { clampToolTimeoutSeconds, ToolTimeoutCenter } from '../watchdog/tool-timeout-center.js';
import { appendSafely, noopConversationLog, type ConversationLogSink } from '../conversation/conversation-log.js';
import { ToolArgumentResolver } from './argument-resolver.js';
import { makeToolExecutionMessage, type ToolMessageInput } from './messages.js';
import { buildToolPreview } from './tool-preview.js';
import type { ChatMessage, ProgressCallback, ToolCall } from './types.js';

/** Names models use for our tools, tried in order after an exact match fails. */
export const TOOL_ALIASES: ReadonlyMap<string, readonly string[]> = new Map([
  ['read', ['read_file']],
  ['file_read', ['read_file']],
  ['write', ['write_file', 'write_files']],
  ['fs_write_file', ['write_file']],
  ['edit', ['replace_in_file']],
  ['edit_file', ['replace_in_file']],
  ['replace', ['replace_in_file']],
  ['fs_edit_file', ['replace_in_file']],
  ['delete', ['delete_file']],
  ['run', ['run_command']],
  ['bash', ['run_command']],
  ['shell', ['run_command']],
  ['shell_exec', ['run_command']],
  ['search', ['grep']],
  ['fs_grep', ['grep']],
  ['plan', ['planner']],
]);

function normalizeToolName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s.-]+/g, '_');
}

export function resolveTool(name: string, tools: readonly ToolDefinition[]): ToolDefinition | undefined {
  const byName = new Map(tools.map(tool => [tool.name, tool]));

  const exact = byName.get(name);
  if (exact) return exact;

  for (const candidate of TOOL_ALIASES.get(name) ?? []) {
    const aliased = byName.get(candidate);
    if (aliased) return aliased;
  }

  const normalized = normalizeToolName(name);
  const loose = tools.find(tool => normalizeToolName(tool.name) === normalized);
  if (loose) return loose;

  for (const candidate of TOOL_ALIASES.get(normalized) ?? []) {
    const aliased = byName.get(candidate);
    if (aliased) return aliased;
  }

  return undefined;
}

const READ_FILE_HINT =
  'Hint: do not guess filenames. First use grep(...) to discover the correct path, then call read_file with that exact path.';

export function formatToolError(toolName: string, error: unknown): string {
  const message = errorMessage(error).trim();
  if (toolName === 'read_file' && message.toLowerCase().startsWith('file not found')) {
    return `${message}\n\n${READ_FILE_HINT}`;
  }
  return message;
}

export interface ToolExecutorOptions {
  workspaceRoot: string;
  scheduler?: ToolScheduler;
  timeoutCenter?: ToolTimeoutCenter;
  argumentResolver?: ToolArgumentResolver;
  timeoutSeconds?: number;
  log?: ConversationLogSink;
  logger?: Logger;
}

export interface ExecuteBatchRequest {
  toolCalls: ToolCall[];
  availableTools: readonly ToolDefinition[];
  conversationId?: string;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

interface CallScope {
  conversationId?: string;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
  targetFile?: string;
  preview?: string;
}

export class ToolExecutor {
  readonly scheduler: ToolScheduler;
  readonly timeoutCenter: ToolTimeoutCenter;
  readonly resolver: ToolArgumentResolver;
  private readonly timeoutSeconds: number;
  private readonly log: ConversationLogSink;
  private readonly logger: Logger;

  constructor(options: ToolExecutorOptions) {
    this.scheduler = options.scheduler ?? new ToolScheduler();
    this.timeoutCenter = options.timeoutCenter ?? new ToolTimeoutCenter();
    this.resolver = options.argumentResolver ?? new ToolArgumentResolver({ workspaceRoot: options.workspaceRoot });
    this.timeoutSeconds = clampToolTimeoutSeconds(options.timeoutSeconds);
    this.log = options.log ?? noopConversationLog;
    this.logger = options.logger ?? getLogger('tool-executor');
  }

  /** One terminal message per call, in request order. */
  async executeBatch(request: ExecuteBatchRequest): Promise<ChatMessage[]> {
    const ids = request.toolCalls.map(call => call.id);
    this.timeoutCenter.track(ids);
    try {
      return await Promise.all(request.toolCalls.map(call => this.executeScheduled(call, request)));
    } finally {
      this.timeoutCenter.release(ids);
    }
  }

  private async executeScheduled(call: ToolCall, request: ExecuteBatchRequest): Promise<ChatMessage> {
    const tool = resolveTool(call.name, request.availableTools);
    const toolName = tool?.name ?? call.name;
    const targetFile = this.resolver.resolveTargetFile(toolName, call.arguments);
    const preview = buildToolPreview(toolName, call.arguments);
    const base = { toolName, toolCallId: call.id, targetFile, preview };

    const emit = (input: Omit<ToolMessageInput, keyof typeof base>): ChatMessage => {
      const message = makeToolExecutionMessage({ ...base, ...input });
      request.onProgress?.(message);
      return message;
    };

    emit({ status: 'executing', content: `Executing ${toolName}...` });

    if (!tool) {
      this.logger.warn({ toolCallId: call.id, tool: call.name }, 'Tool not found');
      await appendSafely(this.log, {
        type: 'tool.not_found',
        conversationId: request.conversationId,
        data: { toolCallId: call.id, toolName: call.name },
      });
      return emit({ status: 'failed', content: new ToolNotFoundError(call.name).message });
    }

    const scope: CallScope = {
      conversationId: request.conversationId,
      onProgress: request.onProgress,
      signal: request.signal,
      targetFile,
      preview,
    };
    const run = () => this.executeToolCall(tool, call, scope);

    try {
      const result = tool.kind === 'write'
        ? await this.scheduler.runWrite(this.resolver.pathKey(toolName, targetFile), run, request.signal)
        : await this.scheduler.runRead(run, request.signal);
      request.onProgress?.(result);
      return result;
    } catch (error) {
      // Only reachable when the batch was aborted while waiting for a slot.
      return emit({ status: 'failed', content: formatToolError(toolName, error) });
    }
  }

  /** Runs one resolved call under the watchdog. Never throws. */
  async executeToolCall(tool: ToolDefinition, call: ToolCall, scope: CallScope = {}): Promise<ChatMessage> {
    const { conversationId, onProgress, signal, targetFile, preview } = scope;
    const args = this.resolver.buildMergedArguments(call, tool.name, conversationId);
    const startedAt = Date.now();
    const logData = { toolCallId: call.id, toolName: tool.name, targetFile };

    const message = (status: 'executing' | 'completed' | 'failed', content: string) =>
      makeToolExecutionMessage({ content, status, toolName: tool.name, toolCallId: call.id, targetFile, preview });

    // Cancelled while queued for a slot
    if (this.timeoutCenter.isCancelled(call.id)) {
      this.logger.info(logData, 'Tool cancelled before it started');
      await appendSafely(this.log, { type: 'tool.cancelled', conversationId, data: logData });
      return message('failed', new ToolCancelledError(tool.name).message);
    }

    this.timeoutCenter.begin(call.id, tool.name, targetFile, this.timeoutSeconds);
    const toolController = new AbortController();
    const cancelOnAbort = () => this.timeoutCenter.cancel(call.id);
    if (signal?.aborted) {
      cancelOnAbort();
    }
    signal?.addEventListener('abort', cancelOnAbort, { once: true });

    this.logger.info(logData, 'Tool started');
    await appendSafely(this.log, { type: 'tool.start', conversationId, data: logData });

    try {
      const context: ToolContext = {
        toolCallId: call.id,
        conversationId,
        workspaceRoot: this.resolver.workspaceRoot,
        signal: toolController.signal,
      };

      let accumulated = '';
      const execution = tool.executeWithProgress
        ? tool.executeWithProgress(args, context, (chunk) => {
            accumulated += chunk;
            this.timeoutCenter.markProgress(call.id);
            this.logger.debug({ ...logData, bytes: accumulated.length }, 'Tool progress');
            onProgress?.(message('executing', accumulated));
          })
        : tool.execute(args, context);

      const output = await this.supervise(execution, call.id, toolController);
      if (!output.trim()) {
        throw new ToolExecutionCrashError(tool.name);
      }

      const durationMs = Date.now() - startedAt;
      this.logger.info({ ...logData, durationMs }, 'Tool completed');
      await appendSafely(this.log, { type: 'tool.success', conversationId, data: { ...logData, durationMs } });
      return message('completed', output);
    } catch (error) {
      const text = formatToolError(tool.name, error);
      const durationMs = Date.now() - startedAt;
      this.logger.warn({ ...logData, durationMs, err: error }, 'Tool failed');
      await appendSafely(this.log, {
        type: 'tool.error',
        conversationId,
        data: { ...logData, durationMs, error: text },
      });
      return message('failed', text);
    } finally {
      signal?.removeEventListener('abort', cancelOnAbort);
      this.timeoutCenter.finish(call.id);
    }
  }

  /**
   * Settles with the tool's result, or rejects with the watchdog's
   * interruption. An interrupted tool has its signal aborted.
   */
  private supervise(execution: Promise<string>, toolCallId: string, toolController: AbortController): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const stop = new AbortController();

      void this.timeoutCenter.supervise(toolCallId, stop.signal).then((interruption) => {
        if (!interruption) return;
        toolController.abort(interruption);
        reject(interruption);
      }, reject);

      execution.then(
        (output) => {
          stop.abort();
          resolve(output);
        },
        (error: unknown) => {
          stop.abort();
          reject(error);
        },
      );
    });
  }
}
