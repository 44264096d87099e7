import type { JsonObject } from '../../utils/json-value.js';
import { CommandNotAllowedError } from '../../utils/errors.js';
import type { ToolDefinition } from '../tools/types.js';

export function validateAllowlistedCommand(args: JsonObject, prefixes: readonly string[]): string {
  const raw = args.command;
  if (raw === undefined || raw === null) {
    throw new CommandNotAllowedError("Missing 'command' argument for run_command");
  }
  const command = typeof raw === 'string' ? raw.trim() : '';
  if (!command) {
    throw new CommandNotAllowedError("Invalid 'command' for run_command (empty)");
  }
  if (!prefixes.some(prefix => command.startsWith(prefix))) {
    throw new CommandNotAllowedError(
      `Command is not allowlisted for verify. Allowed prefixes: ${prefixes.join(', ')}`,
    );
  }
  return command;
}

/**
 * Wraps the command tool so only commands starting with one of `prefixes`
 * ever reach it.
 */
export function createAllowlistedCommandTool(base: ToolDefinition, prefixes: readonly string[]): ToolDefinition {
  const wrapped: ToolDefinition = {
    name: base.name,
    kind: base.kind,
    parameters: base.parameters,
    description: `${base.description} Only commands starting with one of these prefixes are accepted: ${prefixes.join(', ')}.`,
    execute: async (args, context) => {
      validateAllowlistedCommand(args, prefixes);
      return base.execute(args, context);
    },
  };

  if (base.executeWithProgress) {
    wrapped.executeWithProgress = async (args, context, onChunk) => {
      validateAllowlistedCommand(args, prefixes);
      if (!base.executeWithProgress) return base.execute(args, context);
      return base.executeWithProgress(args, context, onChunk);
    };
  }

  return wrapped;
}
