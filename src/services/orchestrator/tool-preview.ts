// Human-readable preview of what a tool call is about to do.
// Derived from the arguments alone, so it is the same whatever the outcome.

import type { JsonObject } from '../../utils/json-value.js';
import { isJsonObject, numberArg, stringArg } from '../../utils/json-value.js';

const MAX_EXCERPT_LINES = 12;
const MAX_EXCERPT_CHARS = 600;

export function excerpt(text: string): string {
  const lines = text.split('\n');
  let result = lines.slice(0, MAX_EXCERPT_LINES).join('\n');
  let cut = lines.length > MAX_EXCERPT_LINES;
  if (result.length > MAX_EXCERPT_CHARS) {
    result = result.slice(0, MAX_EXCERPT_CHARS);
    cut = true;
  }
  return cut ? `${result}…` : result;
}

function pathOf(args: JsonObject): string {
  return stringArg(args, 'path', 'target_path', 'file_path') ?? '(unspecified path)';
}

export function buildToolPreview(toolName: string, args: JsonObject): string | undefined {
  switch (toolName) {
    case 'replace_in_file': {
      const before = args.old_text ?? args.search;
      const after = args.new_text ?? args.replace;
      return [
        `Proposed edit: ${pathOf(args)}`,
        '--- before',
        excerpt(typeof before === 'string' ? before : ''),
        '+++ after',
        excerpt(typeof after === 'string' ? after : ''),
      ].join('\n');
    }
    case 'write_file':
    case 'create_file': {
      const content = args.content;
      return [
        `Proposed write: ${pathOf(args)}`,
        '+++ after',
        excerpt(typeof content === 'string' ? content : ''),
      ].join('\n');
    }
    case 'write_files': {
      const files = Array.isArray(args.files) ? args.files : [];
      const paths = files.filter(isJsonObject).map(file => `- ${pathOf(file)}`);
      return [`Proposed writes (${files.length} files)`, ...paths].join('\n');
    }
    case 'delete_file':
      return `Proposed delete: ${pathOf(args)}`;
    case 'read_file': {
      const start = numberArg(args, 'start_line');
      const end = numberArg(args, 'end_line');
      const range = start !== undefined && end !== undefined ? `\nLines: ${start}-${end}` : '';
      return `Read file: ${pathOf(args)}${range}`;
    }
    case 'run_command': {
      const command = stringArg(args, 'command');
      return command ? `$ ${command}` : undefined;
    }
    case 'grep': {
      const pattern = stringArg(args, 'pattern', 'query') ?? '';
      return `Search: "${pattern}" in ${stringArg(args, 'path') ?? '.'}`;
    }
    default:
      return undefined;
  }
}
