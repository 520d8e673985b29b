/**
 * Literal commands recognised at the prompt. Everything else is chat.
 */

export const EXIT_COMMANDS: readonly string[] = ['exit', 'quit', 'bye'];

export type Command =
  | { kind: 'exit' }
  | { kind: 'clear' }
  | { kind: 'empty' }
  | { kind: 'upload'; path: string; prompt: string | null }
  | { kind: 'upload_usage' }
  | { kind: 'message'; text: string };

const UPLOAD_PREFIX = 'upload';
const PROMPT_SEPARATOR = ' with prompt ';

function stripQuotes(path: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(path);
  return quoted ? quoted[2] : path;
}

function parseUpload(args: string): Command {
  const separator = args.toLowerCase().indexOf(PROMPT_SEPARATOR);
  const rawPath = separator === -1 ? args : args.slice(0, separator);
  const rawPrompt = separator === -1 ? '' : args.slice(separator + PROMPT_SEPARATOR.length);

  const path = stripQuotes(rawPath.trim());
  if (!path) return { kind: 'upload_usage' };

  const prompt = rawPrompt.trim();
  return { kind: 'upload', path, prompt: prompt || null };
}

export function parseCommand(input: string): Command {
  const text = input.trim();
  const lower = text.toLowerCase();

  if (!text) return { kind: 'empty' };
  if (EXIT_COMMANDS.includes(lower)) return { kind: 'exit' };
  if (lower === 'clear') return { kind: 'clear' };

  if (lower === UPLOAD_PREFIX) return { kind: 'upload_usage' };
  if (lower.startsWith(`${UPLOAD_PREFIX} `)) {
    // Leading space kept so an immediate "with prompt" still splits
    return parseUpload(text.slice(UPLOAD_PREFIX.length));
  }

  return { kind: 'message', text };
}
