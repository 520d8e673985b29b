import { readFileSync } from 'node:fs';
import { ConfigurationError, errorMessage } from '@pyloop/shared/Types/errors.js';

export const DEFAULT_SYSTEM_PROMPT = `You are a coding assistant in a terminal. Help with programming tasks by giving short, runnable Python solutions.

When a request involves code:
1. Put the complete Python solution in a single \`\`\`python fenced block. Every \`\`\`python block in your reply is executed automatically, in order, and you will be shown the output.
2. Briefly explain what the code does after the block.
3. Use other fence tags (\`\`\`text, \`\`\`bash, ...) for anything that must not be executed.

Executed code runs non-interactively: it cannot read from stdin, and it is stopped when it exceeds the time limit.

Uploaded files arrive inside the user's message together with their instructions. Answer from the file content and those instructions.

You cannot create, open or change files on the user's system yourself. When asked for something you cannot do directly, such as producing a PDF, say so and, where possible, offer Python code that achieves it.

For questions that are not about programming, answer as a helpful assistant.`;

/**
 * The system prompt from a file when one is configured, else the built-in one
 *
 * @throws ConfigurationError when the configured file cannot be read
 */
export function loadSystemPrompt(path?: string): string {
  if (!path) return DEFAULT_SYSTEM_PROMPT;
  try {
    const prompt = readFileSync(path, 'utf-8').trim();
    if (!prompt) {
      throw new ConfigurationError(`System prompt file is empty: ${path}`);
    }
    return prompt;
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(`Cannot read system prompt file ${path}: ${errorMessage(error)}`);
  }
}
