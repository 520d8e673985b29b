#!/usr/bin/env tsx
import './load-env.js';

import { ensureVirtualEnv, loadRunnerConfig } from '@pyloop/code-runner';
import { Logger } from '@pyloop/shared/Utils/logger.js';
import { AuthError, ConfigurationError } from '@pyloop/shared/Types/errors.js';
import { loadConfig } from './config.js';
import { ensureCredential } from './llm/credentials.js';
import { ModelFactory } from './llm/factory.js';
import { ConversationSession } from './chat/session.js';
import { loadSystemPrompt } from './chat/system-prompt.js';
import { ConsoleIO } from './loop/console-io.js';
import { PythonExecutor } from './loop/code-executor.js';
import { InteractionLoop } from './loop/interaction-loop.js';

const logger = new Logger('pyloop');

/**
 * Wire config, model, toolchain and terminal together and run the loop.
 * Resolves the process exit code.
 */
async function main(): Promise<number> {
  const io = new ConsoleIO();

  try {
    io.print('Setting up pyloop...');
    const config = await ensureCredential(loadConfig(), (question) => io.prompt(question));
    const runnerConfig = loadRunnerConfig();

    const models = new ModelFactory(config);
    // Resolve the model now so a missing key fails before the first prompt
    models.getModel();
    const { provider, model } = models.getProviderInfo();

    const toolchain = await ensureVirtualEnv(runnerConfig);
    io.print(
      toolchain.venvDir
        ? `Virtual environment ${toolchain.created ? 'created' : 'found'} at '${toolchain.venvDir}'.`
        : `Running code with '${toolchain.python}' (no virtual environment).`,
    );

    const session = new ConversationSession(models, {
      systemPrompt: loadSystemPrompt(config.systemPromptPath),
      temperature: config.temperature,
      topP: config.topP,
      maxRetries: config.maxRetries,
      requestTimeoutMs: config.requestTimeoutMs,
    });
    io.print(`Connected to ${provider} (${model}).`);

    const loop = new InteractionLoop(session, new PythonExecutor(toolchain, runnerConfig), io, {
      maxFixAttempts: config.maxFixAttempts,
      truncation: {
        maxChars: runnerConfig.maxOutputChars,
        head: runnerConfig.truncationHead,
        tail: runnerConfig.truncationTail,
      },
    });
    await loop.run();
    return 0;
  } catch (error) {
    if (error instanceof AuthError || error instanceof ConfigurationError) {
      io.print(`Error: ${error.message}`);
      logger.error(`Fatal ${error.name}`, { code: error.code, details: error.details });
      return 1;
    }
    throw error;
  } finally {
    io.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected error, ending the session', error);
    process.exit(1);
  });
