/**
 * The read → send → extract → run → report loop.
 *
 * States: awaiting_input → processing → reporting → awaiting_input, with
 * `exited` as the terminal state. TransportErrors are reported and the loop
 * continues; AuthError and anything unexpected propagate out of `run()`.
 * Failed code never ends the session: its output goes back to the model.
 */

import type { ExecutionResult, TruncateConfig } from '@pyloop/code-runner';
import { Logger } from '@pyloop/shared/Utils/logger.js';
import { TransportError } from '@pyloop/shared/Types/errors.js';
import type { ChatSession } from '../chat/session.js';
import type { Message } from '../chat/types.js';
import { extractCodeBlocks } from '../chat/extractor.js';
import { parseCommand } from './commands.js';
import type { CodeExecutor } from './code-executor.js';
import type { LoopIO } from './console-io.js';
import {
  buildFixRequest,
  buildFollowUp,
  formatResultForDisplay,
  type BlockReport,
  type FeedbackOptions,
} from './feedback.js';
import { UploadError, buildUploadMessage, type UploadedFile } from './upload.js';

const logger = new Logger('pyloop:loop');

export type LoopState = 'awaiting_input' | 'processing' | 'reporting' | 'exited';

export interface LoopOptions {
  /** Fix requests per failed block; 0 disables the fix loop */
  maxFixAttempts: number;
  truncation: TruncateConfig;
  /** Directory `upload` paths are resolved against */
  cwd?: string;
}

export const WELCOME_TEXT = `
╔══════════════════════════════════════════════════════════╗
║                                                          ║
║   pyloop: chat with a model that runs its own Python     ║
║                                                          ║
║   - Ask any question or request code solutions           ║
║   - Python code blocks are executed automatically        ║
║   - Type 'upload <filepath> with prompt <your prompt>'   ║
║     to send a file to the model with instructions        ║
║   - Type 'exit', 'quit', or 'bye' to end the session     ║
║   - Type 'clear' to clear the conversation history       ║
║                                                          ║
╚══════════════════════════════════════════════════════════╝
`;

export const UPLOAD_USAGE = 'Please specify a file path. Usage: upload <filepath> [with prompt <your prompt>]';

const RULE = '='.repeat(60);

export class InteractionLoop {
  private state: LoopState = 'awaiting_input';
  private readonly session: ChatSession;
  private readonly executor: CodeExecutor;
  private readonly io: LoopIO;
  private readonly options: LoopOptions;

  constructor(session: ChatSession, executor: CodeExecutor, io: LoopIO, options: LoopOptions) {
    this.session = session;
    this.executor = executor;
    this.io = io;
    this.options = options;
  }

  getState(): LoopState {
    return this.state;
  }

  async run(): Promise<void> {
    this.io.print(WELCOME_TEXT);

    while (this.state !== 'exited') {
      this.state = 'awaiting_input';
      const input = await this.io.prompt('You: ');
      if (input === null) {
        this.exit();
        break;
      }
      await this.handleInput(input);
    }
  }

  /**
   * Handle one line of user input
   */
  async handleInput(input: string): Promise<void> {
    const command = parseCommand(input);

    switch (command.kind) {
      case 'empty':
        return;
      case 'exit':
        this.exit();
        return;
      case 'clear':
        this.session.clear();
        this.io.clearScreen();
        this.io.print(WELCOME_TEXT);
        this.io.print('Chat history cleared.');
        return;
      case 'upload_usage':
        this.io.print(UPLOAD_USAGE);
        return;
      case 'upload':
        await this.handleUpload(command.path, command.prompt);
        return;
      case 'message':
        await this.process(command.text);
        return;
    }
  }

  private exit(): void {
    this.state = 'exited';
    this.io.print('Goodbye!');
  }

  private async handleUpload(path: string, prompt: string | null): Promise<void> {
    let upload: UploadedFile;
    try {
      upload = await buildUploadMessage(path, prompt, this.options.cwd);
    } catch (error) {
      if (error instanceof UploadError) {
        this.io.print(error.message);
        return;
      }
      throw error;
    }

    this.io.print(`Uploading ${upload.name} (${upload.mimeType}) with prompt: ${prompt ?? 'No specific prompt'}`);
    await this.process(upload.message, upload.name);
  }

  private async process(input: string | Message, fileName?: string): Promise<void> {
    this.state = 'processing';
    try {
      await this.converse(input, { truncation: this.options.truncation, fileName });
    } catch (error) {
      if (!(error instanceof TransportError)) throw error;
      logger.warn(`Model call failed: ${error.message}`);
      this.io.print(`Error communicating with the model: ${error.message}`);
    } finally {
      this.state = 'awaiting_input';
    }
  }

  private async converse(input: string | Message, feedback: FeedbackOptions): Promise<void> {
    this.io.print('AI thinking...');
    const reply = await this.session.send(input);
    this.report(reply);

    const blocks = extractCodeBlocks(reply);
    if (blocks.length === 0) return;

    this.state = 'processing';
    const reports: BlockReport[] = [];
    for (const block of blocks) {
      reports.push(await this.runWithFixes(block.source, feedback));
    }

    const commentary = await this.session.send(buildFollowUp(reports, feedback));
    this.report(commentary);
  }

  private report(text: string): void {
    this.state = 'reporting';
    this.io.print(`AI: ${text}`);
  }

  /**
   * Run a block; while it fails (not on timeout), ask the model for a fix
   */
  private async runWithFixes(source: string, feedback: FeedbackOptions): Promise<BlockReport> {
    const max = this.options.maxFixAttempts;
    let code = source;
    let result = await this.runBlock(code, 0);
    let fixAttempts = 0;

    while (result.outcome === 'failed' && fixAttempts < max) {
      this.io.print(
        `Code execution failed. Asking the model to fix the error (retry ${fixAttempts + 1}/${max})...`,
      );
      this.state = 'processing';
      const fixReply = await this.session.send(buildFixRequest(result, feedback));
      this.report(fixReply);

      const [fixed] = extractCodeBlocks(fixReply);
      if (!fixed) {
        this.io.print("The model didn't provide a fixed code block. Aborting retry attempts.");
        break;
      }

      fixAttempts++;
      this.state = 'processing';
      code = fixed.source;
      result = await this.runBlock(code, fixAttempts);
    }

    return { code, result, fixAttempts };
  }

  private async runBlock(source: string, retry: number): Promise<ExecutionResult> {
    const timeoutSeconds = Math.round(this.executor.timeoutMs / 1000);
    this.io.print(`Executing code${retry > 0 ? ` (retry #${retry})` : ''} with a ${timeoutSeconds} second timeout...`);
    this.io.print(`${RULE}\n${source}\n${RULE}`);

    const { result, installs } = await this.executor.execute(source);

    for (const install of installs) {
      this.io.print(
        install.success
          ? `Installed ${install.package}.`
          : `Failed to install ${install.package}:\n${install.output}`,
      );
    }
    this.io.print(formatResultForDisplay(result, this.executor.timeoutMs));
    return result;
  }
}
