/**
 * Conversation session: the transcript plus the call to the remote model.
 *
 * The transcript is append-only between `clear()` calls. A failed call
 * leaves it exactly as it was before `send()`.
 */

import { APICallError, LoadAPIKeyError, RetryError, generateText, type LanguageModel } from 'ai';
import { Logger } from '@pyloop/shared/Utils/logger.js';
import { AuthError, BaseError, TransportError, errorMessage } from '@pyloop/shared/Types/errors.js';
import { createMessage, toCoreMessage, type Message } from './types.js';

const logger = new Logger('pyloop:session');

/**
 * What the interaction loop needs from a session
 */
export interface ChatSession {
  readonly history: readonly Message[];
  send(input: string | Message): Promise<string>;
  clear(): void;
}

export interface ModelSource {
  getModel(): LanguageModel;
}

export interface SessionOptions {
  systemPrompt: string;
  temperature?: number;
  topP?: number;
  /** Retries with exponential backoff, handled by the SDK */
  maxRetries?: number;
  /** Abort a single request after this long; no limit when unset */
  requestTimeoutMs?: number;
}

const AUTH_STATUS_CODES = new Set([401, 403]);

/**
 * Map SDK and network failures onto the session's error taxonomy
 */
export function toSessionError(error: unknown): BaseError {
  if (error instanceof BaseError) return error;

  // After exhausted retries the SDK wraps the last failure
  const cause = RetryError.isInstance(error) ? error.lastError : error;

  if (LoadAPIKeyError.isInstance(cause)) {
    return new AuthError(cause.message);
  }

  if (APICallError.isInstance(cause)) {
    const status = cause.statusCode;
    if (status !== undefined && AUTH_STATUS_CODES.has(status)) {
      return new AuthError(`Model API rejected the credential (HTTP ${status}): ${cause.message}`, {
        statusCode: status,
        url: cause.url,
      });
    }
    const label = status !== undefined ? ` (HTTP ${status})` : '';
    return new TransportError(`Model API error${label}: ${cause.message}`, {
      statusCode: status,
      url: cause.url,
    });
  }

  return new TransportError(errorMessage(cause), { cause: errorMessage(error) });
}

export class ConversationSession implements ChatSession {
  private transcript: Message[] = [];
  private readonly models: ModelSource;
  private readonly options: SessionOptions;

  constructor(models: ModelSource, options: SessionOptions) {
    this.models = models;
    this.options = options;
  }

  /** A copy of the transcript as it is now */
  get history(): readonly Message[] {
    return [...this.transcript];
  }

  get systemPrompt(): string {
    return this.options.systemPrompt;
  }

  /**
   * Send a user message with the full transcript and return the reply text.
   *
   * @throws AuthError when the credential is missing or rejected
   * @throws TransportError on any other API or network failure
   */
  async send(input: string | Message): Promise<string> {
    const message = typeof input === 'string' ? createMessage('user', input) : input;
    this.transcript.push(message);

    try {
      const { requestTimeoutMs } = this.options;
      const result = await generateText({
        model: this.models.getModel(),
        system: this.options.systemPrompt,
        messages: this.transcript.map(toCoreMessage),
        temperature: this.options.temperature,
        topP: this.options.topP,
        maxRetries: this.options.maxRetries,
        abortSignal: requestTimeoutMs !== undefined ? AbortSignal.timeout(requestTimeoutMs) : undefined,
      });

      if (!result.text.trim()) {
        throw new TransportError(`Model returned an empty reply (finish reason: ${result.finishReason})`);
      }

      this.transcript.push(createMessage('assistant', result.text));
      logger.debug('Reply received', {
        chars: result.text.length,
        transcriptLength: this.transcript.length,
      });
      return result.text;
    } catch (error) {
      this.discard(message);
      const mapped = toSessionError(error);
      logger.debug(`Model call failed: ${mapped.message}`, { code: mapped.code });
      throw mapped;
    }
  }

  /**
   * Reset the transcript to empty. The session stays usable.
   */
  clear(): void {
    this.transcript = [];
    logger.debug('Transcript cleared');
  }

  private discard(message: Message): void {
    const index = this.transcript.lastIndexOf(message);
    if (index !== -1) {
      this.transcript.splice(index, 1);
    }
  }
}
