import type { CoreMessage } from 'ai';

export type MessageRole = 'user' | 'assistant' | 'system';

/**
 * A file sent along with a user message
 */
export interface Attachment {
  readonly name: string;
  readonly mimeType: string;
  readonly data: Uint8Array;
}

/**
 * One transcript entry. Frozen on creation.
 */
export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly attachments: readonly Attachment[];
  readonly createdAt: string;
}

export function createMessage(
  role: MessageRole,
  content: string,
  attachments: readonly Attachment[] = [],
): Message {
  return Object.freeze({
    role,
    content,
    attachments: Object.freeze([...attachments]),
    createdAt: new Date().toISOString(),
  });
}

/**
 * Convert a transcript entry to the SDK's message format.
 * Image attachments become image parts; only user messages carry them.
 */
export function toCoreMessage(message: Message): CoreMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      if (message.attachments.length === 0) {
        return { role: 'user', content: message.content };
      }
      return {
        role: 'user',
        content: [
          { type: 'text', text: message.content },
          ...message.attachments.map((a) => ({
            type: 'image' as const,
            image: a.data,
            mimeType: a.mimeType,
          })),
        ],
      };
  }
}
