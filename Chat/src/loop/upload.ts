/**
 * `upload <path> [with prompt <text>]`: read a local file into a user message.
 */

import { readFile, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { basename, extname, resolve } from 'node:path';
import { BaseError, errorMessage } from '@pyloop/shared/Types/errors.js';
import { createMessage, type Message } from '../chat/types.js';

export class UploadError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'UPLOAD_ERROR', details);
    this.name = 'UploadError';
  }
}

export const DEFAULT_UPLOAD_PROMPT = 'Please analyze it and suggest what I can do with it.';

const MIME_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.py': 'text/x-python',
  '.js': 'text/javascript',
  '.ts': 'text/x-typescript',
  '.html': 'text/html',
  '.css': 'text/css',
  '.json': 'application/json',
  '.xml': 'application/xml',
  '.csv': 'text/csv',
  '.md': 'text/markdown',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.pdf': 'application/pdf',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

export function mimeTypeFor(fileName: string): string {
  return MIME_TYPES[extname(fileName).toLowerCase()] ?? 'application/octet-stream';
}

export interface UploadedFile {
  name: string;
  path: string;
  mimeType: string;
  message: Message;
}

/**
 * Build the user message for an upload. Images travel as binary
 * attachments; every other file is inlined as text.
 *
 * @throws UploadError when the path is missing or not a regular file
 */
export async function buildUploadMessage(
  path: string,
  prompt: string | null,
  cwd: string = process.cwd(),
): Promise<UploadedFile> {
  const absolute = resolve(cwd, path);

  let info: Stats;
  try {
    info = await stat(absolute);
  } catch (error) {
    throw new UploadError(`File not found: ${absolute}`, { cause: errorMessage(error) });
  }
  if (!info.isFile()) {
    throw new UploadError(`Path is not a file: ${absolute}`);
  }

  const name = basename(absolute);
  const mimeType = mimeTypeFor(name);
  const intro = `I'm uploading a file named '${name}'. ${prompt ?? DEFAULT_UPLOAD_PROMPT}`;

  if (mimeType.startsWith('image/')) {
    const data = await readFile(absolute);
    return {
      name,
      path: absolute,
      mimeType,
      message: createMessage('user', intro, [{ name, mimeType, data: new Uint8Array(data) }]),
    };
  }

  const text = await readFile(absolute, 'utf-8');
  return {
    name,
    path: absolute,
    mimeType,
    message: createMessage('user', `${intro}\n\nFile Content:\n\`\`\`\n${text}\n\`\`\``),
  };
}
