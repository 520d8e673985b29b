/**
 * Fenced code block extraction from model replies.
 *
 * A line parser over fence markers, following CommonMark fence rules:
 * - opening fence: up to 3 spaces, then 3+ backticks or tildes, then an
 *   optional info string whose first word is the language tag
 * - closing fence: same character, at least as long, nothing else on the line
 * - a longer outer fence may contain shorter fence lines as plain content
 *
 * Only blocks whose tag names an executable language are returned. Their
 * inner text is returned verbatim. A fence that is never closed yields
 * nothing, so a truncated reply never runs half a script.
 */

export const PYTHON_TAGS: readonly string[] = ['python', 'py', 'python3'];

export interface ExtractedCode {
  /** Language tag as written, lower-cased */
  language: string;
  source: string;
  /** Character offset of the opening fence in the reply */
  offset: number;
  /** 1-based line of the opening fence */
  line: number;
}

// ── Fence parsing ───────────────────────────────────────────────────────────

interface Fence {
  char: '`' | '~';
  length: number;
  info: string;
}

const MAX_INDENT = 3;

function leadingSpaces(line: string): number {
  let n = 0;
  while (line[n] === ' ') n++;
  return n;
}

function countRun(text: string, char: string): number {
  let n = 0;
  while (text[n] === char) n++;
  return n;
}

export function parseOpeningFence(line: string): Fence | null {
  const indent = leadingSpaces(line);
  if (indent > MAX_INDENT) return null;

  const rest = line.slice(indent);
  const first = rest.charAt(0);
  const char = first === '`' ? '`' : first === '~' ? '~' : null;
  if (!char) return null;

  const length = countRun(rest, char);
  if (length < 3) return null;

  const info = rest.slice(length).trim();
  // A backtick in a backtick fence's info string makes it inline code
  if (char === '`' && info.includes('`')) return null;

  return { char, length, info };
}

function isClosingFence(line: string, fence: Fence): boolean {
  const indent = leadingSpaces(line);
  if (indent > MAX_INDENT) return false;

  const rest = line.slice(indent).trimEnd();
  const length = countRun(rest, fence.char);
  return length >= fence.length && length === rest.length;
}

function languageTag(info: string): string {
  return info.split(/\s+/)[0].toLowerCase();
}

// ── Extraction ──────────────────────────────────────────────────────────────

/**
 * All complete fenced blocks tagged with one of `languages`, in reply order.
 */
export function extractCodeBlocks(
  reply: string,
  languages: readonly string[] = PYTHON_TAGS,
): ExtractedCode[] {
  const wanted = new Set(languages.map((l) => l.toLowerCase()));
  const lines = reply.split('\n');

  const offsets: number[] = [];
  let position = 0;
  for (const line of lines) {
    offsets.push(position);
    position += line.length + 1;
  }

  const blocks: ExtractedCode[] = [];
  let i = 0;
  while (i < lines.length) {
    const fence = parseOpeningFence(lines[i]);
    if (!fence) {
      i++;
      continue;
    }

    let close = -1;
    for (let j = i + 1; j < lines.length; j++) {
      if (isClosingFence(lines[j], fence)) {
        close = j;
        break;
      }
    }

    // Unterminated: the rest of the reply is inside this fence
    if (close === -1) break;

    const tag = languageTag(fence.info);
    if (wanted.has(tag)) {
      blocks.push({
        language: tag,
        source: lines.slice(i + 1, close).join('\n'),
        offset: offsets[i],
        line: i + 1,
      });
    }
    i = close + 1;
  }

  return blocks;
}

export function hasExecutableCode(reply: string, languages: readonly string[] = PYTHON_TAGS): boolean {
  return extractCodeBlocks(reply, languages).length > 0;
}
