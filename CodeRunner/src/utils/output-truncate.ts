/**
 * Head+tail output truncation.
 *
 * Keeps the first `head` and last `tail` characters with a marker in
 * between. The start usually holds results, the end usually holds the
 * traceback.
 */

export interface TruncateConfig {
  maxChars: number;
  head: number;
  tail: number;
}

export interface TruncateResult {
  text: string;
  truncated: boolean;
}

export function truncateOutput(
  output: string,
  config: TruncateConfig,
): TruncateResult {
  if (output.length <= config.maxChars) {
    return { text: output, truncated: false };
  }

  // head + tail must fit inside maxChars or nothing would be dropped
  const head = Math.min(config.head, config.maxChars);
  const tail = Math.min(config.tail, config.maxChars - head);
  const dropped = output.length - head - tail;
  const separator = `\n\n[... truncated ${dropped} characters ...]\n\n`;
  const text = output.slice(0, head) + separator + (tail > 0 ? output.slice(-tail) : '');

  return { text, truncated: true };
}
