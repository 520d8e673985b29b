import { createInterface, type Interface } from 'node:readline';

/**
 * Terminal side of the interaction loop
 */
export interface LoopIO {
  /** Show `question` and resolve the next line, or null once input has ended */
  prompt(question: string): Promise<string | null>;
  print(text: string): void;
  /** Wipe the visible screen; a no-op when output is not a terminal */
  clearScreen(): void;
}

/** ANSI erase-display plus cursor-home */
export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/**
 * readline-backed IO. Lines are pulled through the async iterator so piped
 * input is buffered rather than dropped between prompts.
 */
export class ConsoleIO implements LoopIO {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly output: NodeJS.WritableStream;
  private readonly interactive: boolean;
  private ended = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream & { isTTY?: boolean } = process.stdout,
  ) {
    this.output = output;
    this.interactive = output.isTTY === true;
    this.rl = createInterface({ input, output, terminal: this.interactive });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async prompt(question: string): Promise<string | null> {
    if (this.ended) return null;
    this.output.write(question);
    const next = await this.lines.next();
    if (next.done) {
      this.ended = true;
      return null;
    }
    return next.value;
  }

  print(text: string): void {
    this.output.write(`${text}\n`);
  }

  clearScreen(): void {
    if (this.interactive) this.output.write(CLEAR_SCREEN);
  }

  close(): void {
    this.rl.close();
  }
}
