import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { CLEAR_SCREEN, ConsoleIO } from '../../src/loop/console-io.js';

function collect(stream: PassThrough): () => string {
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  return () => chunks.join('');
}

describe('ConsoleIO', () => {
  it('returns lines in order and null once input ends', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const io = new ConsoleIO(input, output);

    input.end('hello\nsecond line\n');

    expect(await io.prompt('You: ')).toBe('hello');
    expect(await io.prompt('You: ')).toBe('second line');
    expect(await io.prompt('You: ')).toBeNull();
    expect(await io.prompt('You: ')).toBeNull();

    io.print('Goodbye!');
    io.close();

    expect(written()).toBe('You: You: You: Goodbye!\n');
  });

  it('keeps lines that arrive before they are asked for', async () => {
    const input = new PassThrough();
    const io = new ConsoleIO(input, new PassThrough());

    input.write('one\ntwo\n');
    await new Promise((resolve) => setImmediate(resolve));

    expect(await io.prompt('> ')).toBe('one');
    expect(await io.prompt('> ')).toBe('two');
    io.close();
  });

  it('clears the screen only on a terminal', () => {
    const pipe = new PassThrough();
    const pipeWritten = collect(pipe);
    const piped = new ConsoleIO(new PassThrough(), pipe);
    piped.clearScreen();
    piped.close();

    const tty = Object.assign(new PassThrough(), { isTTY: true });
    const ttyWritten = collect(tty);
    const terminal = new ConsoleIO(new PassThrough(), tty);
    terminal.clearScreen();
    terminal.close();

    expect(pipeWritten()).toBe('');
    expect(ttyWritten().startsWith(CLEAR_SCREEN)).toBe(true);
  });
});
