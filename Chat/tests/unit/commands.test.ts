import { describe, it, expect } from 'vitest';
import { parseCommand } from '../../src/loop/commands.js';

describe('parseCommand', () => {
  it.each(['exit', 'QUIT', '  Bye  ', 'Exit'])('recognises %j as exit', (input) => {
    expect(parseCommand(input)).toEqual({ kind: 'exit' });
  });

  it('recognises clear in any case', () => {
    expect(parseCommand('Clear')).toEqual({ kind: 'clear' });
  });

  it('treats blank input as empty', () => {
    expect(parseCommand('')).toEqual({ kind: 'empty' });
    expect(parseCommand('   \t ')).toEqual({ kind: 'empty' });
  });

  it('treats anything else as a chat message, trimmed', () => {
    expect(parseCommand('  exit now please ')).toEqual({ kind: 'message', text: 'exit now please' });
    expect(parseCommand('uploading is slow')).toEqual({ kind: 'message', text: 'uploading is slow' });
  });

  describe('upload', () => {
    it('parses a path with a prompt', () => {
      expect(parseCommand('upload data.csv with prompt summarise it')).toEqual({
        kind: 'upload',
        path: 'data.csv',
        prompt: 'summarise it',
      });
    });

    it('matches the keywords case-insensitively and keeps the prompt as typed', () => {
      expect(parseCommand('Upload notes.md WITH PROMPT Be brief')).toEqual({
        kind: 'upload',
        path: 'notes.md',
        prompt: 'Be brief',
      });
    });

    it('strips quotes around the path and leaves the prompt unset', () => {
      expect(parseCommand('upload "my file.txt"')).toEqual({
        kind: 'upload',
        path: 'my file.txt',
        prompt: null,
      });
    });

    it('asks for a path when none is given', () => {
      expect(parseCommand('upload')).toEqual({ kind: 'upload_usage' });
      expect(parseCommand('upload   ')).toEqual({ kind: 'upload_usage' });
      expect(parseCommand('upload with prompt describe it')).toEqual({ kind: 'upload_usage' });
    });
  });
});
