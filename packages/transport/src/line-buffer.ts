import { StringDecoder } from 'node:string_decoder';

/**
 * Newline-delimited line splitter.
 * Keeps the unterminated tail until a later chunk completes it.
 */
export type LineBuffer = {
  push: (chunk: Buffer | string) => string[];
  /** Discard and return any unterminated tail */
  drain: () => string;
};

export function createLineBuffer(): LineBuffer {
  const decoder = new StringDecoder('utf8');
  let buffer = '';

  function push(chunk: Buffer | string): string[] {
    buffer += typeof chunk === 'string' ? chunk : decoder.write(chunk);
    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';
    return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  }

  function drain(): string {
    const tail = buffer + decoder.end();
    buffer = '';
    return tail;
  }

  return { push, drain };
}
