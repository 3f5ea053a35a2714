/**
 * Line codec for the mtr-packet command protocol
 *
 * Outbound: `<token> <verb> [field ...]`
 * Inbound:  `<token> <keyword> [field ...]`
 *
 * A field is `name=value` (assign syntax) or the two atoms `name value`
 * (pairs syntax). Values holding whitespace, quotes or backslashes travel
 * inside double quotes with `"` and `\` escaped by a backslash.
 */

import { InvalidArgumentError, MalformedReplyError } from '../errors.js';
import type { ArgumentValue, Command, Reply, WireSyntax } from '../types/wire.js';

const QUOTE = '"';
const ESCAPE = '\\';
const ASSIGN = '=';

/** Longest decimal string that is still a safe integer */
const MAX_TOKEN_DIGITS = 16;

function isBlank(char: string): boolean {
  return char === ' ' || char === '\t';
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function needsQuoting(value: string): boolean {
  if (value.length === 0) return true;
  for (const char of value) {
    if (isBlank(char) || char === QUOTE || char === ESCAPE) return true;
  }
  return false;
}

/**
 * Quote a value if the wire syntax requires it
 */
export function quoteValue(value: string): string {
  if (value.includes('\n') || value.includes('\r')) {
    throw new InvalidArgumentError(
      `Argument value cannot contain a line break: ${JSON.stringify(value)}`
    );
  }
  if (!needsQuoting(value)) return value;

  let quoted = QUOTE;
  for (const char of value) {
    if (char === QUOTE || char === ESCAPE) quoted += ESCAPE;
    quoted += char;
  }
  return quoted + QUOTE;
}

function formatValue(name: string, value: ArgumentValue): string {
  if (typeof value === 'boolean') return value ? '1' : '0';
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(`Argument ${name} must be a finite number`);
    }
    return String(value);
  }
  return quoteValue(value);
}

function assertName(name: string): void {
  if (name.length === 0 || needsQuoting(name) || name.includes(ASSIGN)) {
    throw new InvalidArgumentError(`Invalid argument name: ${JSON.stringify(name)}`);
  }
}

/**
 * Encode a command line (without the terminator)
 */
export function encodeCommand(
  token: number,
  command: Command,
  syntax: WireSyntax = 'assign'
): string {
  if (!Number.isSafeInteger(token) || token < 0) {
    throw new InvalidArgumentError(`Invalid token: ${token}`);
  }
  assertName(command.verb);

  const parts = [String(token), command.verb];
  for (const [name, value] of command.args) {
    assertName(name);
    const formatted = formatValue(name, value);
    if (syntax === 'assign') {
      parts.push(`${name}${ASSIGN}${formatted}`);
    } else {
      parts.push(name, formatted);
    }
  }
  return parts.join(' ');
}

/**
 * One whitespace-separated atom with quoting removed
 */
export type Atom = {
  text: string;
  /** Offset in `text` of the first `=` seen outside quotes, or -1 */
  assignAt: number;
};

/**
 * Split a line into atoms, honouring quotes and escapes
 */
export function tokenizeLine(line: string): Atom[] {
  const atoms: Atom[] = [];
  let index = 0;

  const readAtom = (): Atom => {
    let text = '';
    let assignAt = -1;

    while (index < line.length && !isBlank(line.charAt(index))) {
      const char = line.charAt(index);
      if (char === QUOTE) {
        index++;
        text += readQuoted();
        continue;
      }
      if (char === ASSIGN && assignAt < 0) assignAt = text.length;
      text += char;
      index++;
    }
    return { text, assignAt };
  };

  const readQuoted = (): string => {
    let text = '';
    while (index < line.length) {
      const char = line.charAt(index);
      index++;
      if (char === QUOTE) return text;
      if (char === ESCAPE) {
        if (index >= line.length) {
          throw new MalformedReplyError(line, 'Dangling escape');
        }
        text += line.charAt(index);
        index++;
        continue;
      }
      text += char;
    }
    throw new MalformedReplyError(line, 'Unterminated quote');
  };

  while (index < line.length) {
    if (isBlank(line.charAt(index))) {
      index++;
      continue;
    }
    atoms.push(readAtom());
  }
  return atoms;
}

function parseToken(line: string, atom: Atom | undefined): number {
  const text = atom?.text ?? '';
  if (text.length === 0 || text.length > MAX_TOKEN_DIGITS) {
    throw new MalformedReplyError(line, 'Missing or oversized token');
  }
  for (const char of text) {
    if (!isDigit(char)) throw new MalformedReplyError(line, 'Token is not an integer');
  }
  const token = Number(text);
  if (!Number.isSafeInteger(token)) {
    throw new MalformedReplyError(line, 'Token out of range');
  }
  return token;
}

/**
 * Decode a reply line (terminator already removed)
 */
export function decodeReply(line: string, syntax: WireSyntax = 'assign'): Reply {
  const atoms = tokenizeLine(line);
  const token = parseToken(line, atoms[0]);

  const keyword = atoms[1]?.text ?? '';
  if (keyword.length === 0) {
    throw new MalformedReplyError(line, 'Missing reply keyword');
  }

  const fields = new Map<string, string>();
  const rest = atoms.slice(2);

  if (syntax === 'assign') {
    for (const atom of rest) {
      if (atom.assignAt <= 0) {
        throw new MalformedReplyError(line, `Field without name=value form: ${atom.text}`);
      }
      fields.set(atom.text.slice(0, atom.assignAt), atom.text.slice(atom.assignAt + 1));
    }
  } else {
    if (rest.length % 2 !== 0) {
      throw new MalformedReplyError(line, 'Field name without value');
    }
    for (let i = 0; i < rest.length; i += 2) {
      const name = rest[i]?.text ?? '';
      if (name.length === 0) throw new MalformedReplyError(line, 'Empty field name');
      fields.set(name, rest[i + 1]?.text ?? '');
    }
  }

  return { token, keyword, fields };
}
