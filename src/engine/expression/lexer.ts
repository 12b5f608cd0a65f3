/**
 * Tokenizer for boolean tag expressions.
 */

import { ParseError } from '../errors';
import type { Token, TokenType } from './types';
import { KEYWORDS } from './types';

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_.\-]/;
const WHITESPACE = /\s/;
const HEX4 = /^[0-9A-Fa-f]{4}$/;

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  n: '\n',
  t: '\t',
  r: '\r',
};

/**
 * Split an expression into tokens, ending with a single EOF token.
 *
 * @throws ParseError on an unterminated string, a bad escape, or a character
 *   that starts no token
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  const push = (type: TokenType, text: string, position: number): void => {
    tokens.push({ type, text, position });
  };

  while (index < source.length) {
    const char = source.charAt(index);

    if (WHITESPACE.test(char)) {
      index++;
      continue;
    }

    if (char === '(') {
      push('LPAREN', char, index++);
      continue;
    }

    if (char === ')') {
      push('RPAREN', char, index++);
      continue;
    }

    if (char === '=') {
      push('EQUALS', char, index++);
      continue;
    }

    if (char === '!') {
      if (source.charAt(index + 1) !== '=') {
        throw new ParseError(index, "Unknown operator '!'", source);
      }
      push('NOT_EQUALS', '!=', index);
      index += 2;
      continue;
    }

    if (char === '"') {
      const { value, end } = readString(source, index);
      push('STRING', value, index);
      index = end;
      continue;
    }

    if (IDENT_START.test(char)) {
      const start = index;
      while (index < source.length && IDENT_PART.test(source.charAt(index))) {
        index++;
      }
      const word = source.slice(start, index);
      push(KEYWORDS.get(word) ?? 'IDENT', word, start);
      continue;
    }

    throw new ParseError(index, `Unexpected character '${char}'`, source);
  }

  push('EOF', '', source.length);
  return tokens;
}

/**
 * Read a double-quoted string starting at `start`.
 * Returns the unescaped value and the index just past the closing quote.
 */
function readString(source: string, start: number): { value: string; end: number } {
  let value = '';
  let index = start + 1;

  while (index < source.length) {
    const char = source.charAt(index);

    if (char === '"') {
      return { value, end: index + 1 };
    }

    if (char === '\\') {
      const escape = source.charAt(index + 1);
      const simple = SIMPLE_ESCAPES[escape];
      if (simple !== undefined) {
        value += simple;
        index += 2;
        continue;
      }
      if (escape === 'u') {
        const hex = source.slice(index + 2, index + 6);
        if (!HEX4.test(hex)) {
          throw new ParseError(index, 'Invalid unicode escape', source);
        }
        value += String.fromCharCode(parseInt(hex, 16));
        index += 6;
        continue;
      }
      if (escape === '') {
        break;
      }
      throw new ParseError(index, `Invalid escape sequence '\\${escape}'`, source);
    }

    value += char;
    index++;
  }

  throw new ParseError(start, 'Unterminated string', source);
}
