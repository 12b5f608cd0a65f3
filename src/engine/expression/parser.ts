/**
 * Recursive-descent parser for boolean tag expressions.
 *
 * Precedence, lowest first: OR, AND, NOT, parenthesised groups, leaves.
 *
 *   or      := and ("OR" and)*
 *   and     := not ("AND" not)*
 *   not     := "NOT" not | primary
 *   primary := "(" or ")" | leaf
 *   leaf    := IDENT "=" STRING | IDENT "!=" STRING
 *            | IDENT "exists"   | IDENT "not" "exists"
 *
 * Parsing is pure: the same text always yields the same outcome.
 */

import { ParseError } from '../errors';
import { tokenize } from './lexer';
import type { LeafPredicate, ParseOutcome, Predicate, Token, TokenType } from './types';

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Compile an expression into a predicate tree.
 *
 * Empty, whitespace-only or absent input is valid and yields a null
 * predicate. Malformed input yields a ParseError; nothing is thrown.
 */
export function parseExpression(expression: string | null | undefined): ParseOutcome {
  if (expression === null || expression === undefined || expression.trim() === '') {
    return { success: true, predicate: null };
  }

  try {
    const parser = new Parser(expression, tokenize(expression));
    return { success: true, predicate: parser.parse() };
  } catch (error) {
    if (error instanceof ParseError) {
      return { success: false, error };
    }
    throw error;
  }
}

// =============================================================================
// Parser
// =============================================================================

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[]
  ) {}

  parse(): Predicate {
    const predicate = this.parseOr();
    const trailing = this.peek();
    if (trailing.type !== 'EOF') {
      const reason = trailing.type === 'RPAREN'
        ? "Unbalanced parentheses: unexpected ')'"
        : `Unexpected ${describe(trailing)}`;
      throw this.error(trailing, reason);
    }
    return predicate;
  }

  private parseOr(): Predicate {
    const operands = [this.parseAnd()];
    while (this.peek().type === 'OR') {
      this.advance();
      operands.push(this.parseAnd());
    }
    return operands.length === 1 && operands[0] ? operands[0] : { type: 'Or', operands };
  }

  private parseAnd(): Predicate {
    const operands = [this.parseNot()];
    while (this.peek().type === 'AND') {
      this.advance();
      operands.push(this.parseNot());
    }
    return operands.length === 1 && operands[0] ? operands[0] : { type: 'And', operands };
  }

  private parseNot(): Predicate {
    if (this.peek().type === 'NOT') {
      this.advance();
      return { type: 'Not', operand: this.parseNot() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Predicate {
    const token = this.peek();

    if (token.type === 'LPAREN') {
      this.advance();
      const inner = this.parseOr();
      const closing = this.peek();
      if (closing.type !== 'RPAREN') {
        throw this.error(
          closing.type === 'EOF' ? token : closing,
          closing.type === 'EOF'
            ? "Unbalanced parentheses: '(' is never closed"
            : `Expected ')' but found ${describe(closing)}`
        );
      }
      this.advance();
      return inner;
    }

    if (token.type === 'IDENT') {
      return this.parseLeaf();
    }

    if (token.type === 'EOF') {
      throw this.error(token, 'Unexpected end of expression');
    }
    throw this.error(token, `Expected a tag name, 'NOT' or '(' but found ${describe(token)}`);
  }

  private parseLeaf(): LeafPredicate {
    const name = this.advance().text;
    const operator = this.advance();

    switch (operator.type) {
      case 'EQUALS':
        return { type: 'Equals', name, value: this.expectString(operator) };

      case 'NOT_EQUALS':
        return { type: 'NotEquals', name, value: this.expectString(operator) };

      case 'EXISTS':
        return { type: 'Exists', name };

      case 'NOT_LOWER': {
        const next = this.advance();
        if (next.type !== 'EXISTS') {
          throw this.error(next, `Expected 'exists' after 'not' but found ${describe(next)}`);
        }
        return { type: 'NotExists', name };
      }

      default:
        throw this.error(
          operator,
          `Expected '=', '!=', 'exists' or 'not exists' after tag '${name}' but found ${describe(operator)}`
        );
    }
  }

  private expectString(operator: Token): string {
    const token = this.advance();
    if (token.type !== 'STRING') {
      throw this.error(token, `Expected a quoted value after '${operator.text}'`);
    }
    return token.text;
  }

  // ===========================================================================
  // Token Cursor
  // ===========================================================================

  private peek(): Token {
    return this.tokens[this.index] ?? this.endToken();
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'EOF') {
      this.index++;
    }
    return token;
  }

  private endToken(): Token {
    return { type: 'EOF', text: '', position: this.source.length };
  }

  private error(token: Token, reason: string): ParseError {
    return new ParseError(token.position, reason, this.source);
  }
}

const TOKEN_DESCRIPTIONS: Readonly<Record<TokenType, string>> = {
  IDENT: 'tag name',
  STRING: 'string',
  EQUALS: "'='",
  NOT_EQUALS: "'!='",
  LPAREN: "'('",
  RPAREN: "')'",
  AND: "'AND'",
  OR: "'OR'",
  NOT: "'NOT'",
  EXISTS: "'exists'",
  NOT_LOWER: "'not'",
  EOF: 'end of expression',
};

function describe(token: Token): string {
  const kind = TOKEN_DESCRIPTIONS[token.type];
  return token.type === 'IDENT' ? `${kind} '${token.text}'` : kind;
}
