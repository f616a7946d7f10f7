// PGN tokenizer - a pull-based scanner over one PGN text
//
// Knows nothing about chess: moves are opaque symbols. Enough of the PGN
// export format is understood to find tags, moves, comments, variations and
// the game termination marker.

import { MalformedPgnError } from '../errors.js';

export type GameResult = '1-0' | '0-1' | '1/2-1/2' | '*';

const RESULTS: readonly GameResult[] = ['1-0', '0-1', '1/2-1/2', '*'];

export type PgnToken =
  | { kind: 'tag'; name: string; value: string; offset: number }
  | { kind: 'moveNumber'; text: string; offset: number }
  | { kind: 'san'; san: string; offset: number }
  | { kind: 'nag'; nag: string; offset: number }
  | { kind: 'comment'; text: string; offset: number }
  | { kind: 'beginVariation'; offset: number }
  | { kind: 'endVariation'; offset: number }
  | { kind: 'result'; result: GameResult; offset: number };

export type PgnTokenKind = PgnToken['kind'];

const WHITESPACE = /\s/;
const TAG_NAME_CHAR = /[A-Za-z0-9_]/;
const SYMBOL_START = /[A-Za-z0-9\-]/;
const SYMBOL_CHAR = /[A-Za-z0-9_+#=:\-\/]/;
const DIGIT = /[0-9]/;

function toResult(symbol: string): GameResult | undefined {
  return RESULTS.find((result) => result === symbol);
}

/**
 * Scanner producing one token per call to next().
 *
 * Throws MalformedPgnError on input it cannot tokenize: unterminated tags,
 * strings and brace comments, or characters that cannot start a token.
 */
export class PgnTokenizer {
  private pos = 0;

  constructor(private readonly text: string) {}

  /** Offset of the next unread character */
  get offset(): number {
    return this.pos;
  }

  /**
   * Read the next token, or null at end of input.
   */
  next(): PgnToken | null {
    for (;;) {
      this.skipWhitespace();
      if (this.pos >= this.text.length) {
        return null;
      }

      // Escape mechanism: a % in the first column hides the rest of the line
      if (this.text[this.pos] === '%' && this.atLineStart()) {
        this.skipLine();
        continue;
      }

      return this.readToken();
    }
  }

  /**
   * Read every remaining token.
   */
  all(): PgnToken[] {
    const tokens: PgnToken[] = [];
    for (let token = this.next(); token; token = this.next()) {
      tokens.push(token);
    }
    return tokens;
  }

  private readToken(): PgnToken {
    const offset = this.pos;
    const ch = this.text[offset];

    switch (ch) {
      case '[':
        return this.readTag();
      case '{':
        return this.readBraceComment();
      case ';':
        return this.readLineComment();
      case '(':
        this.pos++;
        return { kind: 'beginVariation', offset };
      case ')':
        this.pos++;
        return { kind: 'endVariation', offset };
      case '$':
        return this.readNumericNag();
      case '!':
      case '?':
        return this.readSuffixNag();
      case '*':
        this.pos++;
        return { kind: 'result', result: '*', offset };
      case '.':
        return { kind: 'moveNumber', text: this.readWhile(/\./), offset };
    }

    if (SYMBOL_START.test(ch)) {
      return this.readSymbol();
    }

    throw new MalformedPgnError(offset, `unexpected character "${ch}"`);
  }

  private readTag(): PgnToken {
    const offset = this.pos;
    this.pos++; // [
    this.skipWhitespace();

    const name = this.readWhile(TAG_NAME_CHAR);
    if (!name) {
      throw new MalformedPgnError(this.pos, 'expected a tag name');
    }

    this.skipWhitespace();
    if (this.text[this.pos] !== '"') {
      throw new MalformedPgnError(this.pos, `expected a quoted value for tag ${name}`);
    }
    const value = this.readString();

    this.skipWhitespace();
    if (this.text[this.pos] !== ']') {
      throw new MalformedPgnError(this.pos, `unterminated tag ${name}`);
    }
    this.pos++;

    return { kind: 'tag', name, value, offset };
  }

  private readString(): string {
    const start = this.pos;
    this.pos++; // opening quote
    let value = '';

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '"') {
        this.pos++;
        return value;
      }
      if (ch === '\\' && this.pos + 1 < this.text.length) {
        const escaped = this.text[this.pos + 1];
        if (escaped === '"' || escaped === '\\') {
          value += escaped;
          this.pos += 2;
          continue;
        }
      }
      value += ch;
      this.pos++;
    }

    throw new MalformedPgnError(start, 'unterminated string');
  }

  private readBraceComment(): PgnToken {
    const offset = this.pos;
    const end = this.text.indexOf('}', offset + 1);
    if (end === -1) {
      throw new MalformedPgnError(offset, 'unterminated comment');
    }

    this.pos = end + 1;
    return { kind: 'comment', text: this.text.slice(offset + 1, end), offset };
  }

  private readLineComment(): PgnToken {
    const offset = this.pos;
    const newline = this.text.indexOf('\n', offset);
    const end = newline === -1 ? this.text.length : newline;

    this.pos = end;
    return { kind: 'comment', text: this.text.slice(offset + 1, end).replace(/\r$/, ''), offset };
  }

  private readNumericNag(): PgnToken {
    const offset = this.pos;
    this.pos++; // $
    const digits = this.readWhile(DIGIT);
    if (!digits) {
      throw new MalformedPgnError(offset, 'expected digits after "$"');
    }
    return { kind: 'nag', nag: `$${digits}`, offset };
  }

  private readSuffixNag(): PgnToken {
    const offset = this.pos;
    return { kind: 'nag', nag: this.readWhile(/[!?]/), offset };
  }

  private readSymbol(): PgnToken {
    const offset = this.pos;

    // Move numbers: digits followed by one or more periods
    if (DIGIT.test(this.text[offset])) {
      const digits = this.readWhile(DIGIT);
      if (this.text[this.pos] === '.') {
        return { kind: 'moveNumber', text: digits + this.readWhile(/\./), offset };
      }
      this.pos = offset;
    }

    const symbol = this.readWhile(SYMBOL_CHAR);
    const result = toResult(symbol);
    if (result) {
      return { kind: 'result', result, offset };
    }

    return { kind: 'san', san: symbol, offset };
  }

  private readWhile(pattern: RegExp): string {
    const start = this.pos;
    while (this.pos < this.text.length && pattern.test(this.text[this.pos])) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  private skipWhitespace(): void {
    this.readWhile(WHITESPACE);
  }

  private skipLine(): void {
    const newline = this.text.indexOf('\n', this.pos);
    this.pos = newline === -1 ? this.text.length : newline + 1;
  }

  private atLineStart(): boolean {
    return this.pos === 0 || this.text[this.pos - 1] === '\n';
  }
}

/**
 * Tokenize a whole text at once.
 */
export function tokenizePgn(text: string): PgnToken[] {
  return new PgnTokenizer(text).all();
}
