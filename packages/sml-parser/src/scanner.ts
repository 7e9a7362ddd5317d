import { KEYWORDS, TokenKind, type Token } from './token';

const EOF = -1;

const LINE_COMMENT = '//';
const LEFT_COMMENT = '/*';
const RIGHT_COMMENT = '*/';

const DECIMAL = '0123456789';
const HEX = '0123456789abcdefABCDEF';

// Each state scans some input and returns the next state, or null to stop.
type StateFn = () => StateFn | null;

function isSpace(r: number): boolean {
  return r === 0x20 || r === 0x09 || isEndOfLine(r);
}

function isEndOfLine(r: number): boolean {
  return r === 0x0d || r === 0x0a;
}

function isDigit(r: number): boolean {
  return r >= 0x30 && r <= 0x39;
}

function isAlphaNumeric(r: number): boolean {
  return r === 0x5f || (r !== EOF && /[\p{L}\p{Nd}]/u.test(String.fromCodePoint(r)));
}

function inSet(r: number, valid: string): boolean {
  return r !== EOF && valid.includes(String.fromCodePoint(r));
}

/** `U+0029 ')'` */
export function formatRune(r: number): string {
  if (r === EOF) return 'EOF';
  const hex = r.toString(16).toUpperCase().padStart(4, '0');
  return `U+${hex} '${String.fromCodePoint(r)}'`;
}

/**
 * Pull-based scanner. Every `nextToken()` runs the state machine until one token
 * is ready in the single hand-off slot. The stream ends with one EOF token, or
 * early with one Error token; after that the terminal token is returned again.
 */
export class Scanner implements Iterable<Token> {
  private pos = 0; // current offset
  private start = 0; // start of the pending token
  private width = 0; // width of the last code point read
  private parenDepth = 0;
  private state: StateFn | null;
  private slot: Token | null = null;
  private terminal: Token | null = null;

  constructor(
    readonly name: string,
    readonly input: string,
  ) {
    this.state = this.lexBase;
  }

  nextToken(): Token {
    while (this.slot === null && this.state !== null) {
      this.state = this.state();
    }
    const tok = this.slot ?? this.terminal;
    if (tok === null) throw new Error(`scanner for ${this.name} stopped without a terminal token`);
    this.slot = null;
    return tok;
  }

  *[Symbol.iterator](): Iterator<Token> {
    for (;;) {
      const tok = this.nextToken();
      yield tok;
      if (tok.kind === TokenKind.EOF || tok.kind === TokenKind.Error) return;
    }
  }

  private next(): number {
    if (this.pos >= this.input.length) {
      this.width = 0;
      return EOF;
    }
    const r = this.input.codePointAt(this.pos) ?? EOF;
    this.width = r > 0xffff ? 2 : 1;
    this.pos += this.width;
    return r;
  }

  private peek(): number {
    const r = this.next();
    this.backup();
    return r;
  }

  // Only valid once per call of next.
  private backup(): void {
    this.pos -= this.width;
  }

  private emit(kind: TokenKind): void {
    const tok: Token = { kind, pos: this.start, value: this.input.slice(this.start, this.pos) };
    this.slot = tok;
    if (kind === TokenKind.EOF) this.terminal = tok;
    this.start = this.pos;
  }

  private ignore(): void {
    this.start = this.pos;
  }

  private accept(valid: string): boolean {
    if (inSet(this.next(), valid)) return true;
    this.backup();
    return false;
  }

  private acceptRun(valid: string): number {
    let n = 0;
    while (inSet(this.next(), valid)) n++;
    this.backup();
    return n;
  }

  private errorf(message: string): null {
    const tok: Token = { kind: TokenKind.Error, pos: this.start, value: message };
    this.slot = tok;
    this.terminal = tok;
    return null;
  }

  private readonly lexBase: StateFn = () => {
    if (this.input.startsWith(LINE_COMMENT, this.pos)) return this.lexLineComment;
    if (this.input.startsWith(LEFT_COMMENT, this.pos)) return this.lexBlockComment;
    if (this.input.startsWith('&&', this.pos)) {
      this.pos += 2;
      this.emit(TokenKind.Intersection);
      return this.lexBase;
    }
    if (this.input.startsWith('||', this.pos)) {
      this.pos += 2;
      this.emit(TokenKind.Union);
      return this.lexBase;
    }

    const r = this.next();
    if (isSpace(r)) return this.lexSpace;
    if (r === 0x2d /* - */ && !this.atNumberBody()) {
      this.emit(TokenKind.Diff);
      return this.lexBase;
    }
    if (r === 0x2b /* + */ || r === 0x2d || isDigit(r)) {
      this.backup();
      return this.lexNumber;
    }
    if (r === 0x22 /* " */) return this.lexQuote;
    if (isAlphaNumeric(r)) {
      this.backup();
      return this.lexIdentifier;
    }
    switch (r) {
      case 0x28 /* ( */:
        this.emit(TokenKind.LeftParen);
        this.parenDepth++;
        return this.lexBase;
      case 0x29 /* ) */:
        if (this.parenDepth === 0) return this.errorf(`unexpected right paren ${formatRune(r)}`);
        this.emit(TokenKind.RightParen);
        this.parenDepth--;
        return this.lexBase;
      case 0x40 /* @ */:
        this.emit(TokenKind.Location);
        return this.lexBase;
      case EOF:
        this.emit(TokenKind.EOF);
        return null;
      default:
        return this.errorf(`unrecognized character ${formatRune(r)}`);
    }
  };

  // Skips through the newline; comment text is never emitted.
  private readonly lexLineComment: StateFn = () => {
    this.pos += LINE_COMMENT.length;
    const i = this.input.indexOf('\n', this.pos);
    this.pos = i < 0 ? this.input.length : i + 1;
    this.ignore();
    return this.lexBase;
  };

  private readonly lexBlockComment: StateFn = () => {
    this.pos += LEFT_COMMENT.length;
    const i = this.input.indexOf(RIGHT_COMMENT, this.pos);
    if (i < 0) return this.errorf('unclosed comment');
    this.pos = i + RIGHT_COMMENT.length;
    this.ignore();
    return this.lexBase;
  };

  // One space has already been seen.
  private readonly lexSpace: StateFn = () => {
    while (isSpace(this.peek())) this.next();
    this.emit(TokenKind.Space);
    return this.lexBase;
  };

  private readonly lexIdentifier: StateFn = () => {
    let r = this.next();
    while (isAlphaNumeric(r)) r = this.next();
    this.backup();
    if (!this.atTerminator()) return this.errorf(`bad character ${formatRune(r)}`);
    const word = this.input.slice(this.start, this.pos);
    const keyword = KEYWORDS.get(word);
    if (keyword !== undefined) {
      this.emit(keyword);
    } else if (word === 'true' || word === 'false') {
      this.emit(TokenKind.Bool);
    } else {
      this.emit(TokenKind.Identifier);
    }
    return this.lexBase;
  };

  // A digit, or a '.' then a digit, follows.
  private atNumberBody(): boolean {
    const c = this.input.charCodeAt(this.pos);
    if (isDigit(c)) return true;
    return c === 0x2e /* . */ && isDigit(this.input.charCodeAt(this.pos + 1));
  }

  // Characters allowed right after an identifier.
  private atTerminator(): boolean {
    const r = this.peek();
    if (r === EOF || isSpace(r) || isEndOfLine(r)) return true;
    return inSet(r, '.,|:)(');
  }

  private readonly lexNumber: StateFn = () => {
    if (!this.scanNumber()) {
      return this.errorf(`bad number syntax: ${JSON.stringify(this.input.slice(this.start, this.pos))}`);
    }
    const sign = this.peek();
    if (sign === 0x2b || sign === 0x2d) {
      // Complex: 1+2i. No spaces, must end in 'i'.
      if (!this.scanNumber() || this.input[this.pos - 1] !== 'i') {
        return this.errorf(`bad number syntax: ${JSON.stringify(this.input.slice(this.start, this.pos))}`);
      }
      this.emit(TokenKind.Complex);
    } else {
      this.emit(TokenKind.Number);
    }
    return this.lexBase;
  };

  // Permissive: "0x" and "089" pass here and are rejected when the literal is classified.
  private scanNumber(): boolean {
    this.accept('+-');
    let digits = DECIMAL;
    let mantissa = 0;
    if (this.accept('0')) {
      mantissa++;
      if (this.accept('xX')) digits = HEX;
    }
    mantissa += this.acceptRun(digits);
    if (this.accept('.')) mantissa += this.acceptRun(digits);
    if (mantissa === 0) return false;
    if (this.accept('eE')) {
      this.accept('+-');
      this.acceptRun(DECIMAL);
    }
    this.accept('i');
    if (isAlphaNumeric(this.peek())) {
      this.next();
      return false;
    }
    return true;
  }

  private readonly lexQuote: StateFn = () => {
    for (;;) {
      const r = this.next();
      if (r === 0x5c /* \ */) {
        const escaped = this.next();
        if (escaped !== EOF && escaped !== 0x0a) continue;
        return this.errorf('unterminated quoted string');
      }
      if (r === EOF || r === 0x0a) return this.errorf('unterminated quoted string');
      if (r === 0x22) break;
    }
    this.emit(TokenKind.String);
    return this.lexBase;
  };
}
