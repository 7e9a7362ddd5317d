export { parse } from './parser';
export { parseChevrotain } from './chevrotain/parser';
export { Scanner, formatRune } from './scanner';
export { TokenKind, KEYWORDS, formatToken, isKeyword, tokenKindName } from './token';
export type { Token } from './token';
export { ParseError } from './errors';
export { envDebug } from './config';
export type { ParseOptions } from './types';
export { positionAt } from './utils/pos';
