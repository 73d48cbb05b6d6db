// Token model shared by the scanner, the comment stripper and the macro extractor.

import type { Position } from './position';

// 'error' is never stored on a Token: it is the terminal signal of Scanner.next().
export type TokenType = 'comment' | 'text' | 'error';

export interface Token {
	type: Exclude<TokenType, 'error'>;
	position: Position; // first character of the span
	data: string; // raw span, \r removed
}

export function isCommentToken(t: Token): boolean { return t.type === 'comment'; }
export function isTextToken(t: Token): boolean { return t.type === 'text'; }

// Concatenated data of a token list: equals the scanned input minus '\r'.
export function joinTokens(tokens: readonly Token[]): string {
	return tokens.map(t => t.data).join('');
}
