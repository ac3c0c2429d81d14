// Core token model shared by the tokenizer, the macro table and the expansion engine

export type Span = { start: number; end: number };

export type TokenKind =
	| 'id'
	| 'number'
	| 'string'
	| 'punct'
	| 'ws' // spaces, tabs and backslash-newline splices
	| 'newline'
	| 'comment-line'
	| 'comment-block'
	| 'hash' // '#' opening a directive line
	| 'directive' // keyword right after a directive hash
	| 'eof';

export interface Token {
	kind: TokenKind;
	value: string;
	span: Span;
	// FileHandle id; spans index into that handle's text.
	file: string;
}

export function isTrivia(t: { kind: TokenKind }): boolean {
	return t.kind === 'ws' || t.kind === 'newline' || t.kind === 'comment-line' || t.kind === 'comment-block';
}
