import type { Token, TokenKind } from './tokens';

export const DIRECTIVE_KEYWORDS = new Set(['define', 'undef', 'include', 'if', 'ifdef', 'ifndef', 'elif', 'else', 'endif']);

const TWO = new Set(['##', '==', '!=', '<=', '>=', '&&', '||', '<<', '>>', '::', '++', '--', '+=', '-=', '*=', '/=']);

const isDigit = (ch: string | undefined) => !!ch && ch >= '0' && ch <= '9';
const isHex = (ch: string | undefined) => !!ch && /[0-9A-Fa-f]/.test(ch);
const isIdStart = (ch: string | undefined) => !!ch && /[A-Za-z_]/.test(ch);
const isIdContinue = (ch: string | undefined) => !!ch && /[A-Za-z0-9_]/.test(ch);
const isBlank = (ch: string | undefined) => ch === ' ' || ch === '\t' || ch === '\f' || ch === '\v' || ch === '\r';

// Single pass over one file: every character ends up in exactly one token, trivia included, so
// spans tile the source. Nothing here expands or evaluates macros.
export class Tokenizer {
	private i = 0;
	private readonly n: number;
	private readonly text: string;
	private readonly file: string;
	// Only blanks and comments seen since the last newline.
	private atLineStart = true;
	private afterHash = false;
	private lastSignificant: Token | null = null;

	constructor(text: string, file = '<unknown>') {
		this.text = text;
		this.n = text.length;
		this.file = file;
	}

	// Yields eof once the text is exhausted, and again on every later call.
	next(): Token {
		if (this.i >= this.n) return this.mk('eof', this.i, this.i);
		const s = this.i;
		const c = this.text[s];

		// line splice: backslash, optional blanks, newline
		if (c === '\\') {
			let k = s + 1; while (k < this.n && (this.text[k] === ' ' || this.text[k] === '\t')) k++;
			if (this.text[k] === '\n') return this.mk('ws', s, k + 1);
			if (this.text[k] === '\r' && this.text[k + 1] === '\n') return this.mk('ws', s, k + 2);
		}
		if (c === '\n') return this.mk('newline', s, s + 1);
		if (c === '\r' && this.text[s + 1] === '\n') return this.mk('newline', s, s + 2);
		if (isBlank(c)) {
			let j = s + 1; while (j < this.n && isBlank(this.text[j]) && !(this.text[j] === '\r' && this.text[j + 1] === '\n')) j++;
			return this.mk('ws', s, j);
		}

		if (c === '#') {
			if (this.atLineStart) return this.mk('hash', s, s + 1);
			if (this.text[s + 1] === '#') return this.mk('punct', s, s + 2);
			return this.mk('punct', s, s + 1);
		}

		if (c === '/') {
			const d = this.text[s + 1];
			if (d === '/') {
				let j = s + 2; while (j < this.n && this.text[j] !== '\n' && !(this.text[j] === '\r' && this.text[j + 1] === '\n')) j++;
				return this.mk('comment-line', s, j);
			}
			if (d === '*') {
				let j = s + 2;
				while (j < this.n && !(this.text[j] === '*' && this.text[j + 1] === '/')) j++;
				j = Math.min(this.n, j + 2);
				return this.mk('comment-block', s, j);
			}
		}

		// strings: a doubled quote of the same kind is a literal quote, not the terminator
		if (c === '"' || c === '\'') {
			let j = s + 1;
			while (j < this.n) {
				const ch = this.text[j];
				if (ch === c) {
					if (this.text[j + 1] === c) { j += 2; continue; }
					j++; break;
				}
				if (ch === '\n' || (ch === '\r' && this.text[j + 1] === '\n')) break;
				j++;
			}
			return this.mk('string', s, j);
		}

		if ((c === '+' || c === '-') && !this.valueBefore()) {
			const d = this.text[s + 1];
			if (isDigit(d) || (d === '.' && isDigit(this.text[s + 2]))) return this.mk('number', s, this.scanNumber(s + 1));
		}
		if (isDigit(c) || (c === '.' && isDigit(this.text[s + 1]))) return this.mk('number', s, this.scanNumber(s));

		if (isIdStart(c)) {
			let j = s + 1; while (j < this.n && isIdContinue(this.text[j])) j++;
			const word = this.text.slice(s, j);
			return this.mk(this.afterHash && DIRECTIVE_KEYWORDS.has(word) ? 'directive' : 'id', s, j);
		}

		const two = this.text.slice(s, s + 2);
		if (TWO.has(two)) return this.mk('punct', s, s + 2);
		return this.mk('punct', s, s + 1);
	}

	private scanNumber(start: number): number {
		let j = start;
		if (this.text[j] === '0' && (this.text[j + 1] === 'x' || this.text[j + 1] === 'X') && isHex(this.text[j + 2])) {
			j += 2; while (j < this.n && isHex(this.text[j])) j++;
			return j;
		}
		let sawDot = false;
		while (j < this.n) {
			const ch = this.text[j];
			if (isDigit(ch)) { j++; continue; }
			if (ch === '.' && !sawDot) { sawDot = true; j++; continue; }
			break;
		}
		if (this.text[j] === 'e' || this.text[j] === 'E') {
			let k = j + 1; if (this.text[k] === '+' || this.text[k] === '-') k++;
			if (isDigit(this.text[k])) { j = k; while (j < this.n && isDigit(this.text[j])) j++; }
		}
		return j;
	}

	// A sign only belongs to a number when it cannot be a binary operator.
	private valueBefore(): boolean {
		const t = this.lastSignificant;
		if (!t) return false;
		if (t.kind === 'id' || t.kind === 'number' || t.kind === 'string') return true;
		return t.kind === 'punct' && (t.value === ')' || t.value === ']');
	}

	private mk(kind: TokenKind, start: number, end: number): Token {
		const t: Token = { kind, value: this.text.slice(start, end), span: { start, end }, file: this.file };
		this.i = end;
		if (kind === 'newline') { this.atLineStart = true; this.afterHash = false; }
		else if (kind === 'hash') { this.atLineStart = false; this.afterHash = true; }
		else if (kind !== 'ws' && kind !== 'comment-line' && kind !== 'comment-block' && kind !== 'eof') {
			this.atLineStart = false;
			this.afterHash = false;
			this.lastSignificant = t;
		}
		return t;
	}
}

export function tokenize(text: string, file = '<unknown>'): Token[] {
	const tz = new Tokenizer(text, file);
	const out: Token[] = [];
	for (; ;) { const t = tz.next(); out.push(t); if (t.kind === 'eof') break; }
	return out;
}
