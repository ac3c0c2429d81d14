import { type TokenKind, isTrivia } from './tokens';

export type CondResult = { ok: true; value: boolean } | { ok: false; error: string };

type Tok = { kind: 'num'; value: number } | { kind: 'ident'; value: string } | { kind: 'op'; value: string } | { kind: 'lparen' } | { kind: 'rparen' };

const OPS = new Set(['&&', '||', '==', '!=', '<=', '>=', '<', '>', '+', '-', '*', '/', '%', '!']);

class ExprError extends Error { }

// Parentheses and unary operators, counted together.
export const MAX_EXPR_NESTING = 256;

function parseNumber(text: string): number {
	const sign = text[0] === '-' ? -1 : 1;
	const body = text[0] === '-' || text[0] === '+' ? text.slice(1) : text;
	const v = /^0[xX]/.test(body) ? parseInt(body.slice(2), 16) : Number(body);
	if (!Number.isFinite(v)) throw new ExprError(`invalid number '${text}'`);
	return sign * v;
}

function lower(tokens: ReadonlyArray<{ kind: TokenKind; value: string }>): Tok[] {
	const toks: Tok[] = [];
	const valueBefore = () => {
		const last = toks[toks.length - 1];
		return !!last && (last.kind === 'num' || last.kind === 'ident' || last.kind === 'rparen');
	};
	for (const t of tokens) {
		if (isTrivia(t) || t.kind === 'eof') continue;
		if (t.kind === 'number') {
			// A signed literal after a value came from a macro body; read the sign as an operator.
			if ((t.value[0] === '-' || t.value[0] === '+') && valueBefore()) {
				toks.push({ kind: 'op', value: t.value[0] });
				toks.push({ kind: 'num', value: parseNumber(t.value.slice(1)) });
			} else toks.push({ kind: 'num', value: parseNumber(t.value) });
			continue;
		}
		if (t.kind === 'id') { toks.push({ kind: 'ident', value: t.value }); continue; }
		if (t.kind === 'punct' && t.value === '(') { toks.push({ kind: 'lparen' }); continue; }
		if (t.kind === 'punct' && t.value === ')') { toks.push({ kind: 'rparen' }); continue; }
		if (t.kind === 'punct' && OPS.has(t.value)) { toks.push({ kind: 'op', value: t.value }); continue; }
		throw new ExprError(`unexpected '${t.value}' in expression`);
	}
	return toks;
}

/**
 * Evaluate a conditional expression whose `defined` operators and macros were already replaced.
 * Identifiers still present evaluate to 0. Arithmetic is integer arithmetic on JS numbers.
 */
export function evaluateCondition(tokens: ReadonlyArray<{ kind: TokenKind; value: string }>): CondResult {
	let toks: Tok[];
	try {
		toks = lower(tokens);
	} catch (err) {
		if (err instanceof ExprError) return { ok: false, error: err.message };
		throw err;
	}
	if (!toks.length) return { ok: false, error: 'empty expression' };

	let p = 0;
	let nesting = 0;
	const enter = () => {
		if (++nesting > MAX_EXPR_NESTING) throw new ExprError(`expression nested deeper than ${MAX_EXPR_NESTING} levels`);
	};
	const peek = (): Tok | undefined => toks[p];
	const peekOp = (): string | undefined => { const t = toks[p]; return t && t.kind === 'op' ? t.value : undefined; };
	const truthy = (v: number) => v !== 0;
	const describe = (t: Tok | undefined) => !t ? 'end of expression' : t.kind === 'lparen' ? "'('" : t.kind === 'rparen' ? "')'" : `'${t.value}'`;

	function parsePrimary(): number {
		const t = peek();
		if (!t) throw new ExprError('expression ends unexpectedly');
		if (t.kind === 'num') { p++; return t.value; }
		if (t.kind === 'ident') { p++; return 0; }
		if (t.kind === 'lparen') {
			p++;
			enter();
			const v = parseOr();
			if (peek()?.kind !== 'rparen') throw new ExprError(`expected ')' but found ${describe(peek())}`);
			p++;
			nesting--;
			return v;
		}
		throw new ExprError(`unexpected ${describe(t)}`);
	}

	function parseUnary(): number {
		const op = peekOp();
		if (op === '!' || op === '+' || op === '-') {
			p++;
			enter();
			const v = parseUnary();
			nesting--;
			if (op === '!') return truthy(v) ? 0 : 1;
			return op === '+' ? v : -v;
		}
		return parsePrimary();
	}

	function parseMul(): number {
		let v = parseUnary();
		for (let op = peekOp(); op === '*' || op === '/' || op === '%'; op = peekOp()) {
			p++;
			const r = parseUnary();
			if (op === '*') { v = v * r; continue; }
			if (r === 0) throw new ExprError('division by zero');
			v = op === '/' ? Math.trunc(v / r) : v % r;
		}
		return v;
	}

	function parseAdd(): number {
		let v = parseMul();
		for (let op = peekOp(); op === '+' || op === '-'; op = peekOp()) {
			p++;
			const r = parseMul();
			v = op === '+' ? v + r : v - r;
		}
		return v;
	}

	function parseRel(): number {
		let v = parseAdd();
		for (let op = peekOp(); op === '<' || op === '>' || op === '<=' || op === '>='; op = peekOp()) {
			p++;
			const r = parseAdd();
			if (op === '<') v = v < r ? 1 : 0;
			else if (op === '>') v = v > r ? 1 : 0;
			else if (op === '<=') v = v <= r ? 1 : 0;
			else v = v >= r ? 1 : 0;
		}
		return v;
	}

	function parseEq(): number {
		let v = parseRel();
		for (let op = peekOp(); op === '==' || op === '!='; op = peekOp()) {
			p++;
			const r = parseRel();
			v = (op === '==') === (v === r) ? 1 : 0;
		}
		return v;
	}

	function parseAnd(): number {
		let v = parseEq();
		while (peekOp() === '&&') {
			p++;
			const r = parseEq();
			v = truthy(v) && truthy(r) ? 1 : 0;
		}
		return v;
	}

	function parseOr(): number {
		let v = parseAnd();
		while (peekOp() === '||') {
			p++;
			const r = parseAnd();
			v = truthy(v) || truthy(r) ? 1 : 0;
		}
		return v;
	}

	try {
		const v = parseOr();
		if (p < toks.length) return { ok: false, error: `unexpected ${describe(toks[p])} after expression` };
		return { ok: true, value: truthy(v) };
	} catch (err) {
		if (err instanceof ExprError) return { ok: false, error: err.message };
		throw err;
	}
}
