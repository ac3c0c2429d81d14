import { type Token, isTrivia } from './tokens';

export type Directive =
	| { kind: 'if'; expr: Token[] }
	| { kind: 'elif'; expr: Token[] }
	| { kind: 'else' }
	| { kind: 'endif' }
	| { kind: 'ifdef'; name: Token }
	| { kind: 'ifndef'; name: Token }
	| { kind: 'define'; name: Token; params: string[] | null; body: Token[] }
	| { kind: 'undef'; name: Token }
	| { kind: 'include'; target: string; at: Token }
	| { kind: 'empty' }
	| { kind: 'malformed'; message: string; at: Token };

export type DirectiveLine = Directive & { hash: Token };

const firstSignificant = (tokens: readonly Token[], from = 0): number => {
	for (let i = from; i < tokens.length; i++) if (!isTrivia(tokens[i])) return i;
	return -1;
};

/**
 * Parse one directive line. `line` starts with the hash token and stops before the terminating
 * newline; backslash-newline splices are already plain whitespace tokens.
 */
export function parseDirective(line: readonly Token[]): DirectiveLine {
	const hash = line[0];
	const withHash = (d: Directive): DirectiveLine => ({ ...d, hash });
	const k = firstSignificant(line, 1);
	if (k < 0) return withHash({ kind: 'empty' });
	const kw = line[k];
	if (kw.kind !== 'directive') return withHash({ kind: 'malformed', message: `unknown directive '#${kw.value}'`, at: kw });
	const rest = line.slice(k + 1);
	const head = kw.value;
	switch (head) {
		case 'ifdef':
		case 'ifndef':
		case 'undef': {
			const i = firstSignificant(rest);
			const name = i >= 0 ? rest[i] : undefined;
			if (!name || name.kind !== 'id') return withHash({ kind: 'malformed', message: `#${head} expects a macro name`, at: name ?? kw });
			if (head === 'ifdef') return withHash({ kind: 'ifdef', name });
			return withHash(head === 'ifndef' ? { kind: 'ifndef', name } : { kind: 'undef', name });
		}
		case 'if':
		case 'elif':
			if (firstSignificant(rest) < 0) return withHash({ kind: 'malformed', message: `#${head} with no expression`, at: kw });
			return withHash(head === 'if' ? { kind: 'if', expr: rest } : { kind: 'elif', expr: rest });
		case 'else':
			return withHash({ kind: 'else' });
		case 'endif':
			return withHash({ kind: 'endif' });
		case 'include':
			return withHash(parseInclude(rest, kw));
		case 'define':
			return withHash(parseDefine(rest, kw));
		default:
			return withHash({ kind: 'malformed', message: `unknown directive '#${head}'`, at: kw });
	}
}

function parseInclude(rest: readonly Token[], kw: Token): Directive {
	const i = firstSignificant(rest);
	const first = i >= 0 ? rest[i] : undefined;
	if (first && first.kind === 'string' && first.value.length >= 2 && first.value.startsWith('"') && first.value.endsWith('"')) {
		const target = first.value.slice(1, -1).replace(/""/g, '"');
		if (target.trim()) return { kind: 'include', target, at: first };
	}
	if (first && first.kind === 'punct' && first.value === '<') {
		let target = '';
		for (let j = i + 1; j < rest.length; j++) {
			const t = rest[j];
			if (t.kind === 'punct' && t.value === '>') {
				if (target.trim()) return { kind: 'include', target: target.trim(), at: first };
				break;
			}
			target += t.value;
		}
	}
	return { kind: 'malformed', message: '#include expects "file" or <file>', at: first ?? kw };
}

function parseDefine(rest: readonly Token[], kw: Token): Directive {
	const i = firstSignificant(rest);
	const name = i >= 0 ? rest[i] : undefined;
	if (!name || name.kind !== 'id') return { kind: 'malformed', message: '#define expects a macro name', at: name ?? kw };
	const open = rest[i + 1];
	// A parameter list only when '(' touches the name.
	if (!open || open.kind !== 'punct' || open.value !== '(') return { kind: 'define', name, params: null, body: rest.slice(i + 1) };
	const params: string[] = [];
	let j = i + 2;
	let expectName = true;
	for (; ;) {
		const p = firstSignificant(rest, j);
		if (p < 0) return { kind: 'malformed', message: `unterminated parameter list for macro '${name.value}'`, at: name };
		const t = rest[p];
		j = p + 1;
		if (t.kind === 'punct' && t.value === ')' && (!expectName || params.length === 0)) break;
		if (expectName && t.kind === 'id') {
			if (params.includes(t.value)) return { kind: 'malformed', message: `duplicate parameter '${t.value}' in macro '${name.value}'`, at: t };
			params.push(t.value);
			expectName = false;
			continue;
		}
		if (!expectName && t.kind === 'punct' && t.value === ',') { expectName = true; continue; }
		return { kind: 'malformed', message: `malformed parameter list for macro '${name.value}'`, at: t };
	}
	return { kind: 'define', name, params, body: rest.slice(j) };
}
