import type { DiagnosticCollector } from '../diagnostics';
import { AssertNever } from '../utils';
import { ExpansionFrame, type SourceLocation, type SyntheticKind } from './location';
import type { BuiltinName, MacroDefinition, MacroTable } from './macro';
import { type Token, type TokenKind, isTrivia } from './tokens';
import { tokenize } from './tokenizer';

/**
 * A token moving through the rescanner. `frame` is the invocation whose replacement list produced
 * it (null for tokens read straight from a file); its painted set decides what may still expand.
 */
export interface WorkToken {
	kind: TokenKind;
	value: string;
	origin: SourceLocation;
	frame: ExpansionFrame | null;
	// Reached a painted name once; stays literal for the rest of the run.
	noExpand?: boolean;
	synthetic?: SyntheticKind;
	// Read order of the source token this one descends from.
	seq?: number;
}

export interface TokenSource {
	// null once the source is exhausted
	next(): WorkToken | null;
}

export interface ExpanderContext {
	readonly macros: MacroTable;
	readonly diagnostics: DiagnosticCollector;
	readonly maxDepth: number;
	// Location of a raw token, used for macro body tokens.
	locate(t: Token): SourceLocation;
	nextCounter(): number;
}

export const DEFAULT_MAX_EXPANSION_DEPTH = 64;

export function listSource(tokens: readonly WorkToken[]): TokenSource {
	let i = 0;
	return { next: () => i < tokens.length ? tokens[i++] : null };
}

/**
 * Expand a finite token list. `base` is the depth of the invocation whose argument is being
 * pre-expanded; once an expansion in the list goes past the depth limit, the list comes back
 * as written with its identifiers painted.
 */
export function expandAll(tokens: readonly WorkToken[], ctx: ExpanderContext, base = 0): WorkToken[] {
	const r = new Rescanner(listSource(tokens), ctx, base);
	const out: WorkToken[] = [];
	for (let t = r.next(); t; t = r.next()) {
		if (r.limitReached) return tokens.map(x => x.kind === 'id' ? { ...x, noExpand: true } : x);
		out.push(t);
	}
	return out;
}

const PASTE = Symbol('paste');
// Stands in for an empty argument next to '##'.
const PLACEMARKER = Symbol('placemarker');
type Item = WorkToken | typeof PASTE | typeof PLACEMARKER;

const isWs = (it: Item | undefined): boolean => typeof it === 'object' && it.kind === 'ws';
const isPunct = (t: Pick<Token, 'kind' | 'value'> | null | undefined, value: string): boolean => !!t && t.kind === 'punct' && t.value === value;
const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? '' : 's'}`;

type CallScan =
	| { kind: 'call'; args: WorkToken[][]; consumed: WorkToken[] }
	| { kind: 'unterminated'; consumed: WorkToken[] };

// Drop leading and trailing trivia, collapse inner runs to one ' ' token.
function normalizeArg(tokens: readonly WorkToken[]): WorkToken[] {
	const out: WorkToken[] = [];
	for (const t of tokens) {
		if (isTrivia(t)) {
			const last = out[out.length - 1];
			if (last && last.kind !== 'ws') out.push({ ...t, kind: 'ws', value: ' ' });
			continue;
		}
		out.push(t);
	}
	while (out.length && out[out.length - 1].kind === 'ws') out.pop();
	return out;
}

/**
 * Rescanning macro expansion over a token source. Replacement lists are pushed back onto a
 * pending stack and read again, so nesting depth lives in the frames and not on the JS stack.
 */
export class Rescanner {
	private readonly source: TokenSource;
	private readonly ctx: ExpanderContext;
	private readonly base: number;
	// Next token to read is at the end.
	private readonly pending: WorkToken[] = [];
	private limitHit = false;

	constructor(source: TokenSource, ctx: ExpanderContext, base = 0) {
		this.source = source;
		this.ctx = ctx;
		this.base = base;
	}

	get limitReached(): boolean { return this.limitHit; }

	next(): WorkToken | null {
		for (; ;) {
			const t = this.pull();
			if (!t) return null;
			if (t.kind !== 'id' || t.noExpand) return t;
			const def = this.ctx.macros.lookup(t.value);
			if (!def) return t;
			if (t.frame?.painted.has(def.name)) return { ...t, noExpand: true };
			if (def.builtin) return this.builtin(def.builtin, t);
			if (def.params && !isPunct(this.peekSignificant(), '(')) return t;

			const depth = Math.max(this.base, t.frame?.depth ?? 0) + 1;
			if (depth > this.ctx.maxDepth) {
				this.limitHit = true;
				this.ctx.diagnostics.report('MacroRecursionLimit', `expansion of '${def.name}' exceeds the maximum depth of ${this.ctx.maxDepth}`, t.origin, { expansions: t.frame?.steps() ?? [] });
				return { ...t, noExpand: true };
			}

			let args: WorkToken[][] = [];
			if (def.params) {
				const scan = this.scanCall();
				if (scan.kind === 'unterminated') {
					this.ctx.diagnostics.report('ArgumentCountMismatch', `unterminated argument list invoking macro '${def.name}'`, t.origin, { expansions: t.frame?.steps() ?? [] });
					return this.verbatim(t, scan.consumed);
				}
				args = scan.args.map(normalizeArg);
				if (def.params.length === 0 && args.length === 1 && !args[0].length) args = [];
				if (args.length !== def.params.length) {
					this.ctx.diagnostics.report('ArgumentCountMismatch', `macro '${def.name}' expects ${plural(def.params.length, 'argument')}, got ${args.length}`, t.origin, { expansions: t.frame?.steps() ?? [] });
					return this.verbatim(t, scan.consumed);
				}
			}
			const frame = new ExpansionFrame(def.name, t.origin, t.frame, depth);
			const replacement = this.substitute(def, frame, args);
			for (let i = replacement.length - 1; i >= 0; i--) {
				const r = replacement[i];
				this.pending.push(r.seq === undefined && t.seq !== undefined ? { ...r, seq: t.seq } : r);
			}
		}
	}

	private pull(): WorkToken | null {
		return this.pending.pop() ?? this.source.next();
	}

	private unread(tokens: readonly WorkToken[]) {
		for (let i = tokens.length - 1; i >= 0; i--) this.pending.push(tokens[i]);
	}

	private peekSignificant(): WorkToken | null {
		const seen: WorkToken[] = [];
		let t = this.pull();
		while (t && isTrivia(t)) { seen.push(t); t = this.pull(); }
		if (t) seen.push(t);
		this.unread(seen);
		return t;
	}

	// The next significant token is known to be '('.
	private scanCall(): CallScan {
		const consumed: WorkToken[] = [];
		let t = this.pull();
		while (t && t.kind !== 'punct') { consumed.push(t); t = this.pull(); }
		if (t) consumed.push(t);
		const args: WorkToken[][] = [[]];
		let depth = 0;
		for (; ;) {
			const a = this.pull();
			if (!a) return { kind: 'unterminated', consumed };
			consumed.push(a);
			if (a.kind === 'punct' && a.value === '(') depth++;
			else if (a.kind === 'punct' && a.value === ')') {
				if (depth === 0) return { kind: 'call', args, consumed };
				depth--;
			} else if (depth === 0 && a.kind === 'punct' && a.value === ',') {
				args.push([]);
				continue;
			}
			args[args.length - 1].push(a.kind === 'newline' ? { ...a, kind: 'ws', value: ' ' } : a);
		}
	}

	// Invocation left as written: every identifier in it is painted.
	private verbatim(name: WorkToken, consumed: readonly WorkToken[]): WorkToken {
		this.unread(consumed.map(c => c.kind === 'id' ? { ...c, noExpand: true } : c));
		return { ...name, noExpand: true };
	}

	private builtin(name: BuiltinName, t: WorkToken): WorkToken {
		const site = t.frame ? t.frame.outermostSite() : t.origin;
		const mk = (kind: TokenKind, value: string): WorkToken => ({ kind, value, origin: t.origin, frame: t.frame, synthetic: 'builtin', seq: t.seq });
		switch (name) {
			case '__FILE__': return mk('string', `"${site.path.replace(/"/g, '""')}"`);
			case '__LINE__': return mk('number', String(site.line + 1));
			case '__COUNTER__': return mk('number', String(this.ctx.nextCounter()));
			default: return AssertNever(name, `unknown built-in macro ${String(name)}`);
		}
	}

	private substitute(def: MacroDefinition, frame: ExpansionFrame, args: readonly WorkToken[][]): WorkToken[] {
		const params = def.params ?? [];
		const body = def.body;
		const nextSig = (i: number) => { let j = i + 1; while (j < body.length && body[j].kind === 'ws') j++; return j; };
		const prevSig = (i: number) => { let j = i - 1; while (j >= 0 && body[j].kind === 'ws') j--; return j; };
		const expanded = new Map<number, WorkToken[]>();
		const rebase = this.rebaser(frame);
		const items: Item[] = [];
		for (let i = 0; i < body.length; i++) {
			const b = body[i];
			if (def.params && isPunct(b, '#')) {
				const j = nextSig(i);
				const p = j < body.length && body[j].kind === 'id' ? params.indexOf(body[j].value) : -1;
				if (p >= 0) {
					items.push(stringize(args[p], frame));
					i = j;
					continue;
				}
			}
			if (isPunct(b, '##')) { items.push(PASTE); continue; }
			const p = b.kind === 'id' ? params.indexOf(b.value) : -1;
			if (p < 0) {
				items.push({ kind: b.kind, value: b.value, origin: this.ctx.locate(b), frame });
				continue;
			}
			// Operands of '##' are substituted unexpanded.
			const pasted = isPunct(body[prevSig(i)], '##') || isPunct(body[nextSig(i)], '##');
			let src = args[p];
			if (!pasted) {
				const hit = expanded.get(p);
				src = hit ?? expandAll(args[p], this.ctx, frame.depth);
				if (!hit) expanded.set(p, src);
			}
			if (!src.length && pasted) items.push(PLACEMARKER);
			for (const a of src) items.push({ ...a, frame: rebase(a.frame) });
		}
		return this.paste(items, frame);
	}

	// Moves argument tokens under the new frame, keeping any expansion that happened inside the
	// argument as a nested step.
	private rebaser(frame: ExpansionFrame): (f: ExpansionFrame | null) => ExpansionFrame {
		const anchors = new Set<ExpansionFrame>();
		for (let f = frame.parent; f; f = f.parent) anchors.add(f);
		const moved = new Map<ExpansionFrame, ExpansionFrame>();
		const rebase = (f: ExpansionFrame | null): ExpansionFrame => {
			if (!f || anchors.has(f)) return frame;
			const hit = moved.get(f);
			if (hit) return hit;
			const r = new ExpansionFrame(f.macro, f.site, rebase(f.parent));
			moved.set(f, r);
			return r;
		};
		return rebase;
	}

	private paste(items: readonly Item[], frame: ExpansionFrame): WorkToken[] {
		const out: Item[] = [];
		for (let i = 0; i < items.length; i++) {
			const it = items[i];
			if (it !== PASTE) { out.push(it); continue; }
			while (isWs(out[out.length - 1])) out.pop();
			let j = i + 1;
			while (j < items.length && isWs(items[j])) j++;
			const left = out.pop();
			let right: Item | undefined = j < items.length ? items[j] : undefined;
			if (right === PASTE) { right = undefined; j--; }
			i = j;
			out.push(this.merge(left, right, frame));
		}
		const tokens: WorkToken[] = [];
		for (const it of out) if (typeof it === 'object') tokens.push(it);
		return tokens;
	}

	private merge(left: Item | undefined, right: Item | undefined, frame: ExpansionFrame): Item {
		const l = typeof left === 'object' ? left : null;
		const r = typeof right === 'object' ? right : null;
		if (!l || !r) return l ?? r ?? PLACEMARKER;
		const text = l.value + r.value;
		// Lexed after a blank so a leading '#' is not read as a directive hash.
		const lexed = tokenize(' ' + text, frame.site.file).slice(1).filter(t => t.kind !== 'eof');
		const valid = lexed.length === 1 && !isTrivia(lexed[0]);
		if (!valid) {
			this.ctx.diagnostics.report('InvalidConcatenation', `pasting '${l.value}' and '${r.value}' does not give a valid token`, frame.site, { expansions: frame.steps() });
		}
		return { kind: valid ? lexed[0].kind : 'punct', value: text, origin: frame.site, frame, synthetic: 'concat' };
	}
}

function stringize(arg: readonly WorkToken[], frame: ExpansionFrame): WorkToken {
	const text = arg.map(t => t.kind === 'ws' ? ' ' : t.value).join('');
	return { kind: 'string', value: `"${text.replace(/"/g, '""')}"`, origin: frame.site, frame, synthetic: 'stringize' };
}
