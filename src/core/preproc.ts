import { type Diagnostic, DiagnosticCollector } from '../diagnostics';
import { type Logger, defaultLogger } from '../log';
import type { FileHandle } from '../workspace/fileHandle';
import type { Workspace } from '../workspace/workspace';
import { evaluateCondition } from './condExpr';
import { type DirectiveLine, parseDirective } from './directives';
import { type ExpanderContext, type TokenSource, type WorkToken, DEFAULT_MAX_EXPANSION_DEPTH, Rescanner, expandAll } from './expander';
import type { OutputToken, SourceLocation } from './location';
import { CONFIG_LOCATION, type MacroDefines, MacroTable } from './macro';
import { type Token, isTrivia } from './tokens';

export type ConditionalStateKind = 'active' | 'skipping-until-else' | 'skipping-else-taken';

export interface ConditionalState {
	state: ConditionalStateKind;
	elseSeen: boolean;
	directive: string;
	at: SourceLocation;
	// Source tokens read before the directive; an unterminated block drops every output token
	// descending from a later read.
	mark: number;
}

export interface PreprocessResult {
	root: string;
	// Active-source trivia included; comments removed; directives never forwarded.
	tokens: OutputToken[];
	diagnostics: Diagnostic[];
	// Virtual paths spliced in, first encounter order.
	includes: string[];
	macros: MacroTable;
	// Every handle the run read, by handle id.
	files: ReadonlyMap<string, FileHandle>;
}

export interface RunSettings {
	defines: MacroDefines;
	searchRoots: readonly string[];
	maxExpansionDepth: number;
	logger: Logger;
}

export const DEFAULT_RUN_SETTINGS: RunSettings = {
	defines: {},
	searchRoots: [],
	maxExpansionDepth: DEFAULT_MAX_EXPANSION_DEPTH,
	logger: defaultLogger,
};

interface OpenFile {
	handle: FileHandle;
	tokens: Token[];
	pos: number;
	conds: ConditionalState[];
}

const CONDITIONALS = new Set(['if', 'ifdef', 'ifndef', 'elif', 'else', 'endif']);

/**
 * One preprocessing run over one top-level file. The run owns its macro table, its diagnostics and
 * the table of file handles it pinned; the workspace is only read.
 */
export class Preprocessor implements TokenSource, ExpanderContext {
	readonly macros: MacroTable;
	readonly diagnostics = new DiagnosticCollector();
	readonly maxDepth: number;
	private readonly workspace: Workspace;
	private readonly settings: RunSettings;
	private readonly logger: Logger;
	private readonly files = new Map<string, FileHandle>();
	// First handle seen per (layer, path); later reads in the run reuse it.
	private readonly pinned = new Map<string, FileHandle>();
	private readonly stack: OpenFile[] = [];
	private readonly includes: string[] = [];
	private output: { token: OutputToken; seq: number }[] = [];
	// Read-order ranges [from, to) dropped by unterminated conditionals.
	private readonly cuts: [number, number][] = [];
	private seq = 0;
	private counter = 0;

	constructor(workspace: Workspace, settings: RunSettings = DEFAULT_RUN_SETTINGS) {
		this.workspace = workspace;
		this.settings = settings;
		this.logger = settings.logger;
		this.maxDepth = settings.maxExpansionDepth;
		this.macros = new MacroTable(this.diagnostics);
		this.macros.seed(settings.defines);
	}

	run(rootPath: string): PreprocessResult {
		const root = this.workspace.resolve(rootPath);
		if (!root) {
			this.diagnostics.report('FileNotFound', `cannot find file '${rootPath}'`, { ...CONFIG_LOCATION, file: rootPath, path: rootPath });
		} else {
			this.open(this.pin(root));
			const rescanner = new Rescanner(this, this);
			for (let t = rescanner.next(); t; t = rescanner.next()) {
				const seq = t.seq ?? this.seq;
				if (this.isCut(seq)) continue;
				this.output.push({
					token: {
						kind: t.kind,
						value: t.value,
						origin: t.origin,
						expansions: t.frame ? t.frame.steps() : [],
						...(t.synthetic ? { synthetic: t.synthetic } : {}),
					},
					seq,
				});
			}
		}
		return {
			root: root ? root.path.toString() : rootPath,
			tokens: this.output.map(o => o.token),
			diagnostics: [...this.diagnostics.all()],
			includes: this.includes,
			macros: this.macros,
			files: this.files,
		};
	}

	locate(t: Token): SourceLocation {
		const h = this.files.get(t.file);
		if (h) return h.locate(t.span.start);
		return { ...CONFIG_LOCATION, file: t.file, path: t.file, offset: t.span.start, column: t.span.start };
	}

	nextCounter(): number { return this.counter++; }

	// Token source for the top-level rescanner: active tokens of the file on top of the include stack.
	next(): WorkToken | null {
		for (; ;) {
			const top = this.stack[this.stack.length - 1];
			if (!top) return null;
			const t = top.tokens[top.pos];
			if (!t || t.kind === 'eof') { this.close(top); continue; }
			if (t.kind === 'hash') {
				let end = top.pos + 1;
				while (end < top.tokens.length && top.tokens[end].kind !== 'newline' && top.tokens[end].kind !== 'eof') end++;
				const line = top.tokens.slice(top.pos, end);
				top.pos = end;
				this.directive(top, parseDirective(line), line);
				continue;
			}
			top.pos++;
			if (!isActive(top)) continue;
			if (t.kind === 'comment-line') continue;
			if (t.kind === 'comment-block') return { kind: 'ws', value: ' ', origin: this.locate(t), frame: null, seq: this.seq++ };
			return { ...this.toWork(t), seq: this.seq++ };
		}
	}

	private toWork(t: Token): WorkToken {
		return { kind: t.kind, value: t.value, origin: this.locate(t), frame: null };
	}

	private pin(h: FileHandle): FileHandle {
		const slot = `${h.layer.id}|${h.path.key}`;
		const prev = this.pinned.get(slot);
		if (prev) return prev;
		this.pinned.set(slot, h);
		this.files.set(h.id, h);
		return h;
	}

	private open(h: FileHandle) {
		this.stack.push({ handle: h, tokens: h.tokens(), pos: 0, conds: [] });
	}

	private close(f: OpenFile) {
		this.stack.pop();
		if (!f.conds.length) return;
		for (const c of f.conds) this.diagnostics.report('UnterminatedConditional', `#${c.directive} without matching #endif`, c.at);
		this.cuts.push([f.conds[0].mark, this.seq]);
		this.output = this.output.filter(o => !this.isCut(o.seq));
	}

	private isCut(seq: number): boolean {
		return this.cuts.some(([from, to]) => seq >= from && seq < to);
	}

	private directive(file: OpenFile, d: DirectiveLine, line: readonly Token[]) {
		const kw = line.find(t => t.kind === 'directive');
		const name = kw && line.indexOf(kw) === firstSignificant(line) ? kw.value : '';
		if (CONDITIONALS.has(name)) { this.conditional(file, d, name); return; }
		if (!isActive(file)) return;
		switch (d.kind) {
			case 'define':
				this.macros.define(d.name.value, d.params, d.body, this.locate(d.name));
				return;
			case 'undef':
				this.macros.undefine(d.name.value);
				return;
			case 'include':
				this.include(file, d.target, d.at);
				return;
			case 'malformed':
				this.diagnostics.report('MalformedDirective', d.message, this.locate(d.at));
				return;
			default:
				return;
		}
	}

	private conditional(file: OpenFile, d: DirectiveLine, name: string) {
		const conds = file.conds;
		const top = conds[conds.length - 1];
		const at = this.locate(d.hash);
		const stray = (msg: string) => this.diagnostics.report('MalformedDirective', msg, at);
		if (name === 'if' || name === 'ifdef' || name === 'ifndef') {
			const entry: ConditionalState = { state: 'skipping-else-taken', elseSeen: false, directive: name, at, mark: this.seq };
			if (isActive(file)) entry.state = this.test(d) ? 'active' : 'skipping-until-else';
			conds.push(entry);
			return;
		}
		if (name === 'endif') {
			if (!top) stray('#endif without matching #if');
			else conds.pop();
			return;
		}
		if (!top) { stray(`#${name} without matching #if`); return; }
		if (top.elseSeen) {
			stray(name === 'else' ? 'second #else in the same conditional' : '#elif after #else');
			top.state = 'skipping-else-taken';
			return;
		}
		if (name === 'else') {
			top.elseSeen = true;
			if (top.state === 'active') top.state = 'skipping-else-taken';
			else if (top.state === 'skipping-until-else') top.state = 'active';
			return;
		}
		if (top.state === 'active') top.state = 'skipping-else-taken';
		else if (top.state === 'skipping-until-else' && this.test(d)) top.state = 'active';
	}

	// Condition of an #if, #ifdef, #ifndef or #elif line read in an active context.
	private test(d: DirectiveLine): boolean {
		switch (d.kind) {
			case 'ifdef': return this.macros.has(d.name.value);
			case 'ifndef': return !this.macros.has(d.name.value);
			case 'if':
			case 'elif': return this.evaluate(d.expr, d.hash);
			case 'malformed':
				this.diagnostics.report('MalformedDirective', d.message, this.locate(d.at));
				return false;
			default:
				return false;
		}
	}

	private evaluate(expr: readonly Token[], hash: Token): boolean {
		const sig = expr.filter(t => !isTrivia(t) && t.kind !== 'eof');
		const work: WorkToken[] = [];
		const fail = (msg: string, t: Token) => {
			this.diagnostics.report('MalformedDirective', msg, this.locate(t));
			return false;
		};
		for (let i = 0; i < sig.length; i++) {
			const t = sig[i];
			if (t.kind !== 'id' || t.value !== 'defined') { work.push(this.toWork(t)); continue; }
			const paren = sig[i + 1]?.kind === 'punct' && sig[i + 1].value === '(';
			const name = sig[paren ? i + 2 : i + 1];
			if (!name || name.kind !== 'id') return fail("'defined' expects a macro name", name ?? t);
			if (paren) {
				const close = sig[i + 3];
				if (!close || close.kind !== 'punct' || close.value !== ')') return fail("missing ')' after 'defined'", close ?? name);
			}
			work.push({ kind: 'number', value: this.macros.has(name.value) ? '1' : '0', origin: this.locate(t), frame: null });
			i += paren ? 3 : 1;
		}
		const r = evaluateCondition(expandAll(work, this));
		if (!r.ok) return fail(`invalid conditional expression: ${r.error}`, sig[0] ?? hash);
		return r.value;
	}

	private include(file: OpenFile, target: string, at: Token) {
		const found = this.workspace.includeSearch(target, file.handle, this.settings.searchRoots);
		if (!found) {
			this.diagnostics.report('FileNotFound', `cannot find include file '${target}'`, this.locate(at));
			return;
		}
		const h = this.pin(found);
		if (this.stack.some(f => f.handle === h)) {
			const chain = [...this.stack.map(f => f.handle.path.toString()), h.path.toString()].join(' -> ');
			this.diagnostics.report('CircularInclude', `circular include: ${chain}`, this.locate(at));
			return;
		}
		const p = h.path.toString();
		if (!this.includes.includes(p)) this.includes.push(p);
		this.logger.debug(`include "${target}" -> ${h.id}`);
		this.open(h);
	}
}

function isActive(f: OpenFile): boolean {
	return f.conds.every(c => c.state === 'active');
}

function firstSignificant(line: readonly Token[]): number {
	for (let i = 1; i < line.length; i++) if (!isTrivia(line[i])) return i;
	return -1;
}
