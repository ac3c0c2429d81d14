import type { DiagnosticCollector } from '../diagnostics';
import type { SourceLocation } from './location';
import { type Token, isTrivia } from './tokens';
import { tokenize } from './tokenizer';

// Initial defines as they come from configuration.
export type MacroDefines = Record<string, string | number | boolean>;

export type BuiltinName = '__FILE__' | '__LINE__' | '__COUNTER__';
export const BUILTIN_MACROS: readonly BuiltinName[] = ['__FILE__', '__LINE__', '__COUNTER__'];

export interface MacroDefinition {
	name: string;
	// null for object-like macros
	params: readonly string[] | null;
	// Replacement list: trimmed, comments dropped, whitespace runs collapsed to one ' ' token.
	body: readonly Token[];
	// null for built-ins
	location: SourceLocation | null;
	builtin?: BuiltinName;
}

export const CONFIG_FILE_ID = '<config>';

export const CONFIG_LOCATION: SourceLocation = { file: CONFIG_FILE_ID, path: CONFIG_FILE_ID, uri: '', offset: 0, line: 0, column: 0 };

export function normalizeBody(tokens: readonly Token[]): Token[] {
	const out: Token[] = [];
	for (const t of tokens) {
		if (t.kind === 'eof') continue;
		if (isTrivia(t)) {
			const last = out[out.length - 1];
			if (last && last.kind !== 'ws') out.push({ kind: 'ws', value: ' ', span: t.span, file: t.file });
			continue;
		}
		out.push(t);
	}
	while (out.length && out[out.length - 1].kind === 'ws') out.pop();
	return out;
}

function bodySignature(body: readonly Token[]): string {
	return body.map(t => t.kind === 'ws' ? ' ' : t.value).join('');
}

function sameDefinition(a: MacroDefinition, b: MacroDefinition): boolean {
	if ((a.params === null) !== (b.params === null)) return false;
	if (a.params && b.params && a.params.join(',') !== b.params.join(',')) return false;
	return bodySignature(a.body) === bodySignature(b.body);
}

/**
 * Macro table owned by one preprocessing run. Redefinitions are last-write-wins; a differing body
 * is reported once per redefinition with the previous location attached.
 */
export class MacroTable {
	private readonly defs = new Map<string, MacroDefinition>();
	private readonly diagnostics: DiagnosticCollector;

	constructor(diagnostics: DiagnosticCollector) {
		this.diagnostics = diagnostics;
		for (const name of BUILTIN_MACROS) this.defs.set(name, { name, params: null, body: [], location: null, builtin: name });
	}

	define(name: string, params: readonly string[] | null, body: readonly Token[], location: SourceLocation): MacroDefinition {
		const def: MacroDefinition = { name, params, body: normalizeBody(body), location };
		const prev = this.defs.get(name);
		if (prev?.builtin) {
			this.diagnostics.report('MacroRedefined', `definition of '${name}' shadows the built-in macro`, location);
		} else if (prev && !sameDefinition(prev, def)) {
			this.diagnostics.report('MacroRedefined', `macro '${name}' redefined with a different body`, location, {
				related: prev.location ? [{ message: 'previous definition here', location: prev.location }] : [],
			});
		}
		this.defs.set(name, def);
		return def;
	}

	undefine(name: string): boolean { return this.defs.delete(name); }

	lookup(name: string): MacroDefinition | undefined { return this.defs.get(name); }

	has(name: string): boolean { return this.defs.has(name); }

	// Seeds configuration defines; values are lexed as object-like bodies.
	seed(defines: MacroDefines) {
		for (const [name, value] of Object.entries(defines)) {
			const body = tokenize(typeof value === 'boolean' ? (value ? '1' : '0') : String(value), CONFIG_FILE_ID);
			this.define(name, null, body, CONFIG_LOCATION);
		}
	}

	entries(): MacroDefinition[] { return [...this.defs.values()]; }

	// Snapshot in the configuration shape; function-like macros serialize as "(params) body".
	toDefines(): MacroDefines {
		const out: MacroDefines = {};
		for (const d of this.defs.values()) {
			if (d.builtin) continue;
			const body = bodySignature(d.body);
			out[d.name] = d.params ? `(${d.params.join(',')}) ${body}`.trim() : body;
		}
		return out;
	}
}
