import { type Diagnostic as LspDiagnostic, type DiagnosticRelatedInformation, DiagnosticSeverity, Location, Range } from 'vscode-languageserver/node';
import { type SourceLocation, formatLocation } from './core/location';
import type { Diagnostic, Severity } from './diagnostics';
import type { FileHandle } from './workspace/fileHandle';
import { AssertNever } from './utils';

export type FileTable = ReadonlyMap<string, FileHandle>;

// Length of the token starting at the location, clipped to its line; 1 when unknown.
function tokenWidth(loc: SourceLocation, files: FileTable | undefined): number {
	const h = files?.get(loc.file);
	if (!h) return 1;
	const start = h.document.offsetAt({ line: loc.line, character: loc.column });
	const tok = h.tokens().find(t => t.span.start === start && t.kind !== 'eof');
	if (!tok) return 1;
	const line = h.lineText(loc.line);
	return Math.max(1, Math.min(tok.span.end - tok.span.start, line.length - loc.column));
}

function lspSeverity(s: Severity): DiagnosticSeverity {
	switch (s) {
		case 'error': return DiagnosticSeverity.Error;
		case 'warning': return DiagnosticSeverity.Warning;
		case 'note': return DiagnosticSeverity.Information;
		default: return AssertNever(s);
	}
}

function rangeOf(loc: SourceLocation, files: FileTable | undefined): Range {
	return Range.create(loc.line, loc.column, loc.line, loc.column + tokenWidth(loc, files));
}

/**
 * Compiler-style text block:
 *
 *     error[PP001]: cannot find include file 'missing.h'
 *      --> \main.cfg:2:10
 *       |
 *     2 | #include "missing.h"
 *       |          ^^^^^^^^^^^
 *       = note: in expansion of macro 'INC' at \main.cfg:5:1
 */
export function renderDiagnostic(d: Diagnostic, files?: FileTable): string {
	const loc = d.location;
	const h = files?.get(loc.file);
	const lineNo = String(loc.line + 1);
	const pad = ' '.repeat(h ? lineNo.length : 1);
	const out = [`${d.severity}[${d.code}]: ${d.message}`, `${pad}--> ${formatLocation(loc)}`];
	if (h) {
		const text = h.lineText(loc.line);
		const lead = text.slice(0, loc.column).replace(/[^\t]/g, ' ');
		out.push(`${pad} |`, `${lineNo} | ${text}`, `${pad} | ${lead}${'^'.repeat(tokenWidth(loc, files))}`);
	}
	for (const r of d.related) out.push(`${pad} = note: ${r.message} at ${formatLocation(r.location)}`);
	for (const s of d.expansions) out.push(`${pad} = note: in expansion of macro '${s.macro}' at ${formatLocation(s.site)}`);
	return out.join('\n');
}

export function renderDiagnostics(diags: readonly Diagnostic[], files?: FileTable): string {
	return diags.map(d => renderDiagnostic(d, files)).join('\n\n');
}

// Related locations first, then the expansion chain innermost first, as editors list them.
export function toLspDiagnostic(d: Diagnostic, files?: FileTable): LspDiagnostic {
	const related: DiagnosticRelatedInformation[] = [];
	for (const r of d.related) {
		if (r.location.uri) related.push({ location: Location.create(r.location.uri, rangeOf(r.location, files)), message: r.message });
	}
	for (const s of [...d.expansions].reverse()) {
		if (s.site.uri) related.push({ location: Location.create(s.site.uri, rangeOf(s.site, files)), message: `in expansion of macro '${s.macro}'` });
	}
	return {
		range: rangeOf(d.location, files),
		severity: lspSeverity(d.severity),
		code: d.code,
		source: 'modforge',
		message: d.message,
		...(related.length ? { relatedInformation: related } : {}),
	};
}
