import { type Diagnostic, type DiagCode, type Severity, codesWithSeverity, normalizeDiagCode } from './diagnostics';

export type DisabledDiagnostics = readonly string[] | string | undefined;

// Group names standing for every code of one severity.
const SEVERITY_GROUPS = new Map<string, Severity>([['warnings', 'warning'], ['notes', 'note']]);

/**
 * Canonical codes for a disabled list. Entries are codes (PP010), friendly names
 * (macro-redefined), kind names (MacroRedefined) or a severity group (warnings); a string is
 * split on commas and blanks. Unknown entries are ignored.
 */
export function parseDisabledDiagList(input: DisabledDiagnostics): Set<DiagCode> {
	const out = new Set<DiagCode>();
	const entries = typeof input === 'string' ? input.split(/[,\s]+/) : input ?? [];
	for (const raw of entries) {
		const group = SEVERITY_GROUPS.get(raw.trim().toLowerCase());
		if (group) {
			for (const code of codesWithSeverity(group)) out.add(code);
			continue;
		}
		const code = normalizeDiagCode(raw);
		if (code) out.add(code);
	}
	return out;
}

export function filterDiagnostics(diags: ReadonlyArray<Diagnostic>, disabled: ReadonlySet<DiagCode>): Diagnostic[] {
	return diags.filter(d => !disabled.has(d.code));
}
