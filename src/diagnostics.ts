import type { ExpansionStep, SourceLocation } from './core/location';

export const PREPROC_DIAGCODES = {
	FILE_NOT_FOUND: 'PP001',
	CIRCULAR_INCLUDE: 'PP002',
	MACRO_REDEFINED: 'PP010',
	ARGUMENT_COUNT_MISMATCH: 'PP011',
	INVALID_CONCATENATION: 'PP012',
	MACRO_RECURSION_LIMIT: 'PP013',
	UNTERMINATED_CONDITIONAL: 'PP020',
	MALFORMED_DIRECTIVE: 'PP030',
} as const;
export type DiagCode = typeof PREPROC_DIAGCODES[keyof typeof PREPROC_DIAGCODES];

export type DiagKind =
	| 'FileNotFound'
	| 'CircularInclude'
	| 'MacroRedefined'
	| 'ArgumentCountMismatch'
	| 'InvalidConcatenation'
	| 'MacroRecursionLimit'
	| 'UnterminatedConditional'
	| 'MalformedDirective';

// error: output still produced but suspect; note: pure context.
export type Severity = 'error' | 'warning' | 'note';

const KINDS: Record<DiagKind, { code: DiagCode; severity: Severity }> = {
	FileNotFound: { code: PREPROC_DIAGCODES.FILE_NOT_FOUND, severity: 'error' },
	CircularInclude: { code: PREPROC_DIAGCODES.CIRCULAR_INCLUDE, severity: 'error' },
	MacroRedefined: { code: PREPROC_DIAGCODES.MACRO_REDEFINED, severity: 'warning' },
	ArgumentCountMismatch: { code: PREPROC_DIAGCODES.ARGUMENT_COUNT_MISMATCH, severity: 'error' },
	InvalidConcatenation: { code: PREPROC_DIAGCODES.INVALID_CONCATENATION, severity: 'warning' },
	MacroRecursionLimit: { code: PREPROC_DIAGCODES.MACRO_RECURSION_LIMIT, severity: 'error' },
	UnterminatedConditional: { code: PREPROC_DIAGCODES.UNTERMINATED_CONDITIONAL, severity: 'error' },
	MalformedDirective: { code: PREPROC_DIAGCODES.MALFORMED_DIRECTIVE, severity: 'error' },
};

export function diagKindInfo(kind: DiagKind): { code: DiagCode; severity: Severity } {
	return KINDS[kind];
}

export function codesWithSeverity(severity: Severity): DiagCode[] {
	return Object.values(KINDS).filter(k => k.severity === severity).map(k => k.code);
}

const DIAG_VALUES = new Map<string, DiagCode>(Object.values(PREPROC_DIAGCODES).map(c => [c, c]));

// Friendly names derived from the code table: MACRO_REDEFINED -> macro-redefined.
const DIAG_NAME_MAP: Record<string, DiagCode> = (() => {
	const map: Record<string, DiagCode> = {};
	for (const [enumName, code] of Object.entries(PREPROC_DIAGCODES)) {
		map[enumName.toLowerCase().replace(/_/g, '-')] = code;
	}
	return map;
})();

// Accepts a code (PP010), a friendly name (macro-redefined) or a kind name (MacroRedefined).
export function normalizeDiagCode(raw: string | null | undefined): DiagCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const byValue = DIAG_VALUES.get(trimmed.toUpperCase());
	if (byValue) return byValue;
	const canon = trimmed.replace(/([a-z0-9])([A-Z])/g, '$1-$2').toLowerCase().replace(/_/g, '-');
	return DIAG_NAME_MAP[canon] ?? null;
}

export interface RelatedLocation { message: string; location: SourceLocation }

export interface Diagnostic {
	severity: Severity;
	kind: DiagKind;
	code: DiagCode;
	message: string;
	location: SourceLocation;
	related: RelatedLocation[];
	// Expansion history of the token the diagnostic is about, outermost first.
	expansions: readonly ExpansionStep[];
}

/**
 * Append-only list of findings for one run. Reporting never throws; callers read the full list
 * once the run is over and decide whether an error blocks the next build step.
 */
export class DiagnosticCollector {
	private readonly items: Diagnostic[] = [];

	report(kind: DiagKind, message: string, location: SourceLocation, extra: { related?: RelatedLocation[]; expansions?: readonly ExpansionStep[] } = {}): Diagnostic {
		const info = KINDS[kind];
		const d: Diagnostic = {
			severity: info.severity,
			kind,
			code: info.code,
			message,
			location,
			related: extra.related ?? [],
			expansions: extra.expansions ?? [],
		};
		this.items.push(d);
		return d;
	}

	all(): readonly Diagnostic[] { return this.items; }

	get size(): number { return this.items.length; }

	hasErrors(): boolean { return this.items.some(d => d.severity === 'error'); }

	ofKind(kind: DiagKind): Diagnostic[] { return this.items.filter(d => d.kind === kind); }
}
