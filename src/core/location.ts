import type { TokenKind } from './tokens';

// A point in one physical file. `offset` counts bytes of the file's content; line and column are
// 0-based UTF-16 positions, as in LSP.
export interface SourceLocation {
	file: string;
	path: string;
	uri: string;
	offset: number;
	line: number;
	column: number;
}

export interface ExpansionStep { macro: string; site: SourceLocation }

export type SyntheticKind = 'concat' | 'stringize' | 'builtin';

/**
 * One macro invocation being rescanned. Frames link to the frame their invocation token came
 * from, so the painted set and the depth follow the expansion history rather than the JS stack.
 */
export class ExpansionFrame {
	readonly macro: string;
	readonly site: SourceLocation;
	readonly parent: ExpansionFrame | null;
	readonly depth: number;
	readonly painted: ReadonlySet<string>;
	private chain: ExpansionStep[] | null = null;

	// `depth` is given when the frame nests inside an argument being pre-expanded, where the
	// parent chain does not yet reach the enclosing invocation.
	constructor(macro: string, site: SourceLocation, parent: ExpansionFrame | null, depth = parent ? parent.depth + 1 : 1) {
		this.macro = macro;
		this.site = site;
		this.parent = parent;
		this.depth = depth;
		this.painted = new Set([...(parent ? parent.painted : []), macro]);
	}

	// Outermost invocation first.
	steps(): ExpansionStep[] {
		if (!this.chain) this.chain = [...(this.parent ? this.parent.steps() : []), { macro: this.macro, site: this.site }];
		return this.chain;
	}

	outermostSite(): SourceLocation {
		return this.parent ? this.parent.outermostSite() : this.site;
	}
}

export interface OutputToken {
	kind: TokenKind;
	value: string;
	// Literal authored position; for synthetic tokens, the invocation that produced them.
	origin: SourceLocation;
	expansions: readonly ExpansionStep[];
	synthetic?: SyntheticKind;
}

// [literal origin, ...invocation sites], innermost expansion last.
export function locationChain(t: Pick<OutputToken, 'origin' | 'expansions'>): SourceLocation[] {
	return [t.origin, ...t.expansions.map(s => s.site)];
}

export function formatLocation(loc: SourceLocation): string {
	return `${loc.path}:${loc.line + 1}:${loc.column + 1}`;
}
