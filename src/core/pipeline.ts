import { filterDiagnostics, parseDisabledDiagList } from '../diagSettings';
import { type Logger, defaultLogger } from '../log';
import { MemoryProvider } from '../workspace/layers';
import type { VirtualPath } from '../workspace/vpath';
import { Workspace } from '../workspace/workspace';
import { DEFAULT_MAX_EXPANSION_DEPTH } from './expander';
import type { OutputToken } from './location';
import type { MacroDefines } from './macro';
import { type PreprocessResult, Preprocessor } from './preproc';
import { isTrivia } from './tokens';

export type PreprocessOptions = {
	defines?: MacroDefines;
	// Extra directories probed under every layer root for includes.
	searchRoots?: readonly string[];
	maxExpansionDepth?: number;
	// Codes or friendly names; an array or a comma/space separated list.
	disabledDiagnostics?: readonly string[] | string;
	logger?: Logger;
};

export function preprocess(workspace: Workspace, rootPath: VirtualPath | string, opts: PreprocessOptions = {}): PreprocessResult {
	const logger = opts.logger ?? defaultLogger;
	const started = Date.now();
	const run = new Preprocessor(workspace, {
		defines: opts.defines ?? {},
		searchRoots: opts.searchRoots ?? [],
		maxExpansionDepth: opts.maxExpansionDepth ?? DEFAULT_MAX_EXPANSION_DEPTH,
		logger,
	});
	const result = run.run(rootPath.toString());
	const diagnostics = filterDiagnostics(result.diagnostics, parseDisabledDiagList(opts.disabledDiagnostics));
	logger.debug(`preprocessed ${result.root}: ${result.tokens.length} tokens, ${result.includes.length} includes, ${diagnostics.length} diagnostics in ${Date.now() - started}ms`);
	return { ...result, diagnostics };
}

// Independent top-level files against one workspace; each run has its own macro table.
export function preprocessFiles(workspace: Workspace, roots: ReadonlyArray<VirtualPath | string>, opts: PreprocessOptions = {}): PreprocessResult[] {
	return roots.map(r => preprocess(workspace, r, opts));
}

// Single in-memory file (plus optional siblings), mostly for tests and editor previews.
export function preprocessText(text: string, opts: PreprocessOptions & { path?: string; files?: Record<string, string> } = {}): PreprocessResult {
	const path = opts.path ?? 'main.cfg';
	const provider = new MemoryProvider({ ...opts.files, [path]: text });
	const workspace = new Workspace([{ id: 'memory', priority: 0, kind: 'source', provider }], { logger: opts.logger });
	return preprocess(workspace, path, opts);
}

export function significantTokens(tokens: readonly OutputToken[]): OutputToken[] {
	return tokens.filter(t => !isTrivia(t));
}

export function renderText(tokens: readonly OutputToken[]): string {
	return tokens.map(t => t.value).join('');
}
