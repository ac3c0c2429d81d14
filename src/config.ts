import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from '../common/workspaceConfig.schema.json';
import type { PreprocessOptions } from './core/pipeline';
import type { MacroDefines } from './core/macro';
import { type Logger, createLogger } from './log';
import { type Layer, type LayerKind, PhysicalProvider } from './workspace/layers';
import { Workspace } from './workspace/workspace';

export interface LayerConfig {
	id?: string;
	// Relative paths are resolved against the configuration file's directory.
	path: string;
	priority?: number;
	kind?: LayerKind;
}

export interface WorkspaceConfig {
	layers: LayerConfig[];
	systemMount?: boolean;
	searchRoots?: string[];
	defines?: MacroDefines;
	maxExpansionDepth?: number;
	diagnostics?: { disable?: string[] | string };
	debug?: boolean;
	logFile?: string;
}

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validate = ajv.compile<WorkspaceConfig>(schema);

// Parse and validate YAML (or JSON) configuration text; layer paths and the log file are made
// absolute against baseDir.
export function parseWorkspaceConfig(raw: string, baseDir: string, source = '<inline>'): WorkspaceConfig {
	let obj: unknown;
	try {
		obj = yaml.load(raw, { json: true });
	} catch (err) {
		throw new Error(`Workspace configuration "${source}" could not be parsed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
	}
	if (!obj) throw new Error(`Workspace configuration "${source}" appears to be empty`);
	if (!validate(obj)) {
		const msg = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('\n');
		throw new Error(`Workspace configuration schema validation failed:\n${msg}`);
	}
	return {
		...obj,
		layers: obj.layers.map(l => ({ ...l, path: path.resolve(baseDir, l.path) })),
		...(obj.logFile ? { logFile: path.resolve(baseDir, obj.logFile) } : {}),
	};
}

export function loadWorkspaceConfig(file: string): WorkspaceConfig {
	const resolved = path.resolve(file);
	let raw: string;
	try {
		raw = fs.readFileSync(resolved, 'utf8');
	} catch (err) {
		throw new Error(`Workspace configuration "${resolved}" could not be read`, { cause: err });
	}
	return parseWorkspaceConfig(raw, path.dirname(resolved), resolved);
}

export function loggerFrom(config: WorkspaceConfig): Logger {
	return createLogger({ debug: config.debug, logFile: config.logFile || undefined });
}

// Physical layers in declaration order; a layer without a priority ranks by its position.
export function createWorkspace(config: WorkspaceConfig, logger: Logger = loggerFrom(config)): Workspace {
	const layers: Layer[] = config.layers.map((l, i) => ({
		id: l.id ?? l.path,
		priority: l.priority ?? i,
		kind: l.kind ?? 'source',
		provider: new PhysicalProvider(l.path),
	}));
	return new Workspace(layers, { systemMount: config.systemMount, logger });
}

export function preprocessOptionsFrom(config: WorkspaceConfig, logger: Logger = loggerFrom(config)): PreprocessOptions {
	return {
		defines: config.defines ?? {},
		searchRoots: config.searchRoots ?? [],
		maxExpansionDepth: config.maxExpansionDepth,
		disabledDiagnostics: config.diagnostics?.disable,
		logger,
	};
}
