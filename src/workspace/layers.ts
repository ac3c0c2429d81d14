import fs from 'node:fs';
import path from 'node:path';
import { URI } from 'vscode-uri';
import { VirtualPath } from './vpath';

export type LayerKind = 'source' | 'include' | 'system';

export type WorkspaceErrorCode = 'RootInaccessible' | 'ReadFailed' | 'InvalidLayout';

// Fatal workspace failure. Everything else the preprocessor meets is reported as a diagnostic.
export class WorkspaceError extends Error {
	readonly code: WorkspaceErrorCode;
	constructor(code: WorkspaceErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'WorkspaceError';
		this.code = code;
	}
}

export type DirEntry = { name: string; directory: boolean };

// Read-only byte source behind one layer.
export interface ByteProvider {
	readonly description: string;
	exists(p: VirtualPath): boolean;
	read(p: VirtualPath): Uint8Array | null;
	list(dir: VirtualPath): DirEntry[];
	uri(p: VirtualPath): string;
}

export interface Layer {
	id: string;
	// Lower rank wins.
	priority: number;
	kind: LayerKind;
	provider: ByteProvider;
}

function errnoCode(err: unknown): string | undefined {
	return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

const MISSING = new Set(['ENOENT', 'ENOTDIR']);

const encoder = new TextEncoder();

export class MemoryProvider implements ByteProvider {
	readonly description: string;
	private readonly files = new Map<string, { path: VirtualPath; bytes: Uint8Array }>();

	constructor(files: Record<string, string | Uint8Array> = {}, description = 'memory') {
		this.description = description;
		for (const [p, content] of Object.entries(files)) this.set(p, content);
	}

	// Replaces content in place; the workspace only sees it after a version bump.
	set(p: string, content: string | Uint8Array) {
		const vp = VirtualPath.parse(p);
		const bytes = typeof content === 'string' ? encoder.encode(content) : new Uint8Array(content);
		this.files.set(vp.key, { path: vp, bytes });
	}

	delete(p: string) { this.files.delete(VirtualPath.parse(p).key); }

	exists(p: VirtualPath): boolean { return this.files.has(p.key); }

	read(p: VirtualPath): Uint8Array | null {
		const f = this.files.get(p.key);
		return f ? f.bytes : null;
	}

	list(dir: VirtualPath): DirEntry[] {
		const seen = new Map<string, DirEntry>();
		const depth = dir.segments.length;
		for (const f of this.files.values()) {
			if (f.path.segments.length <= depth || !f.path.isWithin(dir)) continue;
			const name = f.path.segments[depth];
			const directory = f.path.segments.length > depth + 1;
			const k = name.toLowerCase();
			const prev = seen.get(k);
			if (!prev) seen.set(k, { name, directory });
			else if (directory) prev.directory = true;
		}
		return [...seen.values()];
	}

	uri(p: VirtualPath): string {
		return URI.from({ scheme: 'memory', authority: this.description, path: '/' + p.segments.join('/') }).toString();
	}
}

// A directory on disk. Segments are matched case-insensitively so that layouts authored on
// Windows resolve the same way on case-sensitive filesystems.
export class PhysicalProvider implements ByteProvider {
	readonly description: string;
	readonly root: string;

	constructor(root: string) {
		this.root = path.resolve(root);
		this.description = this.root;
		this.assertRoot();
	}

	private assertRoot() {
		let ok = false;
		try { ok = fs.statSync(this.root).isDirectory(); } catch (err) {
			throw new WorkspaceError('RootInaccessible', `layer root ${this.root} is not accessible`, { cause: err });
		}
		if (!ok) throw new WorkspaceError('RootInaccessible', `layer root ${this.root} is not a directory`);
	}

	// Physical path for a virtual one, or null when any segment is missing.
	locate(p: VirtualPath): string | null {
		this.assertRoot();
		let cur = this.root;
		for (const seg of p.segments) {
			const direct = path.join(cur, seg);
			if (this.statOrNull(direct)) { cur = direct; continue; }
			let entries: string[];
			try { entries = fs.readdirSync(cur); } catch (err) {
				if (MISSING.has(errnoCode(err) ?? '')) return null;
				throw new WorkspaceError('ReadFailed', `failed to list ${cur}`, { cause: err });
			}
			const lower = seg.toLowerCase();
			const match = entries.find(e => e.toLowerCase() === lower);
			if (!match) return null;
			cur = path.join(cur, match);
		}
		return cur;
	}

	private statOrNull(p: string): fs.Stats | null {
		try { return fs.statSync(p); } catch (err) {
			if (MISSING.has(errnoCode(err) ?? '')) return null;
			throw new WorkspaceError('ReadFailed', `failed to stat ${p}`, { cause: err });
		}
	}

	exists(p: VirtualPath): boolean {
		const loc = this.locate(p);
		if (!loc) return false;
		const st = this.statOrNull(loc);
		return !!st && st.isFile();
	}

	read(p: VirtualPath): Uint8Array | null {
		const loc = this.locate(p);
		if (!loc) return null;
		try {
			return new Uint8Array(fs.readFileSync(loc));
		} catch (err) {
			const code = errnoCode(err);
			if (MISSING.has(code ?? '') || code === 'EISDIR') return null;
			throw new WorkspaceError('ReadFailed', `failed to read ${loc}`, { cause: err });
		}
	}

	list(dir: VirtualPath): DirEntry[] {
		const loc = this.locate(dir);
		if (!loc) return [];
		try {
			return fs.readdirSync(loc, { withFileTypes: true }).map(d => ({ name: d.name, directory: d.isDirectory() }));
		} catch (err) {
			if (MISSING.has(errnoCode(err) ?? '')) return [];
			throw new WorkspaceError('ReadFailed', `failed to list ${loc}`, { cause: err });
		}
	}

	uri(p: VirtualPath): string {
		return URI.file(this.locate(p) ?? path.join(this.root, ...p.segments)).toString();
	}
}
