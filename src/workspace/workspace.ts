import { FileHandle } from './fileHandle';
import { type Layer, WorkspaceError } from './layers';
import { VirtualPath } from './vpath';
import { type Logger, defaultLogger } from '../log';

export interface WorkspaceOptions {
	// Layers of kind 'system' only take part when the mount is enabled.
	systemMount?: boolean;
	logger?: Logger;
}

export type WorkspaceEntry = { path: VirtualPath; directory: boolean; layer: string };

const encoder = new TextEncoder();

function toPath(p: VirtualPath | string): VirtualPath {
	return typeof p === 'string' ? VirtualPath.parse(p) : p;
}

/**
 * Several roots merged into one logical path space. Lower priority rank wins; the order is fixed
 * here and never consults modification times.
 *
 * The cache maps (layer, path, version) to an immutable FileHandle. Entries are only replaced by
 * an explicit `bump` or `applyEdit`, so a reader holding a handle keeps a consistent snapshot.
 */
export class Workspace {
	readonly layers: readonly Layer[];
	private readonly logger: Logger;
	private readonly cache = new Map<string, FileHandle>();
	private readonly versions = new Map<string, number>();
	// Editor buffers that take precedence over provider bytes for one (layer, path).
	private readonly overlays = new Map<string, Uint8Array>();

	constructor(layers: Layer[], opts: WorkspaceOptions = {}) {
		if (!layers.length) throw new WorkspaceError('InvalidLayout', 'workspace needs at least one layer');
		const ids = new Set<string>();
		for (const l of layers) {
			if (ids.has(l.id)) throw new WorkspaceError('InvalidLayout', `duplicate layer id "${l.id}"`);
			ids.add(l.id);
		}
		this.logger = opts.logger ?? defaultLogger;
		const mounted = layers.filter(l => l.kind !== 'system' || opts.systemMount);
		this.layers = [...mounted].sort((a, b) => a.priority - b.priority);
		this.logger.debug(`workspace layers: ${this.layers.map(l => `${l.id}(${l.kind}, ${l.priority})`).join(', ')}`);
	}

	layer(id: string): Layer | undefined { return this.layers.find(l => l.id === id); }

	version(p: VirtualPath | string, layerId: string): number {
		return this.versions.get(slotKey(layerId, toPath(p))) ?? 0;
	}

	resolve(p: VirtualPath | string, layerHint?: string): FileHandle | null {
		const vp = toPath(p);
		for (const layer of this.probeOrder(layerHint)) {
			const h = this.handleIn(layer, vp);
			if (h) return h;
		}
		return null;
	}

	read(handle: FileHandle): Uint8Array { return handle.bytes; }

	/**
	 * Resolve an include request made from `current`:
	 * 1. relative request with an existing sibling of the requesting file;
	 * 2. each layer in priority order, at its root then under each search root;
	 * 3. absolute requests only against the highest-priority layer.
	 */
	includeSearch(requested: string, current: FileHandle | null, searchRoots: readonly string[] = []): FileHandle | null {
		if (VirtualPath.isAbsolute(requested)) {
			const top = this.layers[0];
			return top ? this.handleIn(top, VirtualPath.parse(requested)) : null;
		}
		if (current) {
			const sibling = current.path.parent().join(requested);
			const h = this.resolve(sibling, current.layer.id);
			if (h) return h;
		}
		const candidates = [VirtualPath.parse(requested), ...searchRoots.map(r => VirtualPath.parse(r).join(requested))];
		for (const layer of this.layers) {
			for (const c of candidates) {
				const h = this.handleIn(layer, c);
				if (h) return h;
			}
		}
		return null;
	}

	exists(p: VirtualPath | string): boolean {
		const vp = toPath(p);
		return this.layers.some(l => this.overlays.has(slotKey(l.id, vp)) || l.provider.exists(vp));
	}

	// Raw bytes for collaborators that handle non-text assets.
	readBytes(p: VirtualPath | string): Uint8Array | null {
		return this.resolve(p)?.bytes ?? null;
	}

	list(dir: VirtualPath | string): WorkspaceEntry[] {
		const vd = toPath(dir);
		const seen = new Map<string, WorkspaceEntry>();
		for (const layer of this.layers) {
			for (const e of layer.provider.list(vd)) {
				const k = e.name.toLowerCase();
				if (!seen.has(k)) seen.set(k, { path: vd.join(e.name), directory: e.directory, layer: layer.id });
			}
		}
		return [...seen.values()];
	}

	// Signals that content changed underneath; the next read goes back to the provider.
	bump(p: VirtualPath | string, layerId?: string): void {
		const vp = toPath(p);
		const targets = layerId ? this.layers.filter(l => l.id === layerId) : this.layers;
		for (const l of targets) this.bumpSlot(l, vp);
	}

	// Installs editor buffer content as a new version. Without a layer id the edit lands in the
	// layer the path currently resolves to, or the highest-priority layer.
	applyEdit(p: VirtualPath | string, text: string, layerId?: string): FileHandle {
		const vp = toPath(p);
		const layer = (layerId ? this.layer(layerId) : (this.resolve(vp)?.layer ?? this.layers[0]));
		if (!layer) throw new WorkspaceError('InvalidLayout', `unknown layer "${String(layerId)}"`);
		this.overlays.set(slotKey(layer.id, vp), encoder.encode(text));
		this.bumpSlot(layer, vp);
		const h = this.handleIn(layer, vp);
		if (!h) throw new WorkspaceError('ReadFailed', `edit for ${vp.toString()} vanished from the cache`);
		return h;
	}

	// Drops an editor buffer; the provider's bytes become visible again under a new version.
	discardEdit(p: VirtualPath | string, layerId: string): void {
		const vp = toPath(p);
		const layer = this.layer(layerId);
		if (!layer || !this.overlays.delete(slotKey(layerId, vp))) return;
		this.bumpSlot(layer, vp);
	}

	private bumpSlot(layer: Layer, vp: VirtualPath) {
		const slot = slotKey(layer.id, vp);
		const prev = this.versions.get(slot) ?? 0;
		this.cache.delete(`${slot}@${prev}`);
		this.versions.set(slot, prev + 1);
		this.logger.debug(`bump ${layer.id}:${vp.toString()} -> v${prev + 1}`);
	}

	private probeOrder(hint?: string): Layer[] {
		if (!hint) return [...this.layers];
		const first = this.layers.filter(l => l.id === hint);
		return [...first, ...this.layers.filter(l => l.id !== hint)];
	}

	private handleIn(layer: Layer, vp: VirtualPath): FileHandle | null {
		const slot = slotKey(layer.id, vp);
		const version = this.versions.get(slot) ?? 0;
		const key = `${slot}@${version}`;
		const cached = this.cache.get(key);
		if (cached) return cached;
		const bytes = this.overlays.get(slot) ?? layer.provider.read(vp);
		if (!bytes) return null;
		const h = new FileHandle(vp, layer, version, bytes);
		this.cache.set(key, h);
		this.logger.debug(`cache fill ${h.id}`);
		return h;
	}
}

function slotKey(layerId: string, vp: VirtualPath): string {
	return `${layerId}|${vp.key}`;
}
