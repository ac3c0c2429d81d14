// Logical, layer-independent paths such as `\addons\main\config.cpp`.

const SEP = /[\\/]+/;

function normalizeSegments(parts: readonly string[]): string[] {
	const out: string[] = [];
	for (const p of parts) {
		if (!p || p === '.') continue;
		if (p === '..') { out.pop(); continue; } // clamped at the root
		out.push(p);
	}
	return out;
}

export class VirtualPath {
	readonly segments: readonly string[];
	// Case-folded comparison key; two paths are the same file iff their keys match.
	readonly key: string;

	private constructor(segments: string[]) {
		this.segments = segments;
		this.key = segments.map(s => s.toLowerCase()).join('\\');
	}

	static readonly ROOT = new VirtualPath([]);

	static parse(raw: string): VirtualPath {
		return new VirtualPath(normalizeSegments(raw.trim().split(SEP)));
	}

	static isAbsolute(raw: string): boolean {
		const s = raw.trim();
		return s.startsWith('\\') || s.startsWith('/');
	}

	get name(): string { return this.segments.length ? this.segments[this.segments.length - 1] : ''; }

	get extension(): string {
		const n = this.name;
		const dot = n.lastIndexOf('.');
		return dot > 0 ? n.slice(dot + 1).toLowerCase() : '';
	}

	get isRoot(): boolean { return this.segments.length === 0; }

	parent(): VirtualPath {
		return this.isRoot ? this : new VirtualPath(this.segments.slice(0, -1));
	}

	// Resolve `rel` against this path treated as a directory. Absolute inputs ignore the base.
	join(rel: string): VirtualPath {
		if (VirtualPath.isAbsolute(rel)) return VirtualPath.parse(rel);
		return new VirtualPath(normalizeSegments([...this.segments, ...rel.trim().split(SEP)]));
	}

	equals(other: VirtualPath): boolean { return this.key === other.key; }

	// True when `this` is `dir` itself or lies below it.
	isWithin(dir: VirtualPath): boolean {
		return dir.isRoot || this.key === dir.key || this.key.startsWith(dir.key + '\\');
	}

	toString(): string { return '\\' + this.segments.join('\\'); }
}
