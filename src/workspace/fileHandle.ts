import { TextDocument } from 'vscode-languageserver-textdocument';
import type { Layer } from './layers';
import type { VirtualPath } from './vpath';
import type { SourceLocation } from '../core/location';
import type { Token } from '../core/tokens';
import { tokenize } from '../core/tokenizer';

const decoder = new TextDecoder('utf-8');

/**
 * A resolved (path, layer) pair at one content version. Content is immutable: an edit produces a
 * new handle with a higher version. Tokens and the line index are computed at most once per handle.
 */
export class FileHandle {
	readonly id: string;
	readonly path: VirtualPath;
	readonly layer: Layer;
	readonly version: number;
	readonly bytes: Uint8Array;
	readonly uri: string;
	private decoded: string | null = null;
	// Byte offset of each line start, lines broken as TextDocument breaks them.
	private byteLines: number[] | null = null;
	private doc: TextDocument | null = null;
	private toks: Token[] | null = null;

	constructor(path: VirtualPath, layer: Layer, version: number, bytes: Uint8Array) {
		this.path = path;
		this.layer = layer;
		this.version = version;
		this.bytes = bytes;
		this.id = `${layer.id}:${path.toString()}@${version}`;
		this.uri = layer.provider.uri(path);
	}

	// Decoded on first use so binary assets resolved through the workspace are never decoded.
	get text(): string {
		if (this.decoded === null) this.decoded = decoder.decode(this.bytes);
		return this.decoded;
	}

	// Line-start index lives in the TextDocument; built lazily on first position lookup.
	get document(): TextDocument {
		if (!this.doc) this.doc = TextDocument.create(this.uri, 'config', this.version, this.text);
		return this.doc;
	}

	tokens(): Token[] {
		if (!this.toks) this.toks = tokenize(this.text, this.id);
		return this.toks;
	}

	// `offset` indexes the decoded text; the location carries the matching byte offset.
	locate(offset: number): SourceLocation {
		const pos = this.document.positionAt(offset);
		const lineStart = this.document.offsetAt({ line: pos.line, character: 0 });
		const bytes = this.lineByteStarts()[pos.line] + utf8Length(this.text, lineStart, lineStart + pos.character);
		return { file: this.id, path: this.path.toString(), uri: this.uri, offset: bytes, line: pos.line, column: pos.character };
	}

	private lineByteStarts(): number[] {
		if (this.byteLines) return this.byteLines;
		const text = this.text;
		// The decoder drops a UTF-8 byte order mark; offsets still count it.
		let b = hasBom(this.bytes) ? 3 : 0;
		const starts = [b];
		for (let i = 0; i < text.length; i++) {
			b += utf8Length(text, i, i + 1);
			const ch = text[i];
			if (ch === '\n' || (ch === '\r' && text[i + 1] !== '\n')) starts.push(b);
		}
		this.byteLines = starts;
		return starts;
	}

	lineText(line: number): string {
		return this.document.getText({ start: { line, character: 0 }, end: { line: line + 1, character: 0 } }).replace(/\r?\n$/, '');
	}
}

const hasBom = (bytes: Uint8Array) => bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf;

// UTF-8 length of text[start, end); a surrogate pair counts 4 on its high half.
function utf8Length(text: string, start: number, end: number): number {
	let n = 0;
	for (let i = start; i < end; i++) {
		const c = text.charCodeAt(i);
		if (c < 0x80) n += 1;
		else if (c < 0x800) n += 2;
		else if (c >= 0xd800 && c <= 0xdbff) n += 4;
		else if (c < 0xdc00 || c > 0xdfff) n += 3;
	}
	return n;
}
