import { describe, it, expect } from 'vitest';
import { MemoryProvider } from '../src/workspace/layers';
import { Workspace } from '../src/workspace/workspace';
import { memoryWorkspace } from './testUtils';

describe('file handles', () => {
	const ws = memoryWorkspace([{ id: 'm', files: { 'dir/a.h': 'ab\nçd\n' } }]);
	const h = ws.resolve('dir/a.h');

	it('maps text positions to byte offsets, 0-based lines and UTF-16 columns', () => {
		expect(h?.locate(4)).toEqual({ file: 'm:\\dir\\a.h@0', path: '\\dir\\a.h', uri: 'memory://m/dir/a.h', offset: 5, line: 1, column: 1 });
		expect(h?.lineText(1)).toBe('çd');
	});

	it('counts surrogate pairs as four bytes', () => {
		const emoji = memoryWorkspace([{ id: 'e', files: { 'e.h': 'x\r\n\u{1F600}y' } }]).resolve('e.h');
		expect(emoji?.locate(5)).toMatchObject({ offset: 7, line: 1, column: 2 });
	});

	it('counts a byte order mark the decoder dropped', () => {
		const bytes = new Uint8Array([0xef, 0xbb, 0xbf, 0x61, 0x0a, 0x62]);
		const bom = new Workspace([{ id: 'b', priority: 0, kind: 'source', provider: new MemoryProvider({ 'b.h': bytes }, 'b') }]).resolve('b.h');
		expect(bom?.text).toBe('a\nb');
		expect(bom?.locate(2)).toMatchObject({ offset: 5, line: 1, column: 0 });
	});

	it('tokenizes once per version', () => {
		expect(h?.tokens()).toBe(h?.tokens());
		expect(h?.tokens()[0].file).toBe('m:\\dir\\a.h@0');
	});
});
