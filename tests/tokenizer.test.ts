import { describe, it, expect } from 'vitest';
import { tokenize } from '../src/core/tokenizer';

const kv = (text: string) => tokenize(text, 'f').map(t => `${t.kind}:${t.value}`);

describe('tokenizer', () => {
	it('folds a sign into a number only where it cannot be an operator', () => {
		expect(kv('a = -1 + b-2;\n')).toEqual([
			'id:a', 'ws: ', 'punct:=', 'ws: ', 'number:-1', 'ws: ', 'punct:+', 'ws: ',
			'id:b', 'punct:-', 'number:2', 'punct:;', 'newline:\n', 'eof:',
		]);
	});

	it('marks directive hashes and keywords at line start only', () => {
		expect(kv('#define X 1\n  # if X\n#pragma once\n')).toEqual([
			'hash:#', 'directive:define', 'ws: ', 'id:X', 'ws: ', 'number:1', 'newline:\n',
			'ws:  ', 'hash:#', 'ws: ', 'directive:if', 'ws: ', 'id:X', 'newline:\n',
			'hash:#', 'id:pragma', 'ws: ', 'id:once', 'newline:\n', 'eof:',
		]);
		expect(kv('a # b ## c')).toEqual(['id:a', 'ws: ', 'punct:#', 'ws: ', 'id:b', 'ws: ', 'punct:##', 'ws: ', 'id:c', 'eof:']);
	});

	it('reads doubled quotes as escapes and cuts unterminated strings at the line end', () => {
		expect(kv(`"say ""hi""" 'x'`)).toEqual(['string:"say ""hi"""', 'ws: ', `string:'x'`, 'eof:']);
		expect(kv('"abc\nx')).toEqual(['string:"abc', 'newline:\n', 'id:x', 'eof:']);
	});

	it('keeps comments as single tokens', () => {
		expect(kv('a // c\nb /* x\ny */ c')).toEqual([
			'id:a', 'ws: ', 'comment-line:// c', 'newline:\n', 'id:b', 'ws: ', 'comment-block:/* x\ny */', 'ws: ', 'id:c', 'eof:',
		]);
	});

	it('turns a backslash-newline into whitespace so the line continues', () => {
		expect(kv('#define A 1 \\\n + 2\n')).toEqual([
			'hash:#', 'directive:define', 'ws: ', 'id:A', 'ws: ', 'number:1', 'ws: ', 'ws:\\\n', 'ws: ', 'punct:+', 'ws: ', 'number:2', 'newline:\n', 'eof:',
		]);
	});

	it('scans hex, fractions and exponents', () => {
		expect(kv('0x1F 1.5e3 .5 3').filter(s => s.startsWith('number'))).toEqual(['number:0x1F', 'number:1.5e3', 'number:.5', 'number:3']);
	});

	it('scans two-character operators as one token', () => {
		expect(kv('a==b&&c||d<=e').filter(s => s.startsWith('punct'))).toEqual(['punct:==', 'punct:&&', 'punct:||', 'punct:<=']);
	});

	it('tiles the source with contiguous spans', () => {
		const text = '#if A // x\r\nfoo(1, "s") /* b */\n#endif';
		const toks = tokenize(text, 'f');
		expect(toks.map(t => t.value).join('')).toBe(text);
		for (let i = 1; i < toks.length; i++) expect(toks[i].span.start).toBe(toks[i - 1].span.end);
		expect(toks.every(t => t.file === 'f')).toBe(true);
	});
});
