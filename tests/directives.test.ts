import { describe, it, expect } from 'vitest';
import { parseDirective } from '../src/core/directives';
import { tokenize } from '../src/core/tokenizer';

const parse = (line: string) => parseDirective(tokenize(line, 'd').filter(t => t.kind !== 'eof'));

describe('directive lines', () => {
	it('parses a function-like define when the parenthesis touches the name', () => {
		const d = parse('#define F(a, b) a + b');
		if (d.kind !== 'define') throw new Error(d.kind);
		expect(d.name.value).toBe('F');
		expect(d.params).toEqual(['a', 'b']);
		expect(d.body.map(t => t.value).join('')).toBe(' a + b');
	});

	it('parses an object-like define when a blank separates the parenthesis', () => {
		const d = parse('#define F (a) a');
		if (d.kind !== 'define') throw new Error(d.kind);
		expect(d.params).toBeNull();
		expect(d.body.map(t => t.value).join('')).toBe(' (a) a');
	});

	it('rejects broken parameter lists', () => {
		const messages = ['#define F(a, a) a', '#define F(a b) a', '#define F(a,) a', '#define F(a'].map(l => {
			const d = parse(l);
			return d.kind === 'malformed' ? d.message : d.kind;
		});
		expect(messages).toEqual([
			"duplicate parameter 'a' in macro 'F'",
			"malformed parameter list for macro 'F'",
			"malformed parameter list for macro 'F'",
			"unterminated parameter list for macro 'F'",
		]);
	});

	it('reads quoted and angle-bracket include targets', () => {
		const quoted = parse('#include "a ""b"".h"');
		expect(quoted.kind === 'include' ? quoted.target : quoted.kind).toBe('a "b".h');
		const angle = parse('#include <sys/defs.h>');
		expect(angle.kind === 'include' ? angle.target : angle.kind).toBe('sys/defs.h');
		const bad = parse('#include');
		expect(bad.kind === 'malformed' ? bad.message : bad.kind).toBe('#include expects "file" or <file>');
	});

	it('classifies the remaining directives', () => {
		expect(parse('#').kind).toBe('empty');
		expect(parse('#  endif // done').kind).toBe('endif');
		const undef = parse('#undef 3');
		expect(undef.kind === 'malformed' ? undef.message : undef.kind).toBe('#undef expects a macro name');
		const cond = parse('#if A > 1');
		expect(cond.kind === 'if' ? cond.expr.filter(t => t.kind !== 'ws').map(t => t.value) : []).toEqual(['A', '>', '1']);
		const unknown = parse('#warning hi');
		expect(unknown.kind === 'malformed' ? unknown.message : unknown.kind).toBe("unknown directive '#warning'");
	});
});
