import { describe, it, expect } from 'vitest';
import { preprocessText, renderText, significantTokens } from '../src/core/pipeline';
import { codes, texts } from './testUtils';

describe('expansion: object-like and function-like', () => {
	it('substitutes object-like macros', () => {
		expect(texts(preprocessText('#define N 10\nx = N;\n'))).toEqual(['x', '=', '10', ';']);
	});

	it('leaves a self-referencing name painted', () => {
		const r = preprocessText('#define X X + 1\nX\n');
		expect(texts(r)).toEqual(['X', '+', '1']);
		expect(codes(r)).toEqual([]);
	});

	it('stops mutual recursion through the painted set', () => {
		expect(texts(preprocessText('#define A B\n#define B A\nA B\n'))).toEqual(['A', 'B']);
	});

	it('substitutes arguments and keeps body spacing', () => {
		const r = preprocessText('#define ADD(a, b) ((a) + (b))\nADD(1, 2*3)\n');
		expect(texts(r)).toEqual(['(', '(', '1', ')', '+', '(', '2', '*', '3', ')', ')']);
		expect(renderText(r.tokens)).toBe('\n((1) + (2*3))\n');
	});

	it('emits a function-like name without a call as a plain identifier', () => {
		const r = preprocessText('#define F(x) x\nint F;\n');
		expect(texts(r)).toEqual(['int', 'F', ';']);
		expect(codes(r)).toEqual([]);
	});

	it('does not split arguments on commas inside parentheses', () => {
		expect(texts(preprocessText('#define FIRST(a, b) a\nFIRST((1, 2), 3)\n'))).toEqual(['(', '1', ',', '2', ')']);
	});

	it('reads arguments across lines', () => {
		expect(texts(preprocessText('#define F(x, y) x y\nF(1,\n  2)\n'))).toEqual(['1', '2']);
	});

	it('expands arguments before substitution', () => {
		expect(texts(preprocessText('#define TWICE(x) x x\n#define ONE 1\nTWICE(ONE)\n'))).toEqual(['1', '1']);
	});

	it('takes the call parentheses from the text after a replacement', () => {
		expect(texts(preprocessText('#define G F\n#define F(x) [x]\nG(3)\n'))).toEqual(['[', '3', ']']);
	});

	it('expands a macro with an empty parameter list', () => {
		expect(texts(preprocessText('#define NOW() 5\nNOW()\n'))).toEqual(['5']);
	});

	it('expands the same invocation identically each time', () => {
		const r = preprocessText('#define P(x) <x>\nP(a) P(a)\n');
		const [first, second] = [texts(r).slice(0, 3), texts(r).slice(3)];
		expect(first).toEqual(['<', 'a', '>']);
		expect(second).toEqual(first);
	});
});

describe('expansion: stringize and paste', () => {
	it('stringizes the unexpanded, whitespace-normalized argument', () => {
		const r = preprocessText('#define ONE 1\n#define S(x) #x\nS(  ONE   +  "b" )\n');
		expect(texts(r)).toEqual(['"ONE + ""b"""']);
		const [tok] = significantTokens(r.tokens);
		expect(tok.kind).toBe('string');
		expect(tok.synthetic).toBe('stringize');
	});

	it('pastes operands without expanding them', () => {
		const r = preprocessText('#define ONE 1\n#define CAT(a, b) a ## b\n#define PAIR(a, b) a b\nCAT(ONE, 2) PAIR(ONE, 2)\n');
		expect(texts(r)).toEqual(['ONE2', '1', '2']);
		expect(significantTokens(r.tokens)[0].kind).toBe('id');
	});

	it('treats an empty operand as a placemarker', () => {
		expect(texts(preprocessText('#define CAT(a, b) a ## b\nCAT(foo, 42) CAT(x, )\n'))).toEqual(['foo42', 'x']);
	});

	it('rescans a pasted name', () => {
		expect(texts(preprocessText('#define VAL_A 7\n#define GET(n) VAL_ ## n\nGET(A)\n'))).toEqual(['7']);
	});

	it('reports a paste that does not form one token and emits the text anyway', () => {
		const r = preprocessText('#define BAD(a, b) a ## b\nBAD(+, -)\n');
		expect(texts(r)).toEqual(['+-']);
		expect(codes(r)).toEqual(['PP012']);
		expect(r.diagnostics[0].message).toBe("pasting '+' and '-' does not give a valid token");
		expect(r.diagnostics[0].severity).toBe('warning');
	});
});

describe('expansion: failures', () => {
	it('leaves a call with the wrong argument count as written', () => {
		const r = preprocessText('#define ADD(a, b) a + b\nADD(1)\n');
		expect(renderText(r.tokens)).toBe('\nADD(1)\n');
		expect(r.diagnostics).toHaveLength(1);
		const [d] = r.diagnostics;
		expect(d.kind).toBe('ArgumentCountMismatch');
		expect(d.message).toBe("macro 'ADD' expects 2 arguments, got 1");
		expect([d.location.line, d.location.column]).toEqual([1, 0]);
	});

	it('reports an argument list left open at the end of input', () => {
		const r = preprocessText('#define F(x) x\nF(1, 2\n');
		expect(texts(r)).toEqual(['F', '(', '1', ',', '2']);
		expect(r.diagnostics.map(d => d.message)).toEqual(["unterminated argument list invoking macro 'F'"]);
	});

	it('abandons an expansion deeper than the limit', () => {
		const r = preprocessText('#define A B\n#define B C\n#define C D\n#define D 1\nA\n', { maxExpansionDepth: 3 });
		expect(texts(r)).toEqual(['D']);
		expect(codes(r)).toEqual(['PP013']);
		const [d] = r.diagnostics;
		expect(d.message).toBe("expansion of 'D' exceeds the maximum depth of 3");
		expect([d.location.line, d.location.column]).toEqual([2, 10]);
		expect(d.expansions.map(s => `${s.macro}@${s.site.line}:${s.site.column}`)).toEqual(['A@4:0', 'B@0:10', 'C@1:10']);
	});

	it('expands the same chain under the default limit', () => {
		const r = preprocessText('#define A B\n#define B C\n#define C D\n#define D 1\nA\n');
		expect(texts(r)).toEqual(['1']);
		expect(codes(r)).toEqual([]);
	});

	it('counts nested arguments toward the depth', () => {
		const ok = preprocessText('#define ID(x) x\nID(ID(ID(1)))\n', { maxExpansionDepth: 3 });
		expect(texts(ok)).toEqual(['1']);
		expect(codes(ok)).toEqual([]);
		const [one] = significantTokens(ok.tokens);
		expect(one.expansions.map(s => s.site.column)).toEqual([0, 3, 6]);

		const deep = preprocessText('#define ID(x) x\nID(ID(ID(ID(ID(1)))))\n', { maxExpansionDepth: 3 });
		expect(texts(deep)).toEqual(['ID', '(', 'ID', '(', '1', ')', ')']);
		expect(deep.diagnostics.map(d => d.message)).toEqual(["expansion of 'ID' exceeds the maximum depth of 3"]);
		expect([deep.diagnostics[0].location.line, deep.diagnostics[0].location.column]).toEqual([1, 9]);
	});

	it('reports a very deep argument nest once instead of overflowing', () => {
		const levels = 3000;
		const r = preprocessText('#define ID(x) x\n' + 'ID('.repeat(levels) + '1' + ')'.repeat(levels) + '\n');
		expect(codes(r)).toEqual(['PP013']);
		expect(r.diagnostics[0].location.column).toBe(64 * 3);
		const left = levels - 64;
		expect(texts(r)).toHaveLength(left * 3 + 1);
		expect(significantTokens(r.tokens).every(t => t.expansions.length <= 64)).toBe(true);
	});
});

describe('expansion: built-ins and configuration defines', () => {
	it('expands line, file and counter built-ins', () => {
		const src = 'a __LINE__\n\n__FILE__ __COUNTER__ __COUNTER__\n#define L __LINE__\n\nL\n';
		const r = preprocessText(src, { path: 'dir/x.cfg' });
		expect(texts(r)).toEqual(['a', '1', '"\\dir\\x.cfg"', '0', '1', '6']);
		expect(significantTokens(r.tokens).filter(t => t.synthetic === 'builtin')).toHaveLength(5);
	});

	it('seeds defines from options', () => {
		const r = preprocessText('DEBUG NAME\n', { defines: { DEBUG: true, NAME: '"x"' } });
		expect(texts(r)).toEqual(['1', '"x"']);
	});

	it('filters disabled diagnostics', () => {
		const src = '#define A 1\n#define A 2\nA\n';
		expect(codes(preprocessText(src))).toEqual(['PP010']);
		const quiet = preprocessText(src, { disabledDiagnostics: ['macro-redefined'] });
		expect(codes(quiet)).toEqual([]);
		expect(texts(quiet)).toEqual(['2']);
	});
});
