import { describe, it, expect } from 'vitest';
import { preprocessText } from '../src/core/pipeline';
import { renderDiagnostic, renderDiagnostics, toLspDiagnostic } from '../src/report';
import { texts } from './testUtils';

describe('text reports', () => {
	it('underlines the offending token', () => {
		const r = preprocessText('x = 1;\n#include "missing.h"\n');
		expect(renderDiagnostic(r.diagnostics[0], r.files)).toBe([
			"error[PP001]: cannot find include file 'missing.h'",
			' --> \\main.cfg:2:10',
			'  |',
			'2 | #include "missing.h"',
			'  |          ^^^^^^^^^^^',
		].join('\n'));
	});

	it('lists the expansions that led to the error', () => {
		const r = preprocessText('#define ADD(a,b) a+b\n#define CALL ADD(1)\nCALL\n');
		expect(texts(r)).toEqual(['ADD', '(', '1', ')']);
		expect(renderDiagnostic(r.diagnostics[0], r.files)).toBe([
			"error[PP011]: macro 'ADD' expects 2 arguments, got 1",
			' --> \\main.cfg:2:14',
			'  |',
			'2 | #define CALL ADD(1)',
			'  |              ^^^',
			" = note: in expansion of macro 'CALL' at \\main.cfg:3:1",
		].join('\n'));
	});

	it('adds related locations as notes', () => {
		const r = preprocessText('#define A 1\n#define A 2\n');
		expect(renderDiagnostics(r.diagnostics, r.files)).toBe([
			"warning[PP010]: macro 'A' redefined with a different body",
			' --> \\main.cfg:2:9',
			'  |',
			'2 | #define A 2',
			'  |         ^',
			' = note: previous definition here at \\main.cfg:1:9',
		].join('\n'));
	});

	it('prints only the header without the file table', () => {
		const r = preprocessText('#include "gone.h"\n');
		expect(renderDiagnostic(r.diagnostics[0])).toBe("error[PP001]: cannot find include file 'gone.h'\n --> \\main.cfg:1:10");
	});
});

describe('editor diagnostics', () => {
	it('carries the range and the expansion chain', () => {
		const r = preprocessText('#define ADD(a,b) a+b\n#define CALL ADD(1)\nCALL\n');
		const d = toLspDiagnostic(r.diagnostics[0], r.files);
		expect(d.range).toEqual({ start: { line: 1, character: 13 }, end: { line: 1, character: 16 } });
		expect(d.severity).toBe(1);
		expect(d.code).toBe('PP011');
		expect(d.source).toBe('modforge');
		expect(d.relatedInformation).toEqual([{
			location: { uri: 'memory://memory/main.cfg', range: { start: { line: 2, character: 0 }, end: { line: 2, character: 4 } } },
			message: "in expansion of macro 'CALL'",
		}]);
	});

	it('maps warnings and falls back to one-column ranges without the file table', () => {
		const r = preprocessText('#define P(a,b) a##b\nP(+,/)\n');
		const d = toLspDiagnostic(r.diagnostics[0]);
		expect(d.severity).toBe(2);
		expect(d.message).toBe("pasting '+' and '/' does not give a valid token");
		expect(d.range).toEqual({ start: { line: 1, character: 0 }, end: { line: 1, character: 1 } });
		expect(d.relatedInformation).toEqual([{
			location: { uri: 'memory://memory/main.cfg', range: { start: { line: 1, character: 0 }, end: { line: 1, character: 1 } } },
			message: "in expansion of macro 'P'",
		}]);
	});
});
