import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { createLogger } from '../src/log';
import { captureLogger } from './testUtils';

describe('logger', () => {
	const dirs: string[] = [];
	afterEach(() => {
		for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
	});

	it('prefixes lines and drops debug unless enabled', () => {
		const quiet = captureLogger(false);
		quiet.logger.debug('hidden');
		quiet.logger.warn('careful');
		expect(quiet.lines).toEqual([{ level: 'warn', line: '[modforge] careful' }]);
		expect(quiet.logger.debugEnabled).toBe(false);

		const loud = captureLogger(true);
		loud.logger.debug('shown');
		expect(loud.lines).toEqual([{ level: 'debug', line: '[modforge] shown' }]);
	});

	it('appends timestamped lines to the log file', () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'modforge-log-'));
		dirs.push(dir);
		const file = path.join(dir, 'run.log');
		const logger = createLogger({ logFile: file, sink: () => { /* discard */ } });
		logger.info('hello');
		logger.debug('not written');
		logger.error('bad');
		const lines = fs.readFileSync(file, 'utf8').trimEnd().split('\n');
		expect(lines).toHaveLength(2);
		expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z info hello$/);
		expect(lines[1]).toMatch(/ error bad$/);
	});
});
