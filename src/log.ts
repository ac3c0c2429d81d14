import fs from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
	debug?: boolean;
	// Append-only log file; every line gets an ISO timestamp.
	logFile?: string;
	sink?: LogSink;
}

export interface Logger {
	debug(msg: string): void;
	info(msg: string): void;
	warn(msg: string): void;
	error(msg: string): void;
	readonly debugEnabled: boolean;
}

const PREFIX = '[modforge]';

const consoleSink: LogSink = (level, line) => {
	if (level === 'error') console.error(line);
	else if (level === 'warn') console.warn(line);
	else console.log(line);
};

export function createLogger(opts: LoggerOptions = {}): Logger {
	const sink = opts.sink ?? consoleSink;
	const debugEnabled = !!opts.debug;
	const write = (level: LogLevel, msg: string) => {
		if (level === 'debug' && !debugEnabled) return;
		const line = `${PREFIX} ${msg}`;
		sink(level, line);
		if (opts.logFile) {
			try {
				fs.appendFileSync(opts.logFile, `${new Date().toISOString()} ${level} ${msg}\n`);
			} catch (err) {
				if (debugEnabled) sink('warn', `${PREFIX} failed to append to log file ${opts.logFile}: ${String(err)}`);
			}
		}
	};
	return {
		debug: msg => write('debug', msg),
		info: msg => write('info', msg),
		warn: msg => write('warn', msg),
		error: msg => write('error', msg),
		debugEnabled,
	};
}

// Logger used when the caller passes none: console output, debug lines off.
export const defaultLogger: Logger = createLogger();

export const silentLogger: Logger = createLogger({ sink: () => { /* discard */ } });
