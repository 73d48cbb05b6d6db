// Logging goes to stderr; stdout is reserved for command output.

export type LogLevel = 'silent' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'info', 'debug'];

export function isLogLevel(v: unknown): v is LogLevel {
	return LOG_LEVELS.some(level => level === v);
}

export interface Logger {
	info(message: string): void;
	debug(message: string): void;
	warn(message: string): void;
}

export function createLogger(level: LogLevel | undefined, sink: (line: string) => void = line => console.error(line)): Logger {
	const enabled = level === 'info' || level === 'debug';
	const debugEnabled = level === 'debug';

	return {
		info(message: string) {
			if (enabled) sink(`[cspan] ${message}`);
		},
		debug(message: string) {
			if (debugEnabled) sink(`[cspan][debug] ${message}`);
		},
		warn(message: string) {
			sink(`[cspan][warn] ${message}`);
		},
	};
}
