import { type Position, formatPosition } from './position';

export const CSPAN_ERRORS = {
	END_OF_INPUT: 'CS000',
	READ_FAILED: 'CS001',
	UNTERMINATED_COMMENT: 'CS002',
	BUFFER_OVERFLOW: 'CS003',
	MISSING_OPEN_PAREN: 'CS010',
	MISSING_SEMICOLON: 'CS011',
	INVALID_CONFIG: 'CS020',
} as const;
export type CspanErrorCode = typeof CSPAN_ERRORS[keyof typeof CSPAN_ERRORS];

export class CspanError extends Error {
	readonly code: CspanErrorCode;

	constructor(code: CspanErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

// Expected terminal condition of every scan; callers treat it as success.
export class EndOfInput extends CspanError {
	constructor(readonly position: Position) {
		super(CSPAN_ERRORS.END_OF_INPUT, 'end of input');
	}
}

export function isEndOfInput(err: unknown): err is EndOfInput {
	return err instanceof EndOfInput;
}

export class ReadError extends CspanError {
	constructor(cause: unknown) {
		super(CSPAN_ERRORS.READ_FAILED, `read failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
	}
}

export class UnterminatedCommentError extends CspanError {
	constructor(readonly position: Position) {
		super(CSPAN_ERRORS.UNTERMINATED_COMMENT, 'unexpected end of multi-line comment');
	}
}

export class BufferOverflowError extends CspanError {
	constructor(readonly limit: number) {
		super(CSPAN_ERRORS.BUFFER_OVERFLOW, `token exceeds maximum buffer size of ${limit} characters`);
	}
}

type MacroErrorCode = typeof CSPAN_ERRORS.MISSING_OPEN_PAREN | typeof CSPAN_ERRORS.MISSING_SEMICOLON;

const MACRO_MESSAGES: Record<MacroErrorCode, string> = {
	[CSPAN_ERRORS.MISSING_OPEN_PAREN]: 'macro function missing opening parentheses',
	[CSPAN_ERRORS.MISSING_SEMICOLON]: 'macro function missing terminating semicolon',
};

export class MacroSyntaxError extends CspanError {
	constructor(code: MacroErrorCode, readonly macro: string, readonly filename: string, readonly line: number) {
		super(code, MACRO_MESSAGES[code]);
	}
}

export class ConfigError extends CspanError {
	constructor(readonly file: string, readonly issues: readonly string[]) {
		super(CSPAN_ERRORS.INVALID_CONFIG, `invalid configuration in ${file}: ${issues.join('; ')}`);
	}
}

/** One-line description used by the CLI, prefixed with a location where one is known. */
export function describeError(err: unknown): string {
	if (err instanceof UnterminatedCommentError) return `${formatPosition(err.position)}: ${err.message}`;
	if (err instanceof MacroSyntaxError) return `${err.filename || '<input>'}:${err.line}: ${err.message} (${err.macro})`;
	if (err instanceof Error) return err.message;
	return String(err);
}
