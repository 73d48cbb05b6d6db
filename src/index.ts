export { type Position, NO_POSITION, formatPosition, isValidPosition, makePosition } from './core/position';
export { TokenBuffer } from './core/buffer';
export {
	CSPAN_ERRORS,
	type CspanErrorCode,
	BufferOverflowError,
	ConfigError,
	CspanError,
	EndOfInput,
	MacroSyntaxError,
	ReadError,
	UnterminatedCommentError,
	describeError,
	isEndOfInput,
} from './core/errors';
export { type ByteSource, CharReader, fromString, readFdChunks, readFileChunks } from './core/source';
export { type Token, type TokenType, isCommentToken, isTextToken, joinTokens } from './core/tokens';
export { Scanner, type ScannerOptions, scanTokens, tokenize } from './core/scanner';
export { stripComments, stripCommentsString } from './core/strip';
export {
	type Invocation,
	type InvocationCallback,
	ArgumentListParser,
	compileNamesPattern,
	formatInvocation,
	invocations,
	isDirectiveReference,
	isMacroDefinition,
	scanInvocations,
	scanInvocationsString,
} from './core/macro';
export { type CspanConfig, type CspanConfigFile, type ConfigOverrides, CONFIG_FILE_NAMES, DEFAULT_CONFIG, findConfig, loadConfig, parseConfig, resolveConfig } from './config';
export { type LogLevel, type Logger, createLogger, isLogLevel } from './log';
