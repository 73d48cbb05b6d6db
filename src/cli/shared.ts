import path from 'node:path';
import chalk from 'chalk';
import { type Command, InvalidArgumentError, Option } from 'commander';
import { type CspanConfig, type ConfigOverrides, resolveConfig } from '../config';
import { CspanError, describeError } from '../core/errors';
import { type ByteSource, readFdChunks, readFileChunks } from '../core/source';
import { LOG_LEVELS, type LogLevel, type Logger, createLogger } from '../log';
import type { CliIO } from './io';

export interface CommonOptions {
	maxBuf?: number;
	logLevel?: LogLevel;
	config?: string;
}

export function parseCount(value: string): number {
	const n = Number(value);
	if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('expected a non-negative integer');
	return n;
}

export function addCommonOptions(cmd: Command): Command {
	return cmd
		.option('--max-buf <n>', 'largest single token in characters (0 = no limit)', parseCount)
		.addOption(new Option('--log-level <level>', 'diagnostic output on stderr').choices(LOG_LEVELS))
		.option('-c, --config <file>', 'configuration file (default: nearest cspan.yaml)');
}

export interface CommandContext {
	config: CspanConfig;
	log: Logger;
}

export function setup(io: CliIO, options: CommonOptions, extra: Pick<ConfigOverrides, 'macros'> = {}): CommandContext {
	const config = resolveConfig({
		config: options.config,
		maxBuf: options.maxBuf,
		logLevel: options.logLevel,
		macros: extra.macros,
		cwd: io.cwd,
		env: io.env,
	});
	const log = createLogger(config.logLevel, io.stderr);
	log.debug(`config: ${config.file ?? 'defaults'}`);
	return { config, log };
}

export interface InputFile {
	label: string; // used as the scanner filename
	source: ByteSource;
}

export function openInput(io: CliIO, file: string | undefined): InputFile {
	if (!file || file === '-') return { label: '<stdin>', source: readFdChunks(io.stdinFd) };
	return { label: file, source: readFileChunks(path.resolve(io.cwd, file)) };
}

export function reportError(io: CliIO, err: unknown) {
	io.stderr(chalk.red(`cspan: ${describeError(err)}`));
}

/** Scan/config failures exit 1, anything else (bad output path, ...) exits 2. */
export function runCommand(io: CliIO, body: () => void) {
	try {
		body();
	} catch (err) {
		reportError(io, err);
		io.setExitCode(err instanceof CspanError ? 1 : 2);
	}
}
