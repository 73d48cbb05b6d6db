import { Command } from 'commander';
import { macrosCommand } from './commands/macros';
import { stripCommand } from './commands/strip';
import { tokensCommand } from './commands/tokens';
import type { CliIO } from './io';

export const VERSION = '0.1.0';

export function createProgram(io: CliIO): Command {
	const program = new Command();
	program
		.name('cspan')
		.description('Separate comments from code in C sources and extract macro calls')
		.version(VERSION);

	program.addCommand(stripCommand(io));
	program.addCommand(tokensCommand(io));
	program.addCommand(macrosCommand(io));
	return program;
}
