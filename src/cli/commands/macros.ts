import { Command, Option } from 'commander';
import { type Invocation, formatInvocation, scanInvocations } from '../../core/macro';
import type { CliIO } from '../io';
import { type CommonOptions, addCommonOptions, openInput, reportError, runCommand, setup } from '../shared';

interface MacrosOptions extends CommonOptions {
	name?: string[];
	format: 'text' | 'json';
}

export interface InvocationRecord extends Invocation {
	file: string;
}

export function formatInvocationLine(file: string, inv: Invocation): string {
	const lines = inv.startLine === inv.endLine ? `${inv.startLine}` : `${inv.startLine}-${inv.endLine}`;
	return `${file}:${lines}: ${formatInvocation(inv)}`;
}

export function macrosCommand(io: CliIO): Command {
	const cmd = new Command('macros')
		.description('List calls of function-like macros with their arguments')
		.argument('[files...]', 'C source files, stdin when omitted')
		.option('-n, --name <name...>', 'macro names to look for (overrides the config file)')
		.addOption(new Option('--format <type>', 'output format').choices(['text', 'json']).default('text'));
	return addCommonOptions(cmd).action((files: string[], options: MacrosOptions) => runCommand(io, () => {
		const { config, log } = setup(io, options, { macros: options.name });
		if (!config.macros.length) {
			reportError(io, 'no macro names given (use --name or the macros list of cspan.yaml)');
			io.setExitCode(1);
			return;
		}
		log.debug(`looking for ${config.macros.join(', ')}`);

		const records: InvocationRecord[] = [];
		let found = 0;
		let failed = 0;
		const inputs = files.length ? files : [undefined];
		for (const file of inputs) {
			const input = openInput(io, file);
			log.debug(`scanning ${input.label}`);
			try {
				scanInvocations(input.source, config.macros, inv => {
					found++;
					if (options.format === 'json') records.push({ file: input.label, ...inv });
					else io.stdout(`${formatInvocationLine(input.label, inv)}\n`);
					log.debug(`${input.label}:${inv.startLine} ${inv.name}`);
				}, { filename: input.label, maxBuf: config.maxBuf });
			} catch (err) {
				// one broken file does not stop the others
				reportError(io, err);
				failed++;
			}
		}

		if (options.format === 'json') io.stdout(`${JSON.stringify(records, null, 2)}\n`);
		log.info(`found ${found} invocation(s) in ${inputs.length} file(s)${failed ? `, ${failed} failed` : ''}`);
		if (failed) io.setExitCode(1);
	}));
}
