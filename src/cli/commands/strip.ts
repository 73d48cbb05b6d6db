import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { stripComments } from '../../core/strip';
import type { CliIO } from '../io';
import { type CommonOptions, addCommonOptions, openInput, runCommand, setup } from '../shared';

interface StripOptions extends CommonOptions {
	output?: string;
}

export function stripCommand(io: CliIO): Command {
	const cmd = new Command('strip')
		.description('Strip comments from a C source file (stdin when no file is given)')
		.argument('[file]', 'C source file')
		.option('-o, --output <file>', 'file to write to, stdout when omitted');
	return addCommonOptions(cmd).action((file: string | undefined, options: StripOptions) => runCommand(io, () => {
		const { config, log } = setup(io, options);
		const input = openInput(io, file);
		log.debug(`stripping ${input.label}`);

		if (!options.output) {
			stripComments(input.source, chunk => io.stdout(chunk), { filename: input.label, maxBuf: config.maxBuf });
			return;
		}
		// the target is replaced only after a complete run
		const target = path.resolve(io.cwd, options.output);
		const tmp = `${target}.${process.pid}.tmp`;
		const fd = fs.openSync(tmp, 'w');
		let done = false;
		try {
			stripComments(input.source, chunk => { fs.writeSync(fd, chunk); }, { filename: input.label, maxBuf: config.maxBuf });
			done = true;
		} finally {
			fs.closeSync(fd);
			if (!done) fs.rmSync(tmp, { force: true });
		}
		fs.renameSync(tmp, target);
		log.info(`wrote ${options.output}`);
	}));
}
