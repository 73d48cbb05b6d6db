import { Command, Option } from 'commander';
import { formatPosition } from '../../core/position';
import { scanTokens } from '../../core/scanner';
import type { Token } from '../../core/tokens';
import type { CliIO } from '../io';
import { type CommonOptions, addCommonOptions, openInput, runCommand, setup } from '../shared';

interface TokensOptions extends CommonOptions {
	format: 'text' | 'json';
	filename?: string;
}

export function formatTokenLine(t: Token): string {
	const tag = t.type === 'comment' ? '<comment>' : '<text>   ';
	return `${tag} ${formatPosition(t.position)}: ${JSON.stringify(t.data)}`;
}

export function tokensCommand(io: CliIO): Command {
	const cmd = new Command('tokens')
		.description('Print the comment and text tokens of a C source file')
		.argument('[file]', 'C source file, stdin when omitted')
		.addOption(new Option('--format <type>', 'output format').choices(['text', 'json']).default('text'))
		.option('--filename <name>', 'filename reported in positions (default: the path given)');
	return addCommonOptions(cmd).action((file: string | undefined, options: TokensOptions) => runCommand(io, () => {
		const { config, log } = setup(io, options);
		const input = openInput(io, file);
		const filename = options.filename ?? input.label;
		const tokens = scanTokens(input.source, { filename, maxBuf: config.maxBuf });

		if (options.format === 'json') {
			io.stdout(`${JSON.stringify([...tokens], null, 2)}\n`);
			return;
		}
		let n = 0;
		for (const t of tokens) {
			io.stdout(`${formatTokenLine(t)}\n`);
			n++;
		}
		log.debug(`${n} tokens`);
	}));
}
