import { type ScannerOptions, scanTokens } from './scanner';
import { type ByteSource, fromString } from './source';

// Writes every text span verbatim and drops the comments; nothing else changes.
export function stripComments(source: ByteSource, write: (chunk: string) => void, opts: ScannerOptions = {}): void {
	for (const tok of scanTokens(source, opts)) {
		if (tok.type === 'text') write(tok.data);
	}
}

export function stripCommentsString(text: string, opts: ScannerOptions = {}): string {
	const out: string[] = [];
	stripComments(fromString(text), chunk => out.push(chunk), opts);
	return out.join('');
}
