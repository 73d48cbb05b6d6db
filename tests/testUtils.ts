import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { CliIO } from '../src/cli/io';
import { type Invocation, scanInvocationsString } from '../src/core/macro';
import type { ScannerOptions } from '../src/core/scanner';

export function makeTmpDir(prefix = 'cspan-'): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(dir: string, rel: string, content: string): string {
	const p = path.join(dir, rel);
	fs.mkdirSync(path.dirname(p), { recursive: true });
	fs.writeFileSync(p, content, 'utf8');
	return p;
}

export function collectInvocations(text: string, names: string[], opts?: ScannerOptions): Invocation[] {
	const out: Invocation[] = [];
	scanInvocationsString(text, names, inv => out.push(inv), opts);
	return out;
}

export function stripAnsi(s: string): string {
	return s.replace(/\u001b\[[0-9;]*m/g, '');
}

export type CapturedIO = CliIO & { out: string[]; err: string[]; exitCode: number | undefined };

export function captureIO(cwd: string, env: Record<string, string | undefined> = {}): CapturedIO {
	const io: CapturedIO = {
		out: [],
		err: [],
		exitCode: undefined,
		stdout: chunk => { io.out.push(chunk); },
		stderr: line => { io.err.push(stripAnsi(line)); },
		setExitCode: code => { io.exitCode = code; },
		stdinFd: 0,
		cwd,
		env,
	};
	return io;
}
