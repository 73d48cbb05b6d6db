// Process wiring for the CLI, swappable so commands can run in-process under test.

export interface CliIO {
	stdout(chunk: string): void;
	stderr(line: string): void;
	setExitCode(code: number): void;
	stdinFd: number;
	cwd: string;
	env: Record<string, string | undefined>;
}

export function processIO(): CliIO {
	return {
		stdout: chunk => { process.stdout.write(chunk); },
		stderr: line => { process.stderr.write(line.endsWith('\n') ? line : `${line}\n`); },
		setExitCode: code => { process.exitCode = code; },
		stdinFd: 0,
		cwd: process.cwd(),
		env: process.env,
	};
}
