import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv, { type ErrorObject } from 'ajv';
import schema from './config.schema.json';
import { ConfigError } from './core/errors';
import { type LogLevel, isLogLevel } from './log';

// Shape of cspan.yaml as written by users; every key optional.
export interface CspanConfigFile {
	macros?: string[];
	maxBuf?: number;
	logLevel?: LogLevel;
}

export interface CspanConfig {
	macros: string[];
	maxBuf: number;
	logLevel: LogLevel;
	file: string | null; // config file the values came from, if any
}

export const DEFAULT_CONFIG: CspanConfig = { macros: [], maxBuf: 0, logLevel: 'info', file: null };

export const CONFIG_FILE_NAMES = ['cspan.yaml', 'cspan.yml', '.cspanrc.yaml'] as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validate = ajv.compile<CspanConfigFile>(schema);

function formatIssue(e: ErrorObject): string {
	return `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`;
}

export function parseConfig(text: string, file: string): CspanConfigFile {
	let raw: unknown;
	try {
		raw = yaml.load(text, { filename: file });
	} catch (e) {
		throw new ConfigError(file, [e instanceof Error ? e.message : String(e)]);
	}
	// an empty file is an empty config
	if (raw === undefined || raw === null) return {};
	if (!validate(raw)) throw new ConfigError(file, (validate.errors ?? []).map(formatIssue));
	return raw;
}

export function loadConfig(file: string): CspanConfig {
	let text: string;
	try {
		text = fs.readFileSync(file, 'utf8');
	} catch (e) {
		throw new ConfigError(file, [e instanceof Error ? e.message : String(e)]);
	}
	const parsed = parseConfig(text, file);
	return {
		macros: parsed.macros ?? DEFAULT_CONFIG.macros,
		maxBuf: parsed.maxBuf ?? DEFAULT_CONFIG.maxBuf,
		logLevel: parsed.logLevel ?? DEFAULT_CONFIG.logLevel,
		file,
	};
}

/** Nearest config file from `startDir` up to the filesystem root. */
export function findConfig(startDir: string): string | null {
	let dir = path.resolve(startDir);
	for (;;) {
		for (const name of CONFIG_FILE_NAMES) {
			const candidate = path.join(dir, name);
			if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) return candidate;
		}
		const parent = path.dirname(dir);
		if (parent === dir) return null;
		dir = parent;
	}
}

export interface ConfigOverrides {
	config?: string; // explicit config path; disables the upward search
	macros?: string[];
	maxBuf?: number;
	logLevel?: LogLevel;
	cwd?: string;
	env?: Record<string, string | undefined>;
}

function envOverrides(env: Record<string, string | undefined>): Partial<CspanConfig> {
	const out: Partial<CspanConfig> = {};
	const issues: string[] = [];
	const level = env.CSPAN_LOG_LEVEL;
	if (level !== undefined && level !== '') {
		if (isLogLevel(level)) out.logLevel = level;
		else issues.push(`CSPAN_LOG_LEVEL must be one of silent, info, debug (got "${level}")`);
	}
	const maxBuf = env.CSPAN_MAX_BUF;
	if (maxBuf !== undefined && maxBuf !== '') {
		const n = Number(maxBuf);
		if (Number.isInteger(n) && n >= 0) out.maxBuf = n;
		else issues.push(`CSPAN_MAX_BUF must be a non-negative integer (got "${maxBuf}")`);
	}
	if (issues.length) throw new ConfigError('environment', issues);
	return out;
}

/** defaults < config file < environment < explicit overrides */
export function resolveConfig(overrides: ConfigOverrides = {}): CspanConfig {
	const cwd = overrides.cwd ?? process.cwd();
	const file = overrides.config ? path.resolve(cwd, overrides.config) : findConfig(cwd);
	const base = file ? loadConfig(file) : { ...DEFAULT_CONFIG };
	const env = envOverrides(overrides.env ?? process.env);
	return {
		macros: overrides.macros?.length ? overrides.macros : base.macros,
		maxBuf: overrides.maxBuf ?? env.maxBuf ?? base.maxBuf,
		logLevel: overrides.logLevel ?? env.logLevel ?? base.logLevel,
		file: base.file,
	};
}
