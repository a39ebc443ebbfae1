// ─── Config Loading & Validation ─────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { ConfigError } from '../core/errors';
import { LogLevel } from './log';

export const DEFAULT_DATA_DIR = path.join(os.homedir(), '.edgesync');
export const DEFAULT_CONFIG_PATH = path.join(DEFAULT_DATA_DIR, 'config.toml');
export const DEFAULT_CONTROL_PORT = 8888;

// ─── Schema ──────────────────────────────────────────────────────────────────

const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

const DeviceSchema = z.object({
	serial: z.string().min(1).optional(),
	name: z.string().min(1).optional(),
	class: z.string().min(1).default('generic'),
	company: z.string().min(1).optional(),
	auth: z.string().default(''),
	autoDeviceText: z.string().optional(),
});

const ServerSchema = z.object({
	url: z.string().url().default('http://127.0.0.1:8080/rpc'),
	timeout: z.number().int().positive().default(30000),
});

const DaemonSchema = z.object({
	poll: z.number().positive().default(60),
	host: z.string().default('127.0.0.1'),
	port: z.number().int().min(0).max(65535).default(DEFAULT_CONTROL_PORT),
	pollQuantum: z.number().int().positive().default(1000),
	restartDelay: z.number().int().nonnegative().default(1000),
	checkFirmware: z.boolean().default(true),
	logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	logFile: z.string().optional(),
	pidFile: z.string().optional(),
	maxRestarts: z.number().int().nonnegative().default(5),
	restartWindow: z.number().int().min(1000).default(30000),
	backoffDelay: z.number().int().nonnegative().default(60000),
});

const PathsSchema = z.object({
	dataDir: z.string().default(DEFAULT_DATA_DIR),
	timelines: z.string().optional(),
	samplers: z.string().optional(),
	settings: z.string().optional(),
	firmware: z.string().optional(),
	firmwareVersionFile: z.string().optional(),
});

const TimelineSchema = z.object({
	name: z.string().regex(NAME_PATTERN, 'timeline name may only contain letters, digits, _ . -'),
	maxEvents: z.number().int().positive().optional(),
});

const SamplerSchema = z.object({
	name: z.string().regex(NAME_PATTERN, 'sampler name may only contain letters, digits, _ . -'),
});

const RawConfigSchema = z.object({
	device: DeviceSchema.default({}),
	server: ServerSchema.default({}),
	daemon: DaemonSchema.default({}),
	paths: PathsSchema.default({}),
	timeline: z.array(TimelineSchema).default([]),
	sampler: z.array(SamplerSchema).default([]),
});

type RawConfig = z.infer<typeof RawConfigSchema>;

export type DeviceConfig = z.infer<typeof DeviceSchema>;
export type ServerConfig = z.infer<typeof ServerSchema>;
export type TimelineConfig = z.infer<typeof TimelineSchema>;
export type SamplerConfig = z.infer<typeof SamplerSchema>;

export interface DaemonSettings extends Omit<z.infer<typeof DaemonSchema>, 'logFile' | 'pidFile'> {
	logLevel: LogLevel;
	logFile: string;
	pidFile: string;
}

export interface PathsConfig {
	dataDir: string;
	timelines: string;
	samplers: string;
	settings: string;
	firmware: string;
	firmwareVersionFile: string;
}

export interface AgentConfig {
	/** File the config was read from, or null when running on defaults */
	source: string | null;
	device: DeviceConfig;
	server: ServerConfig;
	daemon: DaemonSettings;
	paths: PathsConfig;
	timelines: TimelineConfig[];
	samplers: SamplerConfig[];
}

// ─── Loading ─────────────────────────────────────────────────────────────────

/**
 * Load agent configuration from a TOML file, with defaults for every field
 * the file leaves out. A missing file yields the defaults.
 */
export function loadConfig(configPath?: string): AgentConfig {
	const finalPath = configPath || process.env.EDGESYNC_CONFIG || DEFAULT_CONFIG_PATH;

	if (!fs.existsSync(finalPath)) {
		return buildConfig(RawConfigSchema.parse({}), null);
	}

	let parsed: TomlTable;
	try {
		parsed = parseTOML(fs.readFileSync(finalPath, 'utf-8'));
	} catch (error) {
		throw new ConfigError([`${finalPath}: ${String(error)}`]);
	}

	return buildConfig(validateRaw(parsed), finalPath);
}

/**
 * Validate an already-parsed table. Throws ConfigError listing every problem.
 */
export function validateRaw(table: TomlTable): RawConfig {
	const result = RawConfigSchema.safeParse(table);
	if (!result.success) {
		throw new ConfigError(
			result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
		);
	}

	const problems: string[] = [];
	const seen = new Set<string>();
	for (const timeline of result.data.timeline) {
		if (seen.has(timeline.name)) {
			problems.push(`timeline: duplicate name '${timeline.name}'`);
		}
		seen.add(timeline.name);
	}
	if (problems.length > 0) {
		throw new ConfigError(problems);
	}
	return result.data;
}

function buildConfig(raw: RawConfig, source: string | null): AgentConfig {
	const dataDir = raw.paths.dataDir;
	return {
		source,
		device: raw.device,
		server: raw.server,
		daemon: {
			...raw.daemon,
			logFile: raw.daemon.logFile ?? path.join(dataDir, 'agent.log'),
			pidFile: raw.daemon.pidFile ?? path.join(dataDir, 'agent.pid'),
		},
		paths: {
			dataDir,
			timelines: raw.paths.timelines ?? path.join(dataDir, 'timelines'),
			samplers: raw.paths.samplers ?? path.join(dataDir, 'samplers'),
			settings: raw.paths.settings ?? path.join(dataDir, 'settings'),
			firmware: raw.paths.firmware ?? path.join(dataDir, 'firmware'),
			firmwareVersionFile:
				raw.paths.firmwareVersionFile ?? path.join(dataDir, 'firmware.json'),
		},
		timelines: raw.timeline,
		samplers: raw.sampler,
	};
}

/**
 * Ensure required directories exist
 */
export function ensureDirectories(config: AgentConfig): void {
	const dirs = [
		config.paths.dataDir,
		config.paths.timelines,
		config.paths.samplers,
		config.paths.settings,
		config.paths.firmware,
		path.dirname(config.daemon.logFile),
		path.dirname(config.daemon.pidFile),
	];

	for (const dir of dirs) {
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true });
		}
	}
}

// ─── TOML subset ─────────────────────────────────────────────────────────────

export type TomlValue = string | number | boolean | TomlValue[] | TomlTable;
export interface TomlTable {
	[key: string]: TomlValue;
}

/**
 * Simple TOML parser (supports basic key=value, [sections], [[arrays]] and
 * single-line arrays)
 */
export function parseTOML(content: string): TomlTable {
	const result: TomlTable = {};
	let currentSection: TomlTable = result;

	const lines = content.split('\n');
	for (let lineNo = 0; lineNo < lines.length; lineNo++) {
		const line = stripComment(lines[lineNo]).trim();

		if (!line) {
			continue;
		}

		// [[array]] of tables
		if (line.startsWith('[[') && line.endsWith(']]')) {
			const arrayKey = line.slice(2, -2).trim();
			const existing = result[arrayKey];
			const array: TomlValue[] = Array.isArray(existing) ? existing : [];
			result[arrayKey] = array;

			const table: TomlTable = {};
			array.push(table);
			currentSection = table;
			continue;
		}

		// [section]
		if (line.startsWith('[') && line.endsWith(']')) {
			const sectionName = line.slice(1, -1).trim();
			const existing = result[sectionName];
			const table: TomlTable = isTable(existing) ? existing : {};
			result[sectionName] = table;
			currentSection = table;
			continue;
		}

		const eqIndex = line.indexOf('=');
		if (eqIndex === -1) {
			throw new Error(`line ${lineNo + 1}: expected key = value`);
		}

		const key = line.slice(0, eqIndex).trim();
		const raw = line.slice(eqIndex + 1).trim();

		if (raw.startsWith('[') && raw.endsWith(']')) {
			const inner = raw.slice(1, -1).trim();
			currentSection[key] = inner ? inner.split(',').map((s) => parseValue(s.trim())) : [];
		} else {
			currentSection[key] = parseValue(raw);
		}
	}

	return result;
}

function isTable(value: TomlValue | undefined): value is TomlTable {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripComment(line: string): string {
	let quote: string | null = null;
	for (let i = 0; i < line.length; i++) {
		const ch = line[i];
		if (quote) {
			if (ch === '\\' && quote === '"') {
				i++;
			} else if (ch === quote) {
				quote = null;
			}
		} else if (ch === '"' || ch === "'") {
			quote = ch;
		} else if (ch === '#') {
			return line.slice(0, i);
		}
	}
	return line;
}

function parseValue(val: string): TomlValue {
	if (val.length >= 2 && val.startsWith('"') && val.endsWith('"')) {
		return val.slice(1, -1).replace(/\\(["\\nt])/g, (_m, c: string) =>
			c === 'n' ? '\n' : c === 't' ? '\t' : c,
		);
	}
	if (val.length >= 2 && val.startsWith("'") && val.endsWith("'")) {
		return val.slice(1, -1);
	}
	if (val === 'true') {
		return true;
	}
	if (val === 'false') {
		return false;
	}
	if (/^[-+]?\d[\d_]*$/.test(val)) {
		return parseInt(val.replace(/_/g, ''), 10);
	}
	if (/^[-+]?\d+\.\d+$/.test(val)) {
		return parseFloat(val);
	}
	return val;
}
