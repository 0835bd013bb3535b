import {existsSync} from 'fs';
import {readFile} from 'fs/promises';
import {resolve, extname} from 'path';
import {pathToFileURL} from 'url';
import {config as loadDotenv} from 'dotenv';
import {ConfigError, ConfigNotFoundError} from './errors.js';
import type {
	Config, ForegroundSpec, ReadinessProbe, ServiceSpec,
} from './types.js';

const CONFIG_NAMES = ['standby.config.ts', 'standby.config.js', 'standby.config.mjs', 'standby.config.json'];

const SERVICE_NAME = /^[\w.-]+$/;

export async function loadConfig(cwd: string = process.cwd(), explicitPath?: string): Promise<Config> {
	const requested = explicitPath ?? process.env.STANDBY_CONFIG;
	if (requested) {
		const configPath = resolve(cwd, requested);
		if (!existsSync(configPath)) {
			throw new ConfigNotFoundError(`Config file not found: ${configPath}`);
		}

		return loadConfigFile(configPath);
	}

	for (const name of CONFIG_NAMES) {
		const configPath = resolve(cwd, name);
		if (existsSync(configPath)) {
			return loadConfigFile(configPath);
		}
	}

	throw new ConfigNotFoundError(`No config file found. Create one of: ${CONFIG_NAMES.join(', ')}`);
}

async function loadConfigFile(configPath: string): Promise<Config> {
	const ext = extname(configPath);

	if (ext === '.json') {
		const content = await readFile(configPath, 'utf-8');
		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch (err: unknown) {
			throw new ConfigError([err instanceof Error ? err.message : String(err)], configPath);
		}

		return validateConfig(raw, configPath);
	}

	let module: unknown;
	if (ext === '.ts') {
		// Needs a TypeScript loader such as tsx registered in this process
		try {
			module = await import(pathToFileURL(configPath).href);
		} catch (err: unknown) {
			throw new Error('Failed to load TypeScript config. Make sure tsx is installed: npm install -D tsx', {cause: err});
		}
	} else {
		// .js or .mjs
		module = await import(pathToFileURL(configPath).href);
	}

	const raw = isRecord(module) && 'default' in module ? module.default : module;
	return validateConfig(raw, configPath);
}

/** The configured state directory, or undefined when there is no config file at all. */
export async function loadStateDir(cwd: string = process.cwd(), explicitPath?: string): Promise<string | undefined> {
	try {
		const config = await loadConfig(cwd, explicitPath);
		return config.stateDir;
	} catch (err: unknown) {
		if (err instanceof ConfigNotFoundError) {
			return undefined;
		}

		throw err;
	}
}

export function validateConfig(raw: unknown, source?: string): Config {
	const issues: string[] = [];

	if (!isRecord(raw)) {
		throw new ConfigError(['config must be an object'], source);
	}

	const services: ServiceSpec[] = [];
	if (Array.isArray(raw.services)) {
		const seen = new Set<string>();
		raw.services.forEach((value: unknown, i) => {
			const svc = parseService(value, `services[${i}]`, issues);
			if (!svc) {
				return;
			}

			if (seen.has(svc.name)) {
				issues.push(`services[${i}].name: duplicate service name "${svc.name}"`);
			}

			seen.add(svc.name);
			services.push(svc);
		});
	} else if (raw.services !== undefined) {
		issues.push('services: must be an array');
	}

	const config: Config = {services};

	if (raw.foreground !== undefined) {
		const foreground = parseForeground(raw.foreground, 'foreground', issues);
		if (foreground) {
			config.foreground = foreground;
		}
	}

	if (raw.onStartupTimeout !== undefined) {
		if (raw.onStartupTimeout === 'failFast' || raw.onStartupTimeout === 'proceedAnyway') {
			config.onStartupTimeout = raw.onStartupTimeout;
		} else {
			issues.push('onStartupTimeout: must be "failFast" or "proceedAnyway"');
		}
	}

	if (raw.failTogether !== undefined) {
		if (typeof raw.failTogether === 'boolean') {
			config.failTogether = raw.failTogether;
		} else {
			issues.push('failTogether: must be a boolean');
		}
	}

	const pollIntervalMs = optionalInteger(raw.pollIntervalMs, 'pollIntervalMs', issues, 1);
	if (pollIntervalMs !== undefined) {
		config.pollIntervalMs = pollIntervalMs;
	}

	const gracePeriodMs = optionalInteger(raw.gracePeriodMs, 'gracePeriodMs', issues, 0);
	if (gracePeriodMs !== undefined) {
		config.gracePeriodMs = gracePeriodMs;
	}

	const dotenv = optionalString(raw.dotenv, 'dotenv', issues);
	if (dotenv !== undefined) {
		config.dotenv = dotenv;
	}

	const stateDir = optionalString(raw.stateDir, 'stateDir', issues);
	if (stateDir !== undefined) {
		config.stateDir = stateDir;
	}

	if (issues.length > 0) {
		throw new ConfigError(issues, source);
	}

	return config;
}

function parseService(value: unknown, path: string, issues: string[]): ServiceSpec | undefined {
	if (!isRecord(value)) {
		issues.push(`${path}: must be an object`);
		return undefined;
	}

	const before = issues.length;
	const name = requiredString(value.name, `${path}.name`, issues);
	if (name !== undefined && !SERVICE_NAME.test(name)) {
		issues.push(`${path}.name: may only contain letters, digits, ".", "_" and "-"`);
	}

	const command = requiredString(value.command, `${path}.command`, issues);
	const cwd = optionalString(value.cwd, `${path}.cwd`, issues);
	const env = optionalEnv(value.env, `${path}.env`, issues);
	const readiness = value.readiness === undefined ? undefined : parseProbe(value.readiness, `${path}.readiness`, issues);
	const startupTimeoutMs = optionalInteger(value.startupTimeoutMs, `${path}.startupTimeoutMs`, issues, 1);
	const maxRestarts = optionalInteger(value.maxRestarts, `${path}.maxRestarts`, issues, 0);

	let restartPolicy: ServiceSpec['restartPolicy'];
	if (value.restartPolicy === 'never' || value.restartPolicy === 'on-failure') {
		restartPolicy = value.restartPolicy;
	} else if (value.restartPolicy !== undefined) {
		issues.push(`${path}.restartPolicy: must be "never" or "on-failure"`);
	}

	if (issues.length > before || name === undefined || command === undefined) {
		return undefined;
	}

	return {
		name,
		command,
		...(cwd === undefined ? {} : {cwd}),
		...(env === undefined ? {} : {env}),
		...(readiness === undefined ? {} : {readiness}),
		...(startupTimeoutMs === undefined ? {} : {startupTimeoutMs}),
		...(restartPolicy === undefined ? {} : {restartPolicy}),
		...(maxRestarts === undefined ? {} : {maxRestarts}),
	};
}

function parseProbe(value: unknown, path: string, issues: string[]): ReadinessProbe | undefined {
	if (!isRecord(value)) {
		issues.push(`${path}: must be an object`);
		return undefined;
	}

	switch (value.type) {
		case 'none':
			return {type: 'none'};
		case 'command': {
			const command = requiredString(value.command, `${path}.command`, issues);
			return command === undefined ? undefined : {type: 'command', command};
		}

		case 'port': {
			const {port} = value;
			if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
				issues.push(`${path}.port: must be an integer between 1 and 65535`);
				return undefined;
			}

			const host = optionalString(value.host, `${path}.host`, issues);
			return host === undefined ? {type: 'port', port} : {type: 'port', port, host};
		}

		case 'http': {
			const url = requiredString(value.url, `${path}.url`, issues);
			if (url !== undefined && !URL.canParse(url)) {
				issues.push(`${path}.url: not a valid URL`);
				return undefined;
			}

			return url === undefined ? undefined : {type: 'http', url};
		}

		case 'file': {
			const filePath = requiredString(value.path, `${path}.path`, issues);
			return filePath === undefined ? undefined : {type: 'file', path: filePath};
		}

		default:
			issues.push(`${path}.type: must be one of command, port, http, file, none`);
			return undefined;
	}
}

function parseForeground(value: unknown, path: string, issues: string[]): ForegroundSpec | undefined {
	if (!isRecord(value)) {
		issues.push(`${path}: must be an object`);
		return undefined;
	}

	const before = issues.length;
	const command = requiredString(value.command, `${path}.command`, issues);
	let args: string[] | undefined;
	if (value.args !== undefined) {
		if (Array.isArray(value.args) && value.args.every((a): a is string => typeof a === 'string')) {
			args = value.args;
		} else {
			issues.push(`${path}.args: must be an array of strings`);
		}
	}

	const cwd = optionalString(value.cwd, `${path}.cwd`, issues);
	const env = optionalEnv(value.env, `${path}.env`, issues);
	const timeoutMs = optionalInteger(value.timeoutMs, `${path}.timeoutMs`, issues, 1);

	if (issues.length > before || command === undefined) {
		return undefined;
	}

	return {
		command,
		...(args === undefined ? {} : {args}),
		...(cwd === undefined ? {} : {cwd}),
		...(env === undefined ? {} : {env}),
		...(timeoutMs === undefined ? {} : {timeoutMs}),
	};
}

/** Apply STANDBY_* environment variables over a loaded config */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
	const issues: string[] = [];
	const result: Config = {...config};

	const onTimeout = env.STANDBY_ON_STARTUP_TIMEOUT;
	if (onTimeout) {
		if (onTimeout === 'failFast' || onTimeout === 'proceedAnyway') {
			result.onStartupTimeout = onTimeout;
		} else {
			issues.push('STANDBY_ON_STARTUP_TIMEOUT: must be "failFast" or "proceedAnyway"');
		}
	}

	const failTogether = env.STANDBY_FAIL_TOGETHER;
	if (failTogether) {
		if (['1', 'true'].includes(failTogether)) {
			result.failTogether = true;
		} else if (['0', 'false'].includes(failTogether)) {
			result.failTogether = false;
		} else {
			issues.push('STANDBY_FAIL_TOGETHER: must be 1, true, 0 or false');
		}
	}

	const pollIntervalMs = envInteger(env.STANDBY_POLL_INTERVAL_MS, 'STANDBY_POLL_INTERVAL_MS', issues, 1);
	if (pollIntervalMs !== undefined) {
		result.pollIntervalMs = pollIntervalMs;
	}

	const gracePeriodMs = envInteger(env.STANDBY_GRACE_PERIOD_MS, 'STANDBY_GRACE_PERIOD_MS', issues, 0);
	if (gracePeriodMs !== undefined) {
		result.gracePeriodMs = gracePeriodMs;
	}

	if (issues.length > 0) {
		throw new ConfigError(issues, 'environment');
	}

	return result;
}

/** Load the dotenv file into process.env so children inherit it */
export function loadEnvFile(config: Config, cwd: string = process.cwd()): boolean {
	const envPath = resolve(cwd, config.dotenv ?? '.env');
	if (!existsSync(envPath)) {
		return false;
	}

	loadDotenv({path: envPath});
	return true;
}

export function getStateDir(cwd: string = process.cwd(), stateDir = '.standby'): string {
	return resolve(cwd, stateDir);
}

export function getStatusPath(cwd: string = process.cwd(), stateDir?: string): string {
	return resolve(getStateDir(cwd, stateDir), 'status.json');
}

export function getLogsDir(cwd: string = process.cwd(), stateDir?: string): string {
	return resolve(getStateDir(cwd, stateDir), 'logs');
}

export function getLogPath(service: string, cwd: string = process.cwd(), stateDir?: string): string {
	return resolve(getLogsDir(cwd, stateDir), `${service}.log`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requiredString(value: unknown, path: string, issues: string[]): string | undefined {
	if (typeof value !== 'string' || value.trim() === '') {
		issues.push(`${path}: must be a non-empty string`);
		return undefined;
	}

	return value;
}

function optionalString(value: unknown, path: string, issues: string[]): string | undefined {
	return value === undefined ? undefined : requiredString(value, path, issues);
}

function optionalInteger(value: unknown, path: string, issues: string[], min: number): number | undefined {
	if (value === undefined) {
		return undefined;
	}

	if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
		issues.push(`${path}: must be an integer >= ${min}`);
		return undefined;
	}

	return value;
}

function envInteger(value: string | undefined, name: string, issues: string[], min: number): number | undefined {
	if (!value) {
		return undefined;
	}

	return optionalInteger(/^\d+$/.test(value) ? Number(value) : Number.NaN, name, issues, min);
}

function optionalEnv(value: unknown, path: string, issues: string[]): Record<string, string> | undefined {
	if (value === undefined) {
		return undefined;
	}

	if (!isRecord(value)) {
		issues.push(`${path}: must be an object of strings`);
		return undefined;
	}

	const env: Record<string, string> = {};
	for (const [key, v] of Object.entries(value)) {
		if (typeof v !== 'string') {
			issues.push(`${path}.${key}: must be a string`);
			continue;
		}

		env[key] = v;
	}

	return env;
}
