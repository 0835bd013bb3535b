import {
	test, expect, describe, beforeEach, afterEach,
} from 'vitest';
import {mkdtemp, writeFile, rm} from 'fs/promises';
import {join} from 'path';
import {tmpdir} from 'os';
import {
	applyEnvOverrides, loadConfig, loadEnvFile, loadStateDir, validateConfig,
} from './config.js';
import {ConfigError, ConfigNotFoundError} from './errors.js';

function issuesOf(raw: unknown): string[] {
	try {
		validateConfig(raw);
	} catch (err: unknown) {
		if (err instanceof ConfigError) {
			return err.issues;
		}

		throw err;
	}

	return [];
}

describe('validateConfig', () => {
	test('accepts a complete config', () => {
		const raw = {
			services: [{
				name: 'redis',
				command: 'redis-server --port 6379',
				readiness: {type: 'port', port: 6379},
				startupTimeoutMs: 5000,
				restartPolicy: 'on-failure',
			}],
			foreground: {command: 'python', args: ['Integration.py']},
			onStartupTimeout: 'proceedAnyway',
			failTogether: true,
			gracePeriodMs: 0,
		};

		expect(validateConfig(raw)).toEqual(raw);
	});

	test('treats missing services as an empty list', () => {
		expect(validateConfig({})).toEqual({services: []});
	});

	test('reports every problem with its path', () => {
		expect(issuesOf({
			services: [
				{name: 'a b', command: ''},
				{name: 'x', command: 'y', readiness: {type: 'port', port: 70000}},
			],
			onStartupTimeout: 'later',
		})).toEqual([
			'services[0].name: may only contain letters, digits, ".", "_" and "-"',
			'services[0].command: must be a non-empty string',
			'services[1].readiness.port: must be an integer between 1 and 65535',
			'onStartupTimeout: must be "failFast" or "proceedAnyway"',
		]);
	});

	test('rejects duplicate service names', () => {
		expect(issuesOf({
			services: [{name: 'db', command: 'a'}, {name: 'db', command: 'b'}],
		})).toEqual(['services[1].name: duplicate service name "db"']);
	});

	test('validates probes and foreground', () => {
		expect(issuesOf({services: [{name: 'web', command: 'serve', readiness: {type: 'http', url: 'not a url'}}]}))
			.toEqual(['services[0].readiness.url: not a valid URL']);
		expect(issuesOf({services: [{name: 'web', command: 'serve', readiness: {type: 'tcp'}}]}))
			.toEqual(['services[0].readiness.type: must be one of command, port, http, file, none']);
		expect(issuesOf({services: [], foreground: {command: 'node', args: [1]}}))
			.toEqual(['foreground.args: must be an array of strings']);
	});

	test('rejects a non-object config', () => {
		expect(issuesOf([])).toEqual(['config must be an object']);
	});
});

describe('applyEnvOverrides', () => {
	test('applies STANDBY_* variables', () => {
		expect(applyEnvOverrides({services: []}, {
			STANDBY_ON_STARTUP_TIMEOUT: 'proceedAnyway',
			STANDBY_FAIL_TOGETHER: '1',
			STANDBY_POLL_INTERVAL_MS: '50',
			STANDBY_GRACE_PERIOD_MS: '0',
		})).toEqual({
			services: [],
			onStartupTimeout: 'proceedAnyway',
			failTogether: true,
			pollIntervalMs: 50,
			gracePeriodMs: 0,
		});
	});

	test('leaves the config alone without variables', () => {
		expect(applyEnvOverrides({services: [], failTogether: true}, {})).toEqual({services: [], failTogether: true});
	});

	test('rejects malformed values', () => {
		let error: unknown;
		try {
			applyEnvOverrides({services: []}, {STANDBY_FAIL_TOGETHER: 'maybe', STANDBY_POLL_INTERVAL_MS: 'abc'});
		} catch (err: unknown) {
			error = err;
		}

		expect(error).toBeInstanceOf(ConfigError);
		expect(error instanceof ConfigError ? error.issues : []).toEqual([
			'STANDBY_FAIL_TOGETHER: must be 1, true, 0 or false',
			'STANDBY_POLL_INTERVAL_MS: must be an integer >= 1',
		]);
	});
});

describe('loading from disk', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'standby-config-'));
	});

	afterEach(async () => {
		await rm(dir, {recursive: true, force: true});
	});

	test('finds standby.config.json', async () => {
		await writeFile(join(dir, 'standby.config.json'), JSON.stringify({
			services: [{name: 'redis', command: 'redis-server'}],
			foreground: {command: 'python'},
		}));

		expect(await loadConfig(dir)).toEqual({
			services: [{name: 'redis', command: 'redis-server'}],
			foreground: {command: 'python'},
		});
	});

	test('loads an explicit path', async () => {
		await writeFile(join(dir, 'ci.json'), JSON.stringify({services: [], failTogether: true}));
		expect(await loadConfig(dir, 'ci.json')).toEqual({services: [], failTogether: true});
	});

	test('loads the default export of an .mjs config', async () => {
		await writeFile(join(dir, 'standby.config.mjs'), 'export default {services: [{name: \'cache\', command: \'sleep 5\'}]};\n');
		expect(await loadConfig(dir)).toEqual({services: [{name: 'cache', command: 'sleep 5'}]});
	});

	test('fails when no config exists', async () => {
		await expect(loadConfig(dir)).rejects.toThrow('No config file found');
		await expect(loadConfig(dir)).rejects.toBeInstanceOf(ConfigNotFoundError);
		await expect(loadConfig(dir, 'missing.json')).rejects.toThrow(`Config file not found: ${join(dir, 'missing.json')}`);
	});

	test('reports malformed JSON as a config error', async () => {
		await writeFile(join(dir, 'standby.config.json'), '{services: ');
		await expect(loadConfig(dir)).rejects.toBeInstanceOf(ConfigError);
	});

	test('loadStateDir falls back only when there is no config', async () => {
		expect(await loadStateDir(dir)).toBeUndefined();
		expect(await loadStateDir(dir, 'missing.json')).toBeUndefined();

		await writeFile(join(dir, 'standby.config.json'), JSON.stringify({services: [], stateDir: '.run'}));
		expect(await loadStateDir(dir)).toBe('.run');
	});

	test('loadStateDir reports a broken config', async () => {
		await writeFile(join(dir, 'standby.config.json'), '{services: ');
		await expect(loadStateDir(dir)).rejects.toBeInstanceOf(ConfigError);

		await writeFile(join(dir, 'standby.config.json'), JSON.stringify({services: 'nope'}));
		await expect(loadStateDir(dir)).rejects.toBeInstanceOf(ConfigError);
	});

	test('loadEnvFile loads .env into process.env', async () => {
		await writeFile(join(dir, '.env'), 'STANDBY_TEST_VALUE=from-dotenv\n');
		try {
			expect(loadEnvFile({services: []}, dir)).toBe(true);
			expect(process.env.STANDBY_TEST_VALUE).toBe('from-dotenv');
			expect(loadEnvFile({services: [], dotenv: 'missing.env'}, dir)).toBe(false);
		} finally {
			delete process.env.STANDBY_TEST_VALUE;
		}
	});
});
