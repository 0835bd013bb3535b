#!/usr/bin/env node
import {parseCliArgs, type CliArgs} from './args.js';
import {
	applyEnvOverrides, getStatusPath, loadConfig, loadEnvFile, loadStateDir,
} from './config.js';
import {exitCodeFor} from './errors.js';
import {createConsoleLogger} from './logger.js';
import {describeProbe} from './readiness.js';
import {formatStatus, readStatusFile} from './status.js';
import {DEFAULT_STARTUP_TIMEOUT_MS, Supervisor} from './supervisor.js';
import type {Config} from './types.js';

const logger = createConsoleLogger();

async function main(): Promise<number> {
	let args: CliArgs;
	try {
		args = parseCliArgs(process.argv.slice(2));
	} catch (err: unknown) {
		console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
		printHelp();
		return 1;
	}

	try {
		switch (args.command) {
			case 'run':
				return await cmdRun(args);
			case 'check':
				return await cmdCheck(args);
			case 'status':
				return await cmdStatus(args);
			case 'help':
				printHelp();
				return 0;
		}
	} catch (err: unknown) {
		console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
		return exitCodeFor(err);
	}
}

async function resolveConfig(args: CliArgs): Promise<Config> {
	const loaded = await loadConfig(process.cwd(), args.configPath);
	// .env first so STANDBY_* overrides may live there too
	loadEnvFile(loaded);
	const config = applyEnvOverrides(loaded);

	if (args.failTogether) {
		config.failTogether = true;
	}

	if (args.proceedAnyway) {
		config.onStartupTimeout = 'proceedAnyway';
	}

	if (args.foreground) {
		config.foreground = {...config.foreground, ...args.foreground};
	}

	return config;
}

async function cmdRun(args: CliArgs): Promise<number> {
	const config = await resolveConfig(args);
	if (!config.foreground) {
		throw new Error('No foreground command. Set "foreground" in the config or pass one after --');
	}

	const supervisor = new Supervisor({
		onStartupTimeout: config.onStartupTimeout,
		failTogether: config.failTogether,
		pollIntervalMs: config.pollIntervalMs,
		gracePeriodMs: config.gracePeriodMs,
		stateDir: config.stateDir,
	}, logger);

	const removeSignalHandlers = supervisor.installSignalHandlers();
	try {
		const result = await supervisor.start(config.services, config.foreground);
		if (result.dependencyFailure) {
			logger.warn(`Foreground stopped because ${result.dependencyFailure.service} failed`);
		}

		return result.code;
	} finally {
		removeSignalHandlers();
	}
}

async function cmdCheck(args: CliArgs): Promise<number> {
	const config = await resolveConfig(args);

	console.log('Start order:');
	config.services.forEach((svc, i) => {
		const probe = describeProbe(svc.readiness ?? {type: 'none'});
		console.log(`  ${i + 1}. ${svc.name}  ${svc.command}  (ready: ${probe}, timeout ${svc.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS}ms)`);
	});

	if (config.foreground) {
		console.log(`Foreground: ${[config.foreground.command, ...(config.foreground.args ?? [])].join(' ')}`);
	} else {
		console.log('Foreground: none configured');
	}

	console.log(`Policy: ${config.onStartupTimeout ?? 'failFast'}${config.failTogether ? ', failTogether' : ''}`);
	return 0;
}

async function cmdStatus(args: CliArgs): Promise<number> {
	const stateDir = await loadStateDir(process.cwd(), args.configPath);

	const status = await readStatusFile(getStatusPath(process.cwd(), stateDir));
	if (!status) {
		console.log('No status available. Supervisor has not run here.');
		return 0;
	}

	console.log();
	for (const line of formatStatus(status)) {
		console.log(line);
	}

	console.log();
	return 0;
}

function printHelp() {
	console.log(`
standby - Start dependencies, wait until ready, run the foreground

Usage: standby [command] [options] [-- command args...]

Commands:
  run               Start services and the foreground (default)
  check             Validate the config and print the start order
  status            Show service status from the last run
  help              Show this help

Options:
  -c, --config <path>   Config file (default: standby.config.{ts,js,mjs,json})
  --fail-together       Stop the foreground if a ready dependency dies
  --proceed-anyway      Start the foreground even if a dependency never became ready

Examples:
  standby                               Run using standby.config.json
  standby run -- python Integration.py  Override the foreground command
  standby check                         Show what would be started

Exit codes:
  The foreground's exit code (128+n if killed by signal n),
  97 if startup failed before the foreground ran, 1 for usage or config errors.
`);
}

main().then((code) => {
	process.exitCode = code;
}, (err: unknown) => {
	console.error(err);
	process.exitCode = 1;
});
