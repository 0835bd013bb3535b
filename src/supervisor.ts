/* eslint-disable no-await-in-loop */
import {EventEmitter} from 'events';
import {mkdir, writeFile} from 'fs/promises';
import {constants} from 'os';
import {resolve} from 'path';
import {
	DependencyCrashError,
	DependencyStartupError,
	ForegroundLaunchError,
	SupervisorAbortedError,
	type StartupFailureReason,
	type SupervisorError,
} from './errors.js';
import {getLogPath, getLogsDir, getStatusPath} from './config.js';
import {createConsoleLogger, type Logger} from './logger.js';
import {
	spawnDependent, spawnForeground, type ExitStatus, type OwnedProcess,
} from './process.js';
import {checkReadiness, describeProbe, PROBE_ATTEMPT_TIMEOUT_MS} from './readiness.js';
import type {
	ForegroundSpec,
	ServiceSpec,
	ServiceState,
	ServiceStatus,
	StartupTimeoutPolicy,
	StatusFile,
	SupervisorOptions,
	SupervisorResult,
	Transition,
} from './types.js';

export const DEFAULT_POLL_INTERVAL_MS = 200;
export const DEFAULT_GRACE_PERIOD_MS = 5000;
export const DEFAULT_STARTUP_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RESTARTS = 3;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

const sleep = async (ms: number) => new Promise<void>((resolve) => {
	setTimeout(resolve, ms);
});

export type SupervisorEvents = {
	'service:transition': [transition: Transition];
	'service:ready': [service: string];
	'dependency:startup-failed': [error: DependencyStartupError];
	'dependency:crashed': [error: DependencyCrashError];
	'foreground:started': [pid: number | undefined];
	'foreground:exited': [status: ExitStatus];
};

type ReadinessOutcome = 'ready' | 'cancelled' | {reason: StartupFailureReason; detail?: string};

type ResolvedOptions = {
	onStartupTimeout: StartupTimeoutPolicy;
	failTogether: boolean;
	pollIntervalMs: number;
	gracePeriodMs: number;
	cwd: string;
	stateDir: string | undefined;
	writeStatus: boolean;
};

/**
 * Starts dependent services in order, waits for each to pass its readiness
 * probe, then runs the foreground command and stops the dependents (in
 * reverse order) once it exits.
 */
export class Supervisor extends EventEmitter<SupervisorEvents> {
	private readonly options: ResolvedOptions;
	private readonly states = new Map<string, ServiceState>();
	private readonly dependents = new Map<string, OwnedProcess>();
	private readonly restartTimers = new Set<NodeJS.Timeout>();
	private startOrder: string[] = [];
	private transitions: Transition[] = [];
	private foreground: OwnedProcess | null = null;
	private running = false;
	private stopping = false;
	private startedAt: string | null = null;
	private interruption: SupervisorError | null = null;
	private wakeInterrupted: () => void = () => {};
	private interrupted: Promise<void> = Promise.resolve();
	private dependencyFailure: DependencyCrashError | null = null;
	private terminating = false;
	private done: Promise<void> = Promise.resolve();
	private statusWrite: Promise<void> = Promise.resolve();

	constructor(options: SupervisorOptions = {}, private readonly logger: Logger = createConsoleLogger()) {
		super();
		this.options = {
			onStartupTimeout: options.onStartupTimeout ?? 'failFast',
			failTogether: options.failTogether ?? false,
			pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
			gracePeriodMs: options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS,
			cwd: options.cwd ?? process.cwd(),
			stateDir: options.stateDir,
			writeStatus: options.writeStatus ?? true,
		};
	}

	get isRunning(): boolean {
		return this.running;
	}

	getState(name: string): ServiceState | undefined {
		const state = this.states.get(name);
		return state ? {...state} : undefined;
	}

	getStates(): Record<string, ServiceState> {
		const result: Record<string, ServiceState> = {};
		for (const [name, state] of this.states) {
			result[name] = {...state};
		}

		return result;
	}

	getTransitions(): Transition[] {
		return this.transitions.map((t) => ({...t}));
	}

	async start(specs: readonly ServiceSpec[], foreground: ForegroundSpec): Promise<SupervisorResult> {
		if (this.running) {
			throw new Error('Supervisor is already running');
		}

		const names = new Set<string>();
		for (const spec of specs) {
			if (names.has(spec.name)) {
				throw new Error(`Duplicate service name: ${spec.name}`);
			}

			names.add(spec.name);
		}

		this.reset(specs);
		this.running = true;
		let finish: () => void = () => {};
		this.done = new Promise((resolve) => {
			finish = resolve;
		});
		process.on('exit', this.killAllNow);

		try {
			await mkdir(getLogsDir(this.options.cwd, this.options.stateDir), {recursive: true});
			this.writeStatus();
			return await this.run(specs, foreground);
		} finally {
			this.clearRestartTimers();
			this.running = false;
			this.writeStatus();
			await this.statusWrite;
			process.off('exit', this.killAllNow);
			finish();
		}
	}

	/**
	 * Forward a termination signal: the foreground first, then every dependent
	 * in reverse start order. Resolves once the run has fully wound down.
	 */
	async terminate(signal: NodeJS.Signals = 'SIGTERM'): Promise<void> {
		if (!this.running) {
			return;
		}

		if (this.terminating) {
			// Second signal: stop waiting politely
			this.logger.warn(`Received ${signal} again, killing foreground`);
			this.foreground?.signal('SIGKILL');
			await this.done;
			return;
		}

		this.terminating = true;
		this.logger.info(`Received ${signal}, shutting down`);

		const {foreground} = this;
		if (foreground) {
			await foreground.stop(this.options.gracePeriodMs, signal);
		} else {
			this.interrupt(new SupervisorAbortedError(signal));
		}

		await this.done;
	}

	/** Route SIGINT, SIGTERM and SIGHUP to terminate(). Returns a function that removes the handlers. */
	installSignalHandlers(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP']): () => void {
		const handler = (signal: NodeJS.Signals) => {
			this.terminate(signal).catch((err: unknown) => {
				this.logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
			});
		};

		for (const signal of signals) {
			process.on(signal, handler);
		}

		return () => {
			for (const signal of signals) {
				process.off(signal, handler);
			}
		};
	}

	private reset(specs: readonly ServiceSpec[]): void {
		this.states.clear();
		this.dependents.clear();
		this.startOrder = [];
		this.transitions = [];
		this.foreground = null;
		this.stopping = false;
		this.terminating = false;
		this.dependencyFailure = null;
		this.interruption = null;
		this.interrupted = new Promise((resolve) => {
			this.wakeInterrupted = resolve;
		});
		this.startedAt = new Date().toISOString();

		for (const spec of specs) {
			this.states.set(spec.name, {status: 'pending', pid: null, restarts: 0});
		}
	}

	private async run(specs: readonly ServiceSpec[], foregroundSpec: ForegroundSpec): Promise<SupervisorResult> {
		try {
			for (const spec of specs) {
				this.throwIfInterrupted();
				await this.startDependent(spec, false);
			}

			this.throwIfInterrupted();
		} catch (err: unknown) {
			await this.stopDependents();
			throw err;
		}

		const foreground = spawnForeground({
			command: foregroundSpec.command,
			args: foregroundSpec.args ?? [],
			cwd: this.resolveCwd(foregroundSpec.cwd),
			env: {...process.env, ...foregroundSpec.env},
		});

		try {
			await foreground.spawned();
		} catch (err: unknown) {
			await this.stopDependents();
			throw new ForegroundLaunchError(foregroundSpec.command, toErrno(err));
		}

		this.foreground = foreground;
		this.logger.info(`Started ${foregroundSpec.command} (pid ${foreground.pid ?? 'unknown'})`);
		this.emit('foreground:started', foreground.pid);

		// Termination or a fail-together crash that arrived while the foreground was launching
		if (this.interruption) {
			this.stopForeground(this.interruption instanceof SupervisorAbortedError ? this.interruption.signal : 'SIGTERM');
		}

		let timedOut = false;
		const {timeoutMs} = foregroundSpec;
		const timeout = timeoutMs === undefined ? undefined : setTimeout(() => {
			timedOut = true;
			this.logger.warn(`${foregroundSpec.command} exceeded its ${timeoutMs}ms timeout, terminating`);
			this.stopForeground('SIGTERM');
		}, timeoutMs);

		const status = await foreground.exited;
		clearTimeout(timeout);
		this.foreground = null;
		this.emit('foreground:exited', status);
		this.logger.info(status.signal
			? `${foregroundSpec.command} was killed by ${status.signal}`
			: `${foregroundSpec.command} exited with code ${status.code ?? 'unknown'}`);

		await this.stopDependents();

		const base = {
			code: exitCodeOf(status),
			services: this.getStates(),
			transitions: this.getTransitions(),
			...(this.dependencyFailure
				? {dependencyFailure: {service: this.dependencyFailure.service, message: this.dependencyFailure.message}}
				: {}),
		};

		if (timedOut && timeoutMs !== undefined) {
			return {
				...base, outcome: 'timeout', timeoutMs, signal: status.signal,
			};
		}

		if (status.signal) {
			return {...base, outcome: 'signaled', signal: status.signal};
		}

		return {...base, outcome: 'exited'};
	}

	private async startDependent(spec: ServiceSpec, isRestart: boolean): Promise<void> {
		const state = this.mustGetState(spec.name);
		const timeoutMs = spec.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
		const probe = spec.readiness ?? {type: 'none'};
		const cwd = this.resolveCwd(spec.cwd);
		const env = {...process.env, ...spec.env};

		this.transition(spec.name, 'starting');
		state.startedAt = new Date().toISOString();
		delete state.readyAt;

		const proc = spawnDependent({
			command: spec.command,
			cwd,
			env,
			logPath: getLogPath(spec.name, this.options.cwd, this.options.stateDir),
		});
		this.dependents.set(spec.name, proc);
		if (!isRestart) {
			this.startOrder.push(spec.name);
		}

		state.pid = proc.pid ?? null;
		void proc.exited.then((status) => {
			this.handleDependentExit(spec, proc, status);
		});

		this.logger.info(`Started ${spec.name} (pid ${proc.pid ?? 'unknown'}), waiting for ${describeProbe(probe)}`);

		const outcome = await this.waitForReady(spec, proc, {cwd, env, timeoutMs});
		if (outcome === 'cancelled') {
			return;
		}

		if (outcome === 'ready') {
			state.readyAt = new Date().toISOString();
			this.transition(spec.name, 'ready');
			this.logger.info(`${spec.name} is ready`);
			this.emit('service:ready', spec.name);
			return;
		}

		const error = new DependencyStartupError(spec.name, timeoutMs, outcome.reason, outcome.detail);
		state.lastError = error.message;
		this.transition(spec.name, 'failed');
		this.emit('dependency:startup-failed', error);

		if (isRestart) {
			this.logger.error(`${error.message} after restart`);
			// Keep trying until maxRestarts is used up
			if (!this.options.failTogether && !this.stopping) {
				this.scheduleRestart(spec, state);
			}

			return;
		}

		if (this.options.onStartupTimeout === 'failFast') {
			throw error;
		}

		this.logger.warn(`${error.message}, continuing without it`);
	}

	private async waitForReady(
		spec: ServiceSpec,
		proc: OwnedProcess,
		{cwd, env, timeoutMs}: {cwd: string; env: NodeJS.ProcessEnv; timeoutMs: number},
	): Promise<ReadinessOutcome> {
		try {
			await proc.spawned();
		} catch (err: unknown) {
			return {reason: 'exited', detail: err instanceof Error ? err.message : String(err)};
		}

		const probe = spec.readiness ?? {type: 'none'};
		const deadline = Date.now() + timeoutMs;

		for (;;) {
			if (this.interruption || this.stopping) {
				return 'cancelled';
			}

			const exited = proc.exitStatus;
			if (exited) {
				return {reason: 'exited', detail: describeExit(exited)};
			}

			const remaining = deadline - Date.now();
			const ready = await checkReadiness(probe, {
				cwd,
				env,
				timeoutMs: Math.max(1, Math.min(PROBE_ATTEMPT_TIMEOUT_MS, remaining)),
			});

			if (ready) {
				return 'ready';
			}

			if (Date.now() >= deadline) {
				return {reason: 'timeout'};
			}

			await Promise.race([
				sleep(Math.min(this.options.pollIntervalMs, Math.max(deadline - Date.now(), 1))),
				proc.exited,
				this.interrupted,
			]);
		}
	}

	private handleDependentExit(spec: ServiceSpec, proc: OwnedProcess, status: ExitStatus): void {
		// A restarted service replaces the handle; ignore the old one
		if (this.dependents.get(spec.name) !== proc) {
			return;
		}

		const state = this.mustGetState(spec.name);
		state.pid = null;

		if (this.stopping || !this.running) {
			return;
		}

		if (state.status !== 'ready') {
			// Still starting (the readiness loop reports it) or already failed
			state.lastError = describeExit(status);
			return;
		}

		const error = new DependencyCrashError(spec.name, status.code, status.signal);
		state.lastError = error.message;
		this.transition(spec.name, 'failed');
		this.logger.error(error.message);
		this.emit('dependency:crashed', error);

		if (this.options.failTogether) {
			this.failTogether(error);
			return;
		}

		if ((spec.restartPolicy ?? 'never') === 'on-failure') {
			this.scheduleRestart(spec, state);
		}
	}

	private failTogether(error: DependencyCrashError): void {
		if (!this.dependencyFailure) {
			this.dependencyFailure = error;
		}

		if (this.foreground) {
			this.logger.error(`${error.service} failed, terminating foreground`);
			this.stopForeground('SIGTERM');
		} else {
			this.interrupt(error);
		}
	}

	private scheduleRestart(spec: ServiceSpec, state: ServiceState): void {
		const maxRestarts = spec.maxRestarts ?? DEFAULT_MAX_RESTARTS;
		if (state.restarts >= maxRestarts) {
			this.logger.error(`${spec.name} exceeded max restarts (${maxRestarts}), giving up`);
			return;
		}

		state.restarts += 1;
		const delay = Math.min(1000 * (2 ** (state.restarts - 1)), 30_000);
		this.logger.info(`Restarting ${spec.name} in ${delay}ms (attempt ${state.restarts})`);

		const timer = setTimeout(() => {
			this.restartTimers.delete(timer);
			if (this.stopping || !this.running) {
				return;
			}

			this.startDependent(spec, true).catch((err: unknown) => {
				this.logger.error(`Restart of ${spec.name} failed: ${err instanceof Error ? err.message : String(err)}`);
			});
		}, delay);
		this.restartTimers.add(timer);
	}

	private stopForeground(signal: NodeJS.Signals): void {
		const {foreground} = this;
		if (!foreground) {
			return;
		}

		foreground.stop(this.options.gracePeriodMs, signal).catch((err: unknown) => {
			this.logger.error(`Failed to stop foreground: ${err instanceof Error ? err.message : String(err)}`);
		});
	}

	private async stopDependents(): Promise<void> {
		this.stopping = true;
		this.clearRestartTimers();

		for (const name of [...this.startOrder].reverse()) {
			const proc = this.dependents.get(name);
			const state = this.mustGetState(name);
			if (proc?.isAlive()) {
				this.logger.info(`Stopping ${name}`);
				await proc.stop(this.options.gracePeriodMs);
			}

			state.pid = null;
			if (state.status !== 'stopped') {
				this.transition(name, 'stopped');
			}
		}
	}

	private clearRestartTimers(): void {
		for (const timer of this.restartTimers) {
			clearTimeout(timer);
		}

		this.restartTimers.clear();
	}

	private interrupt(error: SupervisorError): void {
		if (!this.interruption) {
			this.interruption = error;
		}

		this.wakeInterrupted();
	}

	private throwIfInterrupted(): void {
		if (this.interruption) {
			throw this.interruption;
		}
	}

	private transition(name: string, to: ServiceStatus): void {
		const state = this.mustGetState(name);
		const t: Transition = {service: name, from: state.status, to};
		state.status = to;
		this.transitions.push(t);
		this.emit('service:transition', {...t});
		this.writeStatus();
	}

	private mustGetState(name: string): ServiceState {
		const state = this.states.get(name);
		if (!state) {
			throw new Error(`Unknown service: ${name}`);
		}

		return state;
	}

	private resolveCwd(cwd: string | undefined): string {
		if (!cwd) {
			return this.options.cwd;
		}

		return resolve(this.options.cwd, cwd.replace(/^~(?=$|\/)/, process.env.HOME ?? '~'));
	}

	private getStatusData(): StatusFile {
		return {
			updatedAt: new Date().toISOString(),
			supervisor: this.running && this.startedAt ? {pid: process.pid, startedAt: this.startedAt} : null,
			services: this.getStates(),
		};
	}

	private writeStatus(): void {
		if (!this.options.writeStatus) {
			return;
		}

		const statusPath = getStatusPath(this.options.cwd, this.options.stateDir);
		const data = JSON.stringify(this.getStatusData(), null, 2);
		this.statusWrite = this.statusWrite
			.then(async () => writeFile(statusPath, data))
			.catch((err: unknown) => {
				this.logger.warn(`Could not write ${statusPath}: ${err instanceof Error ? err.message : String(err)}`);
			});
	}

	/** Synchronously kill every owned process - used when the supervisor itself exits */
	private readonly killAllNow = (): void => {
		this.foreground?.killNow();
		for (const proc of this.dependents.values()) {
			proc.killNow();
		}
	};
}

export function exitCodeOf(status: ExitStatus): number {
	if (status.signal) {
		return 128 + (SIGNAL_NUMBERS.get(status.signal) ?? 0);
	}

	return status.code ?? 1;
}

function describeExit(status: ExitStatus): string {
	if (status.error) {
		return status.error.message;
	}

	return status.signal ? `killed by ${status.signal}` : `exit code ${status.code ?? 'unknown'}`;
}

function toErrno(err: unknown): NodeJS.ErrnoException {
	return err instanceof Error ? err : new Error(String(err));
}
