import {spawn, type ChildProcess, type StdioOptions} from 'child_process';
import {createWriteStream, type WriteStream} from 'fs';

const sleep = async (ms: number) => new Promise<void>((resolve) => {
	setTimeout(resolve, ms);
});

export type ExitStatus = {
	code: number | null;
	signal: NodeJS.Signals | null;
	error?: Error;
};

/**
 * A child process the supervisor owns. Dependents run detached in their own
 * process group so signals reach everything their shell started.
 */
export class OwnedProcess {
	readonly pid: number | undefined;
	readonly exited: Promise<ExitStatus>;
	private status: ExitStatus | null = null;

	constructor(
		private readonly proc: ChildProcess,
		private readonly group: boolean,
	) {
		this.pid = proc.pid;
		this.exited = new Promise((resolve) => {
			proc.on('error', (err) => {
				// Spawn errors (invalid cwd, command not found) may come without an exit event
				if (this.status === null && proc.pid === undefined) {
					this.status = {code: null, signal: null, error: err};
					resolve(this.status);
				}
			});

			proc.on('exit', (code, signal) => {
				if (this.status === null) {
					this.status = {code, signal};
					resolve(this.status);
				}
			});
		});
	}

	get exitStatus(): ExitStatus | null {
		return this.status;
	}

	/** Resolves once the OS has created the process, rejects with the spawn error */
	async spawned(): Promise<void> {
		if (this.proc.pid !== undefined) {
			return;
		}

		if (this.status?.error) {
			throw this.status.error;
		}

		await new Promise<void>((resolve, reject) => {
			const onSpawn = () => {
				cleanup();
				resolve();
			};

			const onError = (err: Error) => {
				cleanup();
				reject(err);
			};

			const cleanup = () => {
				this.proc.off('spawn', onSpawn);
				this.proc.off('error', onError);
			};

			this.proc.once('spawn', onSpawn);
			this.proc.once('error', onError);
		});
	}

	isAlive(): boolean {
		if (this.pid === undefined) {
			return false;
		}

		if (this.status === null) {
			return true;
		}

		// Leader is gone, but its group may still hold processes it started
		return this.group && signalPid(-this.pid, 0);
	}

	signal(signal: NodeJS.Signals): boolean {
		if (this.pid === undefined) {
			return false;
		}

		if (this.group) {
			return signalPid(-this.pid, signal);
		}

		return this.status === null && this.proc.kill(signal);
	}

	/** SIGTERM (or the given signal), wait up to graceMs, then SIGKILL */
	async stop(graceMs: number, signal: NodeJS.Signals = 'SIGTERM'): Promise<ExitStatus | null> {
		if (!this.isAlive()) {
			return this.status;
		}

		this.signal(signal);

		const deadline = Date.now() + graceMs;
		while (this.isAlive() && Date.now() < deadline) {
			const tick = sleep(Math.min(50, Math.max(deadline - Date.now(), 1)));
			await (this.status === null ? Promise.race([this.exited, tick]) : tick);
		}

		if (this.isAlive()) {
			this.signal('SIGKILL');
			if (this.status === null) {
				await this.exited;
			}
		}

		return this.status;
	}

	/** Synchronous last-resort kill, for process exit hooks */
	killNow(): void {
		if (this.isAlive()) {
			this.signal('SIGKILL');
		}
	}
}

function signalPid(pid: number, signal: NodeJS.Signals | 0): boolean {
	try {
		process.kill(pid, signal);
		return true;
	} catch {
		// ESRCH: nothing left to signal
		return false;
	}
}

export type DependentLaunch = {
	command: string;
	cwd: string;
	env: NodeJS.ProcessEnv;
	logPath: string;
};

/** Start a dependent through the shell, detached, appending its output to logPath */
export function spawnDependent({
	command, cwd, env, logPath,
}: DependentLaunch): OwnedProcess {
	const logStream = createWriteStream(logPath, {flags: 'a'});
	// A missing log directory must not take the supervisor down
	logStream.on('error', () => {
		logStream.destroy();
	});

	const proc = spawn(command, {
		shell: true,
		cwd,
		env,
		detached: true,
		stdio: ['ignore', 'pipe', 'pipe'],
	});

	proc.stdout?.on('data', logLine(logStream, ''));
	proc.stderr?.on('data', logLine(logStream, ' [ERR]'));

	const owned = new OwnedProcess(proc, true);
	void owned.exited.then(() => {
		logStream.end();
	});
	return owned;
}

export type ForegroundLaunch = {
	command: string;
	args: readonly string[];
	cwd: string;
	env: NodeJS.ProcessEnv;
	stdio?: StdioOptions;
};

/** Start the foreground directly (no shell) so a missing binary surfaces as a spawn error */
export function spawnForeground({
	command, args, cwd, env, stdio = 'inherit',
}: ForegroundLaunch): OwnedProcess {
	const proc = spawn(command, [...args], {cwd, env, stdio});
	return new OwnedProcess(proc, false);
}

function logLine(stream: WriteStream, prefix: string) {
	return (data: Buffer) => {
		if (stream.destroyed) {
			return;
		}

		const timestamp = new Date().toISOString();
		const lines = data.toString().split('\n');
		for (const line of lines) {
			if (line) {
				stream.write(`[${timestamp}]${prefix} ${line}\n`);
			}
		}
	};
}
