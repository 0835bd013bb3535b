import {spawn} from 'child_process';
import {existsSync} from 'fs';
import {Socket} from 'net';
import {resolve} from 'path';
import type {ReadinessProbe} from './types.js';

export const PROBE_ATTEMPT_TIMEOUT_MS = 2000;

export type ProbeContext = {
	cwd: string;
	env: NodeJS.ProcessEnv;
	timeoutMs: number;
};

/** Run a single readiness check. Never rejects: any failure means "not ready yet". */
export async function checkReadiness(probe: ReadinessProbe, context: ProbeContext): Promise<boolean> {
	switch (probe.type) {
		case 'none':
			return true;
		case 'command':
			return checkCommand(probe.command, context);
		case 'port':
			return checkPort(probe.port, probe.host ?? '127.0.0.1', context.timeoutMs);
		case 'http':
			return checkHttp(probe.url, context.timeoutMs);
		case 'file':
			return existsSync(resolve(context.cwd, probe.path));
	}
}

export function describeProbe(probe: ReadinessProbe): string {
	switch (probe.type) {
		case 'none': return 'none';
		case 'command': return `command "${probe.command}"`;
		case 'port': return `port ${probe.host ?? '127.0.0.1'}:${probe.port}`;
		case 'http': return `http ${probe.url}`;
		case 'file': return `file ${probe.path}`;
	}
}

async function checkCommand(command: string, {cwd, env, timeoutMs}: ProbeContext): Promise<boolean> {
	return new Promise((resolve) => {
		const proc = spawn(command, {
			shell: true,
			cwd,
			env,
			stdio: 'ignore',
			detached: true,
		});

		const timeout = setTimeout(() => {
			// Kill the whole group so nothing the probe started lingers
			try {
				if (proc.pid !== undefined) {
					process.kill(-proc.pid, 'SIGKILL');
				}
			} catch {
				proc.kill('SIGKILL');
			}

			resolve(false);
		}, timeoutMs);

		proc.on('error', () => {
			clearTimeout(timeout);
			resolve(false);
		});

		proc.on('exit', (code) => {
			clearTimeout(timeout);
			resolve(code === 0);
		});
	});
}

async function checkPort(port: number, host: string, timeoutMs: number): Promise<boolean> {
	return new Promise((resolve) => {
		const socket = new Socket();
		socket.setTimeout(timeoutMs);

		socket.on('connect', () => {
			socket.destroy();
			resolve(true);
		});

		socket.on('error', () => {
			socket.destroy();
			resolve(false);
		});

		socket.on('timeout', () => {
			socket.destroy();
			resolve(false);
		});

		socket.connect(port, host);
	});
}

async function checkHttp(url: string, timeoutMs: number): Promise<boolean> {
	const controller = new AbortController();
	const timeout = setTimeout(() => {
		controller.abort();
	}, timeoutMs);

	try {
		const res = await fetch(url, {signal: controller.signal});
		await res.body?.cancel();
		return res.ok;
	} catch {
		return false;
	} finally {
		clearTimeout(timeout);
	}
}
