import {existsSync} from 'fs';
import {readFile} from 'fs/promises';
import type {ServiceStatus, StatusFile} from './types.js';

export async function readStatusFile(statusPath: string): Promise<StatusFile | null> {
	if (!existsSync(statusPath)) {
		return null;
	}

	const parsed: unknown = JSON.parse(await readFile(statusPath, 'utf-8'));
	if (typeof parsed !== 'object' || parsed === null || !('services' in parsed)) {
		throw new Error(`${statusPath} is not a standby status file`);
	}

	const {services} = parsed;
	if (typeof services !== 'object' || services === null) {
		throw new Error(`${statusPath} is not a standby status file`);
	}

	const supervisor = 'supervisor' in parsed ? parsed.supervisor : null;
	const updatedAt = 'updatedAt' in parsed && typeof parsed.updatedAt === 'string' ? parsed.updatedAt : '';
	const status: StatusFile = {updatedAt, supervisor: null, services: {}};

	if (typeof supervisor === 'object' && supervisor !== null
		&& 'pid' in supervisor && typeof supervisor.pid === 'number'
		&& 'startedAt' in supervisor && typeof supervisor.startedAt === 'string') {
		status.supervisor = {pid: supervisor.pid, startedAt: supervisor.startedAt};
	}

	for (const [name, value] of Object.entries(services)) {
		if (typeof value === 'object' && value !== null
			&& 'status' in value && typeof value.status === 'string' && isServiceStatus(value.status)) {
			status.services[name] = {
				status: value.status,
				pid: 'pid' in value && typeof value.pid === 'number' ? value.pid : null,
				restarts: 'restarts' in value && typeof value.restarts === 'number' ? value.restarts : 0,
				...('lastError' in value && typeof value.lastError === 'string' ? {lastError: value.lastError} : {}),
				...('startedAt' in value && typeof value.startedAt === 'string' ? {startedAt: value.startedAt} : {}),
				...('readyAt' in value && typeof value.readyAt === 'string' ? {readyAt: value.readyAt} : {}),
			};
		}
	}

	return status;
}

function isServiceStatus(value: string): value is ServiceStatus {
	return ['pending', 'starting', 'ready', 'failed', 'stopped'].includes(value);
}

export function getStatusIcon(status: ServiceStatus): string {
	switch (status) {
		case 'ready': return '●';
		case 'starting': return '◐';
		case 'pending': return '○';
		case 'stopped': return '■';
		case 'failed': return '✗';
	}
}

export function formatStatus(status: StatusFile): string[] {
	const lines: string[] = [];
	lines.push(status.supervisor
		? `Supervisor: running (pid ${status.supervisor.pid})`
		: 'Supervisor: not running');
	lines.push('');

	const services = Object.entries(status.services);
	if (services.length === 0) {
		lines.push('No services configured');
		return lines;
	}

	lines.push('Services:');
	lines.push('─'.repeat(60));

	const maxNameLen = Math.max(...services.map(([n]) => n.length));
	for (const [name, state] of services) {
		const pid = state.pid ? `pid:${state.pid}` : '';
		const restarts = state.restarts > 0 ? `(${state.restarts} restarts)` : '';
		const error = state.lastError ? `[${state.lastError}]` : '';
		lines.push(`  ${getStatusIcon(state.status)} ${name.padEnd(maxNameLen)}  ${state.status.padEnd(10)} ${pid.padEnd(12)} ${restarts} ${error}`.trimEnd());
	}

	return lines;
}
