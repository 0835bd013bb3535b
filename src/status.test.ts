import {test, expect} from 'vitest';
import {mkdtemp, rm, writeFile} from 'fs/promises';
import {join} from 'path';
import {tmpdir} from 'os';
import {formatStatus, readStatusFile} from './status.js';
import type {StatusFile} from './types.js';

const status: StatusFile = {
	updatedAt: '2026-01-01T00:00:00.000Z',
	supervisor: {pid: 42, startedAt: '2026-01-01T00:00:00.000Z'},
	services: {
		redis: {status: 'ready', pid: 1234, restarts: 0},
		worker: {
			status: 'failed', pid: null, restarts: 2, lastError: 'exit code 1',
		},
	},
};

test('formatStatus renders a service table', () => {
	expect(formatStatus(status)).toEqual([
		'Supervisor: running (pid 42)',
		'',
		'Services:',
		'─'.repeat(60),
		'  ● redis   ready      pid:1234',
		'  ✗ worker  failed                  (2 restarts) [exit code 1]',
	]);
});

test('formatStatus without services', () => {
	expect(formatStatus({updatedAt: '', supervisor: null, services: {}})).toEqual([
		'Supervisor: not running',
		'',
		'No services configured',
	]);
});

test('readStatusFile round-trips a written status and skips unknown entries', async () => {
	const dir = await mkdtemp(join(tmpdir(), 'standby-status-'));
	try {
		const path = join(dir, 'status.json');
		expect(await readStatusFile(path)).toBeNull();

		await writeFile(path, JSON.stringify({
			...status,
			services: {...status.services, ghost: {status: 'haunting'}},
		}));
		expect(await readStatusFile(path)).toEqual(status);

		await writeFile(path, '[]');
		await expect(readStatusFile(path)).rejects.toThrow('is not a standby status file');
	} finally {
		await rm(dir, {recursive: true, force: true});
	}
});
