import {test, expect} from 'vitest';
import {
	getStateDir, getStatusPath, getLogsDir, getLogPath, exitCodeFor, DependencyStartupError, ConfigError,
} from './index.js';

test('getStateDir returns .standby directory', () => {
	expect(getStateDir('/home/user/project')).toBe('/home/user/project/.standby');
});

test('getStateDir honours a custom state directory', () => {
	expect(getStateDir('/home/user/project', 'var/run')).toBe('/home/user/project/var/run');
});

test('getStatusPath returns status file path', () => {
	expect(getStatusPath('/home/user/project')).toBe('/home/user/project/.standby/status.json');
});

test('getLogsDir returns logs directory', () => {
	expect(getLogsDir('/home/user/project')).toBe('/home/user/project/.standby/logs');
});

test('getLogPath returns log file path for service', () => {
	expect(getLogPath('redis', '/home/user/project')).toBe('/home/user/project/.standby/logs/redis.log');
});

test('exitCodeFor reserves 97 for supervisor errors', () => {
	expect(exitCodeFor(new DependencyStartupError('redis', 1000, 'timeout'))).toBe(97);
	expect(exitCodeFor(new ConfigError(['services: must be an array']))).toBe(1);
	expect(exitCodeFor(new Error('boom'))).toBe(1);
});
