import {test, expect} from 'vitest';
import {parseCliArgs} from './args.js';

test('defaults to run', () => {
	expect(parseCliArgs([])).toEqual({command: 'run'});
});

test('takes the foreground command after --', () => {
	expect(parseCliArgs(['run', '--fail-together', '--', 'python', 'Integration.py', '--port', '80'])).toEqual({
		command: 'run',
		failTogether: true,
		foreground: {command: 'python', args: ['Integration.py', '--port', '80']},
	});
});

test('parses config path in both forms', () => {
	expect(parseCliArgs(['check', '-c', 'ci.json'])).toEqual({command: 'check', configPath: 'ci.json'});
	expect(parseCliArgs(['--config=ci.json', '--proceed-anyway'])).toEqual({
		command: 'run', configPath: 'ci.json', proceedAnyway: true,
	});
});

test('--help switches to help', () => {
	expect(parseCliArgs(['run', '--help']).command).toBe('help');
});

test('rejects unknown commands and options', () => {
	expect(() => parseCliArgs(['launch'])).toThrow('Unknown command: launch');
	expect(() => parseCliArgs(['--verbose'])).toThrow('Unknown option: --verbose');
	expect(() => parseCliArgs(['--config'])).toThrow('--config requires a path');
});

test('only run accepts a foreground command', () => {
	expect(() => parseCliArgs(['status', '--', 'ls'])).toThrow('"status" does not take a command after --');
});
