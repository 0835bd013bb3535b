export type CliCommand = 'run' | 'check' | 'status' | 'help';

export type CliArgs = {
	command: CliCommand;
	configPath?: string;
	failTogether?: boolean;
	proceedAnyway?: boolean;
	foreground?: {command: string; args: string[]};
};

const COMMANDS: readonly CliCommand[] = ['run', 'check', 'status', 'help'];

function isCommand(value: string): value is CliCommand {
	return COMMANDS.some((c) => c === value);
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
	const separator = argv.indexOf('--');
	const own = separator === -1 ? [...argv] : argv.slice(0, separator);
	const rest = separator === -1 ? [] : argv.slice(separator + 1);

	let command: CliCommand = 'run';
	const first = own[0];
	if (first !== undefined && !first.startsWith('-')) {
		if (!isCommand(first)) {
			throw new Error(`Unknown command: ${first}`);
		}

		command = first;
		own.shift();
	}

	const result: CliArgs = {command};

	for (let i = 0; i < own.length; i++) {
		const arg = own[i];
		switch (arg) {
			case '--config':
			case '-c': {
				const value = own[i + 1];
				if (value === undefined || value.startsWith('-')) {
					throw new Error(`${arg} requires a path`);
				}

				result.configPath = value;
				i++;
				break;
			}

			case '--fail-together':
				result.failTogether = true;
				break;
			case '--proceed-anyway':
				result.proceedAnyway = true;
				break;
			case '--help':
			case '-h':
				result.command = 'help';
				break;
			default:
				if (arg?.startsWith('--config=')) {
					result.configPath = arg.slice('--config='.length);
					break;
				}

				throw new Error(`Unknown option: ${arg ?? ''}`);
		}
	}

	const [fgCommand, ...fgArgs] = rest;
	if (fgCommand !== undefined) {
		if (result.command !== 'run') {
			throw new Error(`"${result.command}" does not take a command after --`);
		}

		result.foreground = {command: fgCommand, args: fgArgs};
	}

	return result;
}
