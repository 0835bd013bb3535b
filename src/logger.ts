export type Logger = {
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
};

/**
 * Console logger. Everything goes to stderr so the foreground's stdout stays
 * untouched when standby is used as an entrypoint.
 */
export function createConsoleLogger(options: {quiet?: boolean} = {}): Logger {
	const quiet = options.quiet ?? ['1', 'true'].includes(process.env.STANDBY_QUIET ?? '');
	return {
		info(message) {
			if (!quiet) {
				console.error(`[standby] ${message}`);
			}
		},
		warn(message) {
			console.error(`[standby] warning: ${message}`);
		},
		error(message) {
			console.error(`[standby] error: ${message}`);
		},
	};
}

export const silentLogger: Logger = {
	info() {},
	warn() {},
	error() {},
};
