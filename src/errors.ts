export type StartupFailureReason = 'timeout' | 'exited';

/** Exit code used when the run fails before the foreground ever runs */
export const SETUP_FAILURE_EXIT_CODE = 97;

export abstract class SupervisorError extends Error {
	abstract readonly kind: string;

	constructor(message: string, options?: {cause?: unknown}) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class DependencyStartupError extends SupervisorError {
	readonly kind = 'dependency-startup' as const;

	constructor(
		readonly service: string,
		readonly timeoutMs: number,
		readonly reason: StartupFailureReason,
		detail?: string,
	) {
		super(reason === 'timeout'
			? `${service} did not become ready within ${timeoutMs}ms`
			: `${service} exited before becoming ready${detail ? ` (${detail})` : ''}`);
	}
}

export class DependencyCrashError extends SupervisorError {
	readonly kind = 'dependency-crash' as const;

	constructor(
		readonly service: string,
		readonly code: number | null,
		readonly signal: NodeJS.Signals | null,
	) {
		super(signal
			? `${service} was killed by ${signal} after becoming ready`
			: `${service} exited with code ${code ?? 'unknown'} after becoming ready`);
	}
}

export class ForegroundLaunchError extends SupervisorError {
	readonly kind = 'foreground-launch' as const;
	readonly code: string | undefined;

	constructor(readonly command: string, cause: NodeJS.ErrnoException) {
		super(`Failed to launch ${command}: ${cause.message}`, {cause});
		this.code = cause.code;
	}
}

export class SupervisorAbortedError extends SupervisorError {
	readonly kind = 'aborted' as const;

	constructor(readonly signal: NodeJS.Signals) {
		super(`Received ${signal} before the foreground started`);
	}
}

export class ConfigError extends Error {
	constructor(readonly issues: string[], source?: string) {
		super(`Invalid config${source ? ` in ${source}` : ''}:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
		this.name = 'ConfigError';
	}
}

export class ConfigNotFoundError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigNotFoundError';
	}
}

export function exitCodeFor(err: unknown): number {
	return err instanceof SupervisorError ? SETUP_FAILURE_EXIT_CODE : 1;
}
