export type ReadinessProbe =
	| {type: 'command'; command: string}
	| {type: 'port'; port: number; host?: string}
	| {type: 'http'; url: string}
	| {type: 'file'; path: string}
	| {type: 'none'};

export type RestartPolicy = 'never' | 'on-failure';

export type ServiceSpec = {
	readonly name: string;
	readonly command: string;
	readonly cwd?: string;
	readonly env?: Readonly<Record<string, string>>;
	readonly readiness?: ReadinessProbe;
	readonly startupTimeoutMs?: number;
	readonly restartPolicy?: RestartPolicy;
	readonly maxRestarts?: number;
};

export type ForegroundSpec = {
	readonly command: string;
	readonly args?: readonly string[];
	readonly cwd?: string;
	readonly env?: Readonly<Record<string, string>>;
	readonly timeoutMs?: number;
};

export type StartupTimeoutPolicy = 'failFast' | 'proceedAnyway';

export type SupervisorOptions = {
	onStartupTimeout?: StartupTimeoutPolicy;
	failTogether?: boolean;
	pollIntervalMs?: number;
	gracePeriodMs?: number;
	cwd?: string;
	stateDir?: string;
	/** Write status.json after every transition (default: true) */
	writeStatus?: boolean;
};

export type Config = {
	services: ServiceSpec[];
	foreground?: ForegroundSpec;
	onStartupTimeout?: StartupTimeoutPolicy;
	failTogether?: boolean;
	pollIntervalMs?: number;
	gracePeriodMs?: number;
	dotenv?: string; // Path to .env file (default: .env in cwd)
	stateDir?: string; // Default: .standby in cwd
};

export type ServiceStatus = 'pending' | 'starting' | 'ready' | 'failed' | 'stopped';

export type ServiceState = {
	status: ServiceStatus;
	pid: number | null;
	restarts: number;
	lastError?: string;
	startedAt?: string;
	readyAt?: string;
};

export type Transition = {
	service: string;
	from: ServiceStatus;
	to: ServiceStatus;
};

type ResultBase = {
	code: number;
	services: Record<string, ServiceState>;
	transitions: Transition[];
	dependencyFailure?: {service: string; message: string};
};

export type SupervisorResult =
	| ResultBase & {outcome: 'exited'}
	| ResultBase & {outcome: 'signaled'; signal: NodeJS.Signals}
	| ResultBase & {outcome: 'timeout'; timeoutMs: number; signal: NodeJS.Signals | null};

export type StatusFile = {
	updatedAt: string;
	supervisor: {pid: number; startedAt: string} | null;
	services: Record<string, ServiceState>;
};
