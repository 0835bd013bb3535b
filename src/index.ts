// Public API
export type {
	Config, ServiceSpec, ForegroundSpec, ReadinessProbe, RestartPolicy, ServiceState, ServiceStatus,
	StartupTimeoutPolicy, StatusFile, SupervisorOptions, SupervisorResult, Transition,
} from './types.js';
export {
	loadConfig, loadStateDir, validateConfig, applyEnvOverrides, loadEnvFile, getStateDir, getStatusPath, getLogsDir, getLogPath,
} from './config.js';
export {
	SupervisorError, DependencyStartupError, DependencyCrashError, ForegroundLaunchError, SupervisorAbortedError,
	ConfigError, ConfigNotFoundError, exitCodeFor, SETUP_FAILURE_EXIT_CODE,
} from './errors.js';
export {Supervisor, exitCodeOf, type SupervisorEvents} from './supervisor.js';
export {checkReadiness} from './readiness.js';
export {createConsoleLogger, silentLogger, type Logger} from './logger.js';
export {readStatusFile, formatStatus} from './status.js';
