import type { DestinationStream, LevelWithSilent, Logger as PinoLogger, StreamEntry } from "pino";
import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogTransportType = "console" | "file";

/**
 * Settings for one log destination.
 */
export interface LogTransportConfig {
	type: LogTransportType;
	level: LogLevel;
	/** Pretty-print through pino-pretty. Console only. */
	pretty: boolean;
}

/**
 * Rolling file destination, written through pino-roll.
 * Files are named `${filenamePrefix}.<date>.<n>.log` inside `fileDirectoryPath`.
 */
export interface FileTransportConfig extends LogTransportConfig {
	type: "file";
	filenamePrefix: string;
	fileDirectoryPath: string;
	maxFiles: number;
	/** Size before rotation, e.g. "100m". */
	maxSize: string;
}

export interface LoggingConfig {
	/** When false every logger is a no-op. */
	enabled: boolean;
	level: LogLevel;
	transports: Array<LogTransportConfig>;
	/**
	 * Per-module level overrides keyed by file name without extension,
	 * e.g. `{ SetupOrchestrator: "debug" }`.
	 */
	moduleOverrides: Record<string, string | undefined>;
}

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["trace", "debug", "info", "warn", "error", "fatal"];

// One destination per transport type, shared by every module logger. Levels are applied by the
// loggers and multistream entries, so a shared transport passes everything through.
const destinations = new Map<LogTransportType, DestinationStream>();

function isFileTransport(config: LogTransportConfig): config is FileTransportConfig {
	return config.type === "file";
}

function getDestination(transportConfig: LogTransportConfig): DestinationStream {
	const existing = destinations.get(transportConfig.type);
	if (existing) {
		return existing;
	}

	let destination: DestinationStream;
	if (isFileTransport(transportConfig)) {
		const { fileDirectoryPath, filenamePrefix, maxFiles, maxSize } = transportConfig;
		destination = pino.transport({
			target: "pino-roll",
			level: "trace",
			options: {
				file: `${fileDirectoryPath}/${filenamePrefix}`,
				frequency: "daily",
				size: maxSize,
				extension: ".log",
				mkdir: true,
				limit: { count: maxFiles },
			},
		});
	} else if (transportConfig.pretty) {
		destination = pino.transport({
			target: "pino-pretty",
			level: "trace",
			options: {
				colorize: true,
				translateTime: "yyyy-mm-dd HH:MM:ss",
				ignore: "pid,hostname",
				messageFormat: "{module} - {msg}",
				singleLine: true,
			},
		});
	} else {
		destination = process.stdout;
	}
	destinations.set(transportConfig.type, destination);
	return destination;
}

/**
 * Extracts the module name (file name without extension) from an import.meta or a plain name.
 */
export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const fileName = moduleUrl.substring(moduleUrl.lastIndexOf("/") + 1);
	const parts = fileName.split(".");
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileName;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
	if (!value) {
		return;
	}
	const normalized = value.trim().toLowerCase();
	return LOG_LEVELS.find(level => level === normalized);
}

/**
 * Builds a logging configuration.
 *
 * @param transportNames comma-separated list, e.g. "console,file"
 * @param moduleOverrides comma-separated `Module:level` pairs, e.g. "SetupOrchestrator:debug,Retry:warn"
 */
export function createLoggingConfig(
	enabled: boolean,
	level: LogLevel,
	pretty: boolean,
	transportNames: string,
	moduleOverrides: string,
	fileDirectoryPath = "./logs",
	filenamePrefix = "setup",
	maxFiles = 14,
	maxSize = "100m",
): LoggingConfig {
	const transports: Array<LogTransportConfig> = [];
	for (const name of transportNames.split(",").map(t => t.trim())) {
		if (name === "console") {
			transports.push({ type: "console", level, pretty });
		} else if (name === "file") {
			const fileTransport: FileTransportConfig = {
				type: "file",
				level,
				pretty: false,
				fileDirectoryPath,
				filenamePrefix,
				maxFiles,
				maxSize,
			};
			transports.push(fileTransport);
		}
	}

	const overrides: Record<string, string> = {};
	for (const pair of moduleOverrides ? moduleOverrides.split(",") : []) {
		const [moduleName, moduleLevel] = pair.split(":");
		if (moduleName && moduleLevel) {
			overrides[moduleName.trim()] = moduleLevel.trim();
		}
	}

	return { enabled, level, transports, moduleOverrides: overrides };
}

/**
 * Reads logging configuration from the environment:
 * - DISABLE_LOGGING: "true" turns every logger into a no-op
 * - LOG_LEVEL: default level (info)
 * - LOG_PRETTY: pretty console output (defaults to true when NODE_ENV=development)
 * - LOG_TRANSPORTS: "console", "file" or both (console)
 * - LOG_LEVEL_OVERRIDES: "Module:level,..."
 * - LOG_FILE_DIRECTORY_PATH, LOG_FILE_NAME_PREFIX, LOG_FILE_MAX_FILES, LOG_FILE_MAX_SIZE
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
	const isDevelopment = env.NODE_ENV === "development";
	return createLoggingConfig(
		env.DISABLE_LOGGING !== "true",
		parseLogLevel(env.LOG_LEVEL) ?? "info",
		(env.LOG_PRETTY ?? (isDevelopment ? "true" : "false")) === "true",
		env.LOG_TRANSPORTS ?? "console",
		env.LOG_LEVEL_OVERRIDES ?? "",
		env.LOG_FILE_DIRECTORY_PATH ?? "./logs",
		env.LOG_FILE_NAME_PREFIX ?? "setup",
		Number(env.LOG_FILE_MAX_FILES ?? "14"),
		env.LOG_FILE_MAX_SIZE ?? "100m",
	);
}

function createDefaultLogger(config: LoggingConfig): PinoLogger {
	const streams: Array<StreamEntry> = config.transports.map(transport => ({
		level: transport.level,
		stream: getDestination(transport),
	}));
	if (streams.length > 1) {
		return pino({ level: config.level }, pino.multistream(streams));
	}
	if (streams.length === 1) {
		return pino({ level: config.level }, streams[0].stream);
	}
	return pino({ level: config.level });
}

function lowerLevel(a: LogLevel, b: LogLevel): LogLevel {
	return LOG_LEVELS.indexOf(a) < LOG_LEVELS.indexOf(b) ? a : b;
}

function createModuleLogger(
	moduleName: string,
	config: LoggingConfig,
	loggerProvider: (config: LoggingConfig) => PinoLogger,
): PinoLogger {
	const moduleLevel = parseLogLevel(config.moduleOverrides[moduleName]) ?? config.level;
	// The parent must be at least as verbose as the child or the child's extra levels are dropped.
	const parentLevel = lowerLevel(moduleLevel, config.level);
	const parent = loggerProvider({
		...config,
		level: parentLevel,
		transports: config.transports.map(t => ({ ...t, level: parentLevel })),
	});
	const childLevel: LevelWithSilent = moduleLevel;
	return parent.child({ module: moduleName }, { level: childLevel });
}

export type Logger = PinoLogger;

let noopLogger: Logger | undefined;

function getNoOpLogger(): Logger {
	if (!noopLogger) {
		noopLogger = pino({ enabled: false });
	}
	return noopLogger;
}

/**
 * Get a logger for a module. Call `createLog(import.meta)` near the top of the file, after imports.
 *
 * @param loggingConfigProvider replaces the environment-based configuration
 * @param loggerProvider replaces the pino factory, mostly for tests
 */
export function createLog(
	module: string | ImportMeta,
	loggingConfigProvider: () => LoggingConfig = getLoggingConfig,
	loggerProvider: (config: LoggingConfig) => PinoLogger = createDefaultLogger,
): Logger {
	const config = loggingConfigProvider();
	if (!config.enabled) {
		return getNoOpLogger();
	}
	return createModuleLogger(getModuleName(module), config, loggerProvider);
}
