import type { DestinationStream, Logger as PinoLogger, StreamEntry } from "pino";
import pino from "pino";

/**
 * Log stream type. "console" writes to stdout (optionally through pino-pretty),
 * "file" writes rotated files through pino-roll.
 */
export type LogStreamType = "console" | "file";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["trace", "debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: string | undefined): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

export interface ConsoleTransportConfig {
	type: "console";
	level: LogLevel;
	/** Pretty-print through pino-pretty instead of raw JSON lines. */
	pretty: boolean;
}

export interface FileTransportConfig {
	type: "file";
	level: LogLevel;
	/** Rotated files are written as `${fileDirectoryPath}/${filenamePrefix}.<date>.<n>.log`. */
	filenamePrefix: string;
	fileDirectoryPath: string;
	datePattern: string;
	/** Number of rotated files to keep. */
	maxFiles: number;
	/** Size limit before rotation, e.g. "500m". */
	maxSize: string;
}

export type TransportConfig = ConsoleTransportConfig | FileTransportConfig;

export interface LoggingConfig {
	/** When false, every logger returned by createLog is silent. */
	enabled: boolean;
	level: LogLevel;
	transports: Array<TransportConfig>;
	/**
	 * Per-module level overrides keyed by module name (file name without extension),
	 * parsed from "Module1:debug,Module2:warn".
	 */
	moduleOverrides: Record<string, LogLevel>;
}

export interface LoggingConfigOptions {
	enabled: boolean;
	level: LogLevel;
	pretty: boolean;
	/** Comma separated transport names, e.g. "console,file". */
	transportNames: string;
	moduleOverrides: string;
	filenamePrefix?: string;
	fileDirectoryPath?: string;
	datePattern?: string;
	maxFiles?: number;
	maxSize?: string;
}

const streams = new Map<string, DestinationStream>();

function getStream(transport: TransportConfig): DestinationStream {
	const key = transport.type === "console" ? `console:${transport.pretty}` : `file:${transport.filenamePrefix}`;
	const cached = streams.get(key);
	if (cached) {
		return cached;
	}

	let stream: DestinationStream;
	if (transport.type === "file") {
		stream = pino.transport({
			target: "pino-roll",
			level: transport.level,
			options: {
				file: `${transport.fileDirectoryPath}/${transport.filenamePrefix}`,
				frequency: "daily",
				size: transport.maxSize,
				dateFormat: transport.datePattern,
				extension: ".log",
				mkdir: true,
				limit: { count: transport.maxFiles },
			},
		});
	} else if (transport.pretty) {
		stream = pino.transport({
			target: "pino-pretty",
			level: transport.level,
			options: {
				colorize: true,
				translateTime: "yyyy-mm-dd HH:MM:ss",
				ignore: "pid,hostname",
				messageFormat: "{module} - {msg}",
				singleLine: true,
			},
		});
	} else {
		stream = pino.destination(1);
	}
	streams.set(key, stream);
	return stream;
}

/**
 * Derives the module name from an `import.meta` or a plain string:
 * `file:///srv/backend/src/onboarding/OnboardingDispatcher.ts` becomes `OnboardingDispatcher`.
 */
export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const lastSlashIndex = moduleUrl.lastIndexOf("/");
	const fileName = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
	const parts = fileName.split(".");
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileName;
}

/**
 * Parses "Module1:debug,Module2:warn" into a lookup. Entries with an unknown level are dropped.
 */
export function parseModuleOverrides(value: string): Record<string, LogLevel> {
	const overrides: Record<string, LogLevel> = {};
	for (const pair of value.split(",")) {
		const [module, level] = pair.split(":").map(part => part.trim());
		if (module && isLogLevel(level)) {
			overrides[module] = level;
		}
	}
	return overrides;
}

export function createLoggingConfig(options: LoggingConfigOptions): LoggingConfig {
	const {
		enabled,
		level,
		pretty,
		transportNames,
		moduleOverrides,
		filenamePrefix = "application",
		fileDirectoryPath = "./logs",
		datePattern = "yyyy-MM-dd",
		maxFiles = 14,
		maxSize = "500m",
	} = options;

	const transports: Array<TransportConfig> = [];
	for (const name of transportNames.split(",").map(t => t.trim())) {
		if (name === "console") {
			transports.push({ type: "console", level, pretty });
		} else if (name === "file") {
			transports.push({ type: "file", level, filenamePrefix, fileDirectoryPath, datePattern, maxFiles, maxSize });
		}
	}

	return {
		enabled,
		level,
		transports,
		moduleOverrides: parseModuleOverrides(moduleOverrides),
	};
}

/**
 * Reads the logging configuration from the environment:
 * - DISABLE_LOGGING: "true" silences every logger
 * - LOG_LEVEL: default level (info)
 * - LOG_PRETTY: pretty console output (defaults to true in development)
 * - LOG_TRANSPORTS: "console", "file" or both (console in development, file otherwise)
 * - LOG_LEVEL_OVERRIDES: "Module:level" pairs
 * - LOG_FILE_NAME_PREFIX, LOG_FILE_DIRECTORY_PATH, LOG_FILE_DATE_PATTERN, LOG_FILE_MAX_FILES
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
	const isDevelopment = env.NODE_ENV === "development";
	return createLoggingConfig({
		enabled: env.DISABLE_LOGGING !== "true",
		level: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info",
		pretty: (env.LOG_PRETTY ?? String(isDevelopment)) === "true",
		transportNames: env.LOG_TRANSPORTS ?? (isDevelopment ? "console" : "file"),
		moduleOverrides: env.LOG_LEVEL_OVERRIDES ?? "",
		filenamePrefix: env.LOG_FILE_NAME_PREFIX ?? "application",
		fileDirectoryPath: env.LOG_FILE_DIRECTORY_PATH ?? "./logs",
		datePattern: env.LOG_FILE_DATE_PATTERN ?? "yyyy-MM-dd",
		maxFiles: Number(env.LOG_FILE_MAX_FILES ?? "14"),
	});
}

function createDefaultLogger(config: LoggingConfig): PinoLogger {
	const entries: Array<StreamEntry> = config.transports.map(transport => ({
		level: transport.level,
		stream: getStream(transport),
	}));

	if (entries.length > 1) {
		return pino({ level: config.level }, pino.multistream(entries));
	}
	if (entries.length === 1) {
		return pino({ level: config.level }, entries[0].stream);
	}
	return pino({ level: config.level });
}

// Lower numeric value means more verbose.
function mostVerbose(a: LogLevel, b: LogLevel): LogLevel {
	const values = pino.levels.values;
	return values[a] < values[b] ? a : b;
}

export type Logger = PinoLogger;

let silentLogger: Logger | undefined;

/**
 * Get a logger for the given module. Call `createLog(import.meta)` near the top of a file.
 *
 * A module level override that is more verbose than the default lowers the parent
 * logger (and its transports) to that level, so the child can actually emit it.
 *
 * @param module the module meta or module name
 * @param loggingConfigProvider replaces the environment based configuration
 * @param defaultLoggerProvider replaces the pino root logger factory
 */
export function createLog(
	module: string | ImportMeta,
	loggingConfigProvider: () => LoggingConfig = getLoggingConfig,
	defaultLoggerProvider: (config: LoggingConfig) => PinoLogger = createDefaultLogger,
): Logger {
	const config = loggingConfigProvider();
	if (!config.enabled) {
		if (!silentLogger) {
			silentLogger = pino({ enabled: false });
		}
		return silentLogger;
	}

	const moduleName = getModuleName(module);
	const childLevel = config.moduleOverrides[moduleName] ?? config.level;
	const parentLevel = mostVerbose(childLevel, config.level);

	const root = defaultLoggerProvider({
		...config,
		level: parentLevel,
		transports: config.transports.map(transport => ({ ...transport, level: parentLevel })),
	});
	return root.child({ module: moduleName }, { level: childLevel });
}
