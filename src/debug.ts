import type { TimeProvider } from "./TimeProvider";

export type LogLevel = "debug" | "warn" | "log" | "error";

/** Where rotated log files are written. */
export interface IFileAdapter {
	append(path: string, content: string): Promise<void>;
	stat(path: string): Promise<{ size: number } | null>;
	exists(path: string): Promise<boolean>;
	remove(path: string): Promise<void>;
	rename(oldPath: string, newPath: string): Promise<void>;
	write(path: string, content: string): Promise<void>;
	read(path: string): Promise<string>;
}

export type LogEntry = {
	timestamp: string;
	level: LogLevel;
	message: string;
	callerInfo: string;
};

interface LogConfig {
	maxFileSize: number;
	maxBackups: number;
	disableConsole: boolean;
	batchInterval: number;
	maxRetries: number;
	allowStackTraces: boolean;
}

interface FileSink {
	adapter: IFileAdapter;
	path: string;
	timeProvider: TimeProvider;
	flushTimer: number;
	buffer: LogEntry[];
}

let debugging = false;

let logConfig: LogConfig = {
	maxFileSize: 1024 * 1024,
	maxBackups: 5,
	disableConsole: false,
	batchInterval: 1000,
	maxRetries: 3,
	allowStackTraces: false,
};

let sink: FileSink | null = null;
const logListeners = new Set<(entry: LogEntry) => void>();

export function setDebugging(debug: boolean) {
	debugging = debug;
}

export function isDebugging(): boolean {
	return debugging;
}

export function configureLogger(config: Partial<LogConfig>) {
	logConfig = { ...logConfig, ...config };
}

/**
 * Batch entries into `logFilePath`, flushing every `batchInterval` ms.
 * Replaces any sink set up earlier.
 */
export function initializeLogger(
	adapter: IFileAdapter,
	timeProvider: TimeProvider,
	logFilePath: string,
	config?: Partial<LogConfig>,
) {
	shutdownLogger();
	if (config) {
		configureLogger(config);
	}
	sink = {
		adapter,
		path: logFilePath,
		timeProvider,
		buffer: [],
		flushTimer: timeProvider.setInterval(() => {
			flushLogs().catch((error: unknown) => {
				console.error("Failed to flush logs:", error);
			});
		}, logConfig.batchInterval),
	};
}

/** Stops the flush interval and detaches the file sink. Unflushed entries are dropped. */
export function shutdownLogger() {
	if (!sink) return;
	sink.timeProvider.clearInterval(sink.flushTimer);
	sink = null;
}

/** Observe every recorded entry, whether or not a file sink is attached. */
export function onLogEntry(listener: (entry: LogEntry) => void): () => void {
	logListeners.add(listener);
	return () => {
		logListeners.delete(listener);
	};
}

export async function flushLogs() {
	const target = sink;
	if (!target || target.buffer.length === 0) return;
	const entries = target.buffer.splice(0);
	const content = entries.map(formatLogEntry).join("\n") + "\n";

	for (let attempt = 1; attempt <= logConfig.maxRetries; attempt++) {
		try {
			await rotateLogIfNeeded(target.adapter, target.path);
			await target.adapter.append(target.path, content);
			return;
		} catch (error) {
			console.error(`Failed to write logs (attempt ${attempt}):`, error);
		}
	}
	console.error(`Discarded ${entries.length} log entries`);
}

const backupPath = (path: string, n: number) => `${path}.${n}`;

async function rotateLogIfNeeded(
	adapter: IFileAdapter,
	path: string,
): Promise<void> {
	const stat = await adapter.stat(path);
	if (!stat || stat.size <= logConfig.maxFileSize) return;

	const oldest = backupPath(path, logConfig.maxBackups);
	if (await adapter.exists(oldest)) {
		await adapter.remove(oldest);
	}
	for (let n = logConfig.maxBackups - 1; n > 0; n--) {
		if (await adapter.exists(backupPath(path, n))) {
			await adapter.rename(backupPath(path, n), backupPath(path, n + 1));
		}
	}
	await adapter.rename(path, backupPath(path, 1));
	await adapter.write(path, "");
}

export function formatLogEntry(entry: LogEntry): string {
	return `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}\n    at ${entry.callerInfo}`;
}

const SENSITIVE_KEYS = ["token", "authorization", "email", "key"];

function isSensitive(key: string): boolean {
	const lower = key.toLowerCase();
	return SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive));
}

/**
 * Render one logger argument. Objects become indented JSON with secrets
 * redacted, binary payloads summarized and cycles marked.
 */
export function serializeArg(arg: unknown): string {
	if (arg instanceof Error) {
		return `${arg.name}: ${arg.message}`;
	}
	if (typeof arg !== "object" || arg === null) {
		return String(arg);
	}
	const seen = new WeakSet<object>();
	const replacer = (key: string, value: unknown): unknown => {
		if (isSensitive(key)) return "[REDACTED]";
		if (value instanceof Uint8Array) return `[Uint8Array(${value.length})]`;
		if (value instanceof Error) {
			return {
				name: value.name,
				message: value.message,
				stack: value.stack
					?.split("\n")
					.map((line) => line.trim())
					.join(" "),
			};
		}
		if (typeof value === "object" && value !== null) {
			if (seen.has(value)) return "[Circular]";
			seen.add(value);
		}
		return value;
	};
	try {
		return JSON.stringify(arg, replacer, 2);
	} catch (error) {
		if (error instanceof RangeError) {
			return `[Complex Object: ${Object.prototype.toString.call(arg)}]`;
		}
		return `[Unserializable: ${error instanceof Error ? error.message : String(error)}]`;
	}
}

function record(entry: LogEntry) {
	if (!logConfig.disableConsole) {
		console[entry.level](
			logConfig.allowStackTraces
				? formatLogEntry(entry)
				: `[${entry.level.toUpperCase()}] ${entry.message}`,
		);
	}
	for (const listener of logListeners) {
		listener(entry);
	}
	sink?.buffer.push(entry);
}

export function curryLog(context: string, level: LogLevel = "log") {
	return (...args: unknown[]) => {
		// warnings and errors are always recorded
		if (!debugging && (level === "debug" || level === "log")) {
			return;
		}
		record({
			timestamp: new Date().toISOString(),
			level,
			message: `${context}: ${args.map(serializeArg).join(" ")}`,
			callerInfo: new Error().stack?.split("\n")[2]?.trim() ?? "",
		});
	};
}

async function existingLogFiles(target: FileSink): Promise<string[]> {
	const candidates = [target.path];
	for (let n = 1; n <= logConfig.maxBackups; n++) {
		candidates.push(backupPath(target.path, n));
	}
	const files: string[] = [];
	for (const file of candidates) {
		if (await target.adapter.exists(file)) {
			files.push(file);
		}
	}
	return files;
}

/** The current log file followed by its backups, newest first. */
export async function getAllLogFiles(): Promise<string[]> {
	return sink ? existingLogFiles(sink) : [];
}

/** Every log file's content, oldest first. */
export async function getAllLogs(): Promise<string> {
	const target = sink;
	if (!target) return "";
	const files = await existingLogFiles(target);
	const contents = await Promise.all(
		files.map((file) => target.adapter.read(file)),
	);
	return contents.reverse().join("\n");
}

export class HasLogging {
	protected debug;
	protected log;
	protected warn;
	protected error;

	constructor(context?: string) {
		const prefix = `[${context || this.constructor.name}]`;
		this.debug = curryLog(prefix, "debug");
		this.log = curryLog(prefix, "log");
		this.warn = curryLog(prefix, "warn");
		this.error = curryLog(prefix, "error");
	}
}
