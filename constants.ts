export enum ErrorCodes {
	UNKNOWN = 127,
	INVALID_ARGUMENT = 128
}

export class LoggerLevels {
	static Trace = "trace";
	static Debug = "debug";
	static Info = "info";
}

export enum LogSourceKind {
	/**
	 * The system log of the device, read with idevicesyslog.
	 */
	SystemLog = "SystemLog",

	/**
	 * The output of the debugger attached to the application.
	 */
	NativeDebugger = "NativeDebugger",

	/**
	 * The Stdout and Stderr streams of the managed runtime service.
	 */
	ManagedRuntime = "ManagedRuntime",

	/**
	 * The console of a CoreDevice, available with recent versions of Xcode.
	 */
	RemoteConsole = "RemoteConsole"
}

export class LogStreamEvents {
	static LINE = "line";
	static ERROR = "error";
	static END = "end";
}

export class ManagedRuntimeStreams {
	static Debug = "Debug";
	static Stdout = "Stdout";
	static Stderr = "Stderr";
}

// Returned by the runtime service when the stream is already listened to.
export const STREAM_ALREADY_SUBSCRIBED_ERROR_CODE = 103;

export const APPLICATION_LOG_PREFIX = "flutter:";

export const DEVICE_LOG_READER_DISPOSED_MESSAGE = "Log reader for device %s is disposed.";
