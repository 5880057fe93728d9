declare module Mobile {
	type LogSourceKind = import("../constants").LogSourceKind;

	/**
	 * Describes the device and application for which logs are read.
	 */
	interface IiOSDeviceLogReaderOptions {
		/**
		 * The unique identifier of the device.
		 */
		deviceIdentifier: string;

		/**
		 * Human readable name of the device.
		 */
		deviceName?: string;

		/**
		 * The name of the application's executable, for example `Runner`.
		 * System log lines are matched against it.
		 */
		appName?: string;

		/**
		 * The major version of iOS running on the device.
		 */
		osMajorVersion: number;

		/**
		 * Whether the device is connected over the network instead of USB.
		 */
		isWirelesslyConnected?: boolean;

		/**
		 * Whether the device is reachable through the CoreDevice connectivity stack.
		 */
		isCoreDevice?: boolean;

		/**
		 * The major version of the installed Xcode. Unknown when not passed.
		 */
		xcodeMajorVersion?: number;

		/**
		 * Whether the application is launched on a continuous integration system.
		 */
		usingCISystem?: boolean;
	}

	/**
	 * Everything the log source classifier needs in order to choose where device logs are read from.
	 */
	interface IiOSLogSourceState {
		isCoreDevice: boolean;
		isWirelesslyConnected: boolean;
		osMajorVersion: number;
		xcodeMajorVersion: number | null;
		isNativeDebuggerAttached: boolean;
		isManagedRuntimeConnected: boolean;
		usingCISystem: boolean;
	}

	/**
	 * The log sources chosen for a device.
	 */
	interface IiOSLogSources {
		/**
		 * The source whose lines are always trusted.
		 */
		primarySource: LogSourceKind;

		/**
		 * The source used until the primary proves that it works.
		 */
		fallbackSource?: LogSourceKind;
	}

	interface IiOSLogSourceClassifier {
		/**
		 * Chooses the primary and fallback log sources. Pure function of the passed state.
		 */
		classify(state: IiOSLogSourceState): IiOSLogSources;

		/**
		 * Checks if the log source is either the primary or the fallback one.
		 */
		usesLogSource(logSources: IiOSLogSources, logSourceKind: LogSourceKind): boolean;
	}

	/**
	 * A producer of log lines. Emits `line`, `error` and `end` events.
	 */
	interface IiOSLogSource extends NodeJS.EventEmitter {
		kind: LogSourceKind;

		/**
		 * Whether the end of this source means the application is gone and no more logs will come.
		 */
		closesOutputOnEnd: boolean;

		/**
		 * Whether the source has everything it needs to be started.
		 */
		canStart: boolean;

		/**
		 * Starts reading logs. Calling it more than once has no effect.
		 * Failures are not propagated: the source simply does not produce lines.
		 */
		start(): Promise<void>;

		/**
		 * Stops reading logs and releases everything the source owns.
		 */
		stop(): Promise<void>;
	}

	/**
	 * A handle to something that produces log lines, for example the remote console of a device.
	 * Emits `line`, `error` and `end` events.
	 */
	interface ILogLineEmitter extends NodeJS.EventEmitter { }

	/**
	 * A debugger attached to the application process on the device.
	 */
	interface INativeDebugger extends ILogLineEmitter {
		readonly debuggerAttached: boolean;
		detach(): Promise<void>;
	}

	interface IRemoteConsoleLogger extends ILogLineEmitter { }

	/**
	 * An event of the Stdout and Stderr streams of the managed runtime service.
	 */
	interface IManagedRuntimeStreamEvent {
		/**
		 * Base64 encoded UTF-8 bytes written by the application.
		 */
		bytes?: string;
	}

	/**
	 * A connection to the service protocol of the managed runtime.
	 * Emits events named after the streams it was asked to listen to.
	 */
	interface IManagedRuntimeConnection extends NodeJS.EventEmitter {
		streamListen(streamId: string): Promise<void>;
	}

	/**
	 * A process which captures the system log of a device.
	 */
	interface ILogCaptureProcess extends NodeJS.EventEmitter {
		stdout: import("stream").Readable | null;
		stderr: import("stream").Readable | null;
		kill(signal?: NodeJS.Signals | number): boolean;
	}

	interface IiOSMobileDevice {
		/**
		 * Starts reading the system log of the specified device.
		 * @param {string} deviceIdentifier The unique identifier of the device.
		 * @param {boolean} isWirelesslyConnected Whether the device should be reached over the network.
		 */
		startLogger(deviceIdentifier: string, isWirelesslyConnected: boolean): Promise<ILogCaptureProcess>;
	}

	/**
	 * Reads the logs of an application running on iOS device.
	 * Emits `line` for each log line, `error` when a source fails and `end` when no more lines will be emitted.
	 * Log sources are started when the first `line` listener is added and stopped when the last one is removed.
	 */
	interface IiOSDeviceLogReader extends NodeJS.EventEmitter {
		readonly name: string;
		readonly logSources: IiOSLogSources;
		readonly isDisposed: boolean;

		/**
		 * Reads logs from the debugger in case it is one of the selected log sources.
		 */
		provideNativeDebugger(nativeDebugger: INativeDebugger): Promise<void>;

		/**
		 * Reads logs from the managed runtime in case it is one of the selected log sources.
		 */
		provideManagedRuntime(connection: IManagedRuntimeConnection): Promise<void>;

		/**
		 * Reads logs from the remote console in case it is one of the selected log sources.
		 */
		provideRemoteConsole(remoteConsoleLogger: IRemoteConsoleLogger): Promise<void>;

		/**
		 * Stops all log sources. Calling it more than once has no effect.
		 */
		dispose(): Promise<void>;
	}

	interface IiOSDeviceLogService extends IDisposable {
		/**
		 * Returns the log reader for the application on the device. Creates a new one when there isn't a live one.
		 */
		getLogReader(options: IiOSDeviceLogReaderOptions): IiOSDeviceLogReader;

		/**
		 * Prints the logs of the application on the device until the returned object is disposed.
		 */
		printDeviceLog(options: IiOSDeviceLogReaderOptions): IDisposable;

		dispose(): Promise<void>;
	}
}
