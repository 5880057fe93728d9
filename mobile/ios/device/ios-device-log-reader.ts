import { EventEmitter } from "events";
import { APPLICATION_LOG_PREFIX, DEVICE_LOG_READER_DISPOSED_MESSAGE, LogSourceKind, LogStreamEvents } from "../../../constants";
import { getErrorMessage, removeFirst } from "../../../helpers";
import { LogSourceBase } from "./log-sources/log-source-base";
import { ManagedRuntimeLogSource } from "./log-sources/managed-runtime-log-source";
import { NativeDebuggerLogSource } from "./log-sources/native-debugger-log-source";
import { RemoteConsoleLogSource } from "./log-sources/remote-console-log-source";
import { SyslogLogSource } from "./log-sources/syslog-log-source";
import * as util from "util";

enum LogReaderState {
	/**
	 * Nobody listens for lines, no log sources are started.
	 */
	Idle,
	Active,
	Disposed
}

/**
 * Reads the logs of an application on iOS device from up to four sources: the system log, the debugger,
 * the managed runtime and the remote console of the device. Two of them are used at a time - the primary and the fallback.
 * Lines of the fallback are shown until the primary shows that it works, duplicates of lines already shown are skipped.
 */
export class IOSDeviceLogReader extends EventEmitter implements Mobile.IiOSDeviceLogReader {
	private state = LogReaderState.Idle;
	private disposePromise: Promise<void> | null = null;

	/**
	 * Messages prefixed with "flutter:" which were shown from the fallback source and not yet received from the primary.
	 */
	private fallbackSourceFlutterMessages: string[] = [];

	/**
	 * Whether a message prefixed with "flutter:" has been received from the primary source.
	 */
	private primarySourceFlutterLogReceived = false;

	private syslogLogSource: SyslogLogSource;
	private nativeDebuggerLogSource: NativeDebuggerLogSource;
	private managedRuntimeLogSource: ManagedRuntimeLogSource;
	private remoteConsoleLogSource: RemoteConsoleLogSource;

	constructor(private options: Mobile.IiOSDeviceLogReaderOptions,
		private $injector: IInjector,
		private $iOSLogSourceClassifier: Mobile.IiOSLogSourceClassifier,
		private $logger: ILogger) {
		super();

		this.syslogLogSource = this.$injector.resolve(SyslogLogSource, { options });
		this.nativeDebuggerLogSource = this.$injector.resolve(NativeDebuggerLogSource);
		this.managedRuntimeLogSource = this.$injector.resolve(ManagedRuntimeLogSource);
		this.remoteConsoleLogSource = this.$injector.resolve(RemoteConsoleLogSource);

		_.each(this.allLogSources, logSource => this.attachToLogSource(logSource));

		this.on("newListener", (eventName: string | symbol) => {
			if (eventName === LogStreamEvents.LINE && this.state === LogReaderState.Idle) {
				this.startLoggers().catch(err => this.$logger.trace(`Unable to start reading logs of device ${this.name}: ${getErrorMessage(err)}`));
			}
		});

		this.on("removeListener", (eventName: string | symbol) => {
			if (eventName === LogStreamEvents.LINE && this.listenerCount(LogStreamEvents.LINE) === 0 && this.state === LogReaderState.Active) {
				this.dispose().catch(err => this.$logger.trace(`Unable to stop reading logs of device ${this.name}: ${getErrorMessage(err)}`));
			}
		});
	}

	public get name(): string {
		return this.options.deviceName || this.options.deviceIdentifier;
	}

	public get isDisposed(): boolean {
		return this.state === LogReaderState.Disposed;
	}

	public get logSources(): Mobile.IiOSLogSources {
		return this.$iOSLogSourceClassifier.classify({
			isCoreDevice: !!this.options.isCoreDevice,
			isWirelesslyConnected: !!this.options.isWirelesslyConnected,
			osMajorVersion: this.options.osMajorVersion,
			xcodeMajorVersion: _.isNumber(this.options.xcodeMajorVersion) ? this.options.xcodeMajorVersion : null,
			isNativeDebuggerAttached: this.nativeDebuggerLogSource.debuggerAttached,
			isManagedRuntimeConnected: this.managedRuntimeLogSource.isAttached,
			usingCISystem: !!this.options.usingCISystem
		});
	}

	public usesLogSource(logSourceKind: LogSourceKind): boolean {
		return this.$iOSLogSourceClassifier.usesLogSource(this.logSources, logSourceKind);
	}

	public async provideNativeDebugger(nativeDebugger: Mobile.INativeDebugger): Promise<void> {
		if (this.canAttach(LogSourceKind.NativeDebugger)) {
			this.nativeDebuggerLogSource.attach(nativeDebugger);
			await this.startIfActive(this.nativeDebuggerLogSource);
		}
	}

	public async provideManagedRuntime(connection: Mobile.IManagedRuntimeConnection): Promise<void> {
		if (this.canAttach(LogSourceKind.ManagedRuntime)) {
			this.managedRuntimeLogSource.attach(connection);
			await this.startIfActive(this.managedRuntimeLogSource);
		}
	}

	public async provideRemoteConsole(remoteConsoleLogger: Mobile.IRemoteConsoleLogger): Promise<void> {
		if (this.canAttach(LogSourceKind.RemoteConsole)) {
			this.remoteConsoleLogSource.attach(remoteConsoleLogger);
			await this.startIfActive(this.remoteConsoleLogSource);
		}
	}

	/**
	 * Emits the message unless it should be skipped because of the selected primary and fallback sources.
	 * Messages are dropped while nobody listens.
	 */
	public addLogLine(message: string, logSourceKind: LogSourceKind): void {
		if (this.state !== LogReaderState.Active || this.excludeLog(message, logSourceKind)) {
			return;
		}

		this.emit(LogStreamEvents.LINE, message);
	}

	public dispose(): Promise<void> {
		if (!this.disposePromise) {
			this.state = LogReaderState.Disposed;
			this.fallbackSourceFlutterMessages = [];
			this.disposePromise = this.stopLogSources();
		}

		return this.disposePromise;
	}

	private get allLogSources(): LogSourceBase[] {
		return [this.syslogLogSource, this.nativeDebuggerLogSource, this.managedRuntimeLogSource, this.remoteConsoleLogSource];
	}

	private async startLoggers(): Promise<void> {
		this.state = LogReaderState.Active;

		// The system log is the only source which can be read without a running application.
		const logSourcesToStart = _.filter(this.allLogSources, logSource => logSource.canStart && this.usesLogSource(logSource.kind));
		await Promise.all(_.map(logSourcesToStart, logSource => logSource.start()));
	}

	private canAttach(logSourceKind: LogSourceKind): boolean {
		if (this.isDisposed) {
			this.$logger.trace(util.format(DEVICE_LOG_READER_DISPOSED_MESSAGE, this.name));
			return false;
		}

		return this.usesLogSource(logSourceKind);
	}

	private async startIfActive(logSource: LogSourceBase): Promise<void> {
		if (this.state === LogReaderState.Active) {
			await logSource.start();
		}
	}

	private attachToLogSource(logSource: LogSourceBase): void {
		logSource.on(LogStreamEvents.LINE, (line: string) => this.addLogLine(line, logSource.kind));

		logSource.on(LogStreamEvents.ERROR, (err: Error) => {
			if (this.state === LogReaderState.Disposed) {
				return;
			}

			if (this.listenerCount(LogStreamEvents.ERROR) > 0) {
				this.emit(LogStreamEvents.ERROR, err);
			} else {
				this.$logger.trace(`Error while reading ${logSource.kind} logs of device ${this.name}: ${err.message}`);
			}

			this.close();
		});

		logSource.on(LogStreamEvents.END, () => {
			if (logSource.closesOutputOnEnd) {
				this.close();
			}
		});
	}

	private close(): void {
		if (this.state === LogReaderState.Disposed) {
			return;
		}

		this.dispose().catch(err => this.$logger.trace(`Unable to stop reading logs of device ${this.name}: ${getErrorMessage(err)}`));
		this.emit(LogStreamEvents.END);
	}

	private async stopLogSources(): Promise<void> {
		await Promise.all(_.map(this.allLogSources, logSource => logSource.stop()));
	}

	/**
	 * There are up to four sources of logs. When both primary and fallback sources are used, prefer the primary one.
	 * In case the primary does not work, use the fallback.
	 */
	private excludeLog(message: string, logSourceKind: LogSourceKind): boolean {
		const logSources = this.logSources;

		if (!logSources.fallbackSource) {
			return false;
		}

		const isFlutterMessage = _.startsWith(message, APPLICATION_LOG_PREFIX);

		if (logSourceKind === logSources.primarySource) {
			if (isFlutterMessage) {
				this.primarySourceFlutterLogReceived = true;
			}

			// The fallback was faster and the message is already shown.
			return removeFirst(this.fallbackSourceFlutterMessages, message);
		}

		// The primary source works, the fallback is not needed.
		if (this.primarySourceFlutterLogReceived) {
			return true;
		}

		// Sources prefix other messages differently, so duplicates of them cannot be found.
		if (!isFlutterMessage) {
			return true;
		}

		this.fallbackSourceFlutterMessages.push(message);
		return false;
	}
}
