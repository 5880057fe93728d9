/* tslint:disable:no-empty */

import * as util from "util";
import { EventEmitter } from "events";
import { PassThrough } from "stream";

export class CommonLoggerStub implements ILogger {
	private level = "INFO";

	setLevel(level: string): void {
		this.level = level.toUpperCase();
	}
	getLevel(): string { return this.level; }
	error(...args: unknown[]): void { }
	warn(...args: unknown[]): void {
		this.out(...args);
	}
	info(...args: unknown[]): void {
		this.out(...args);
	}
	debug(...args: unknown[]): void { }
	trace(...args: unknown[]): void {
		this.traceOutput += util.format(...args) + "\n";
	}

	public output = "";
	public traceOutput = "";

	out(...args: unknown[]): void {
		this.output += util.format(...args) + "\n";
	}
}

export class ErrorsStub implements IErrors {
	fail(formatStr: string, ...args: unknown[]): never;
	fail(opts: IFailOptions, ...args: unknown[]): never;

	fail(optsOrFormatStr: string | IFailOptions, ...args: unknown[]): never {
		const formatStr = _.isString(optsOrFormatStr) ? optsOrFormatStr : optsOrFormatStr.formatStr;
		throw new Error(util.format(formatStr, ...args));
	}

	failWithoutHelp(message: string, ...args: unknown[]): never {
		throw new Error(util.format(message, ...args));
	}
}

export class ProcessServiceStub implements IProcessService {
	private listeners: { context: object, callback: () => void }[] = [];

	public get callbacks(): (() => void)[] {
		return _.map(this.listeners, listener => listener.callback);
	}

	public get listenersCount(): number {
		return this.listeners.length;
	}

	public attachToProcessExitSignals(context: object, callback: () => void): void {
		this.listeners.push({ context, callback });
	}

	public detachFromProcessExitSignals(context: object): void {
		_.remove(this.listeners, listener => listener.context === context);
	}
}

export class LogCaptureProcessStub extends EventEmitter implements Mobile.ILogCaptureProcess {
	public stdout = new PassThrough();
	public stderr = new PassThrough();
	public killed = false;

	public kill(signal?: NodeJS.Signals | number): boolean {
		this.killed = true;
		this.emit("close", null);
		return true;
	}

	public writeLines(...lines: string[]): void {
		_.each(lines, line => this.stdout.write(`${line}\n`));
	}
}

export class IOSMobileDeviceStub implements Mobile.IiOSMobileDevice {
	public processes: LogCaptureProcessStub[] = [];
	public startLoggerArgs: { deviceIdentifier: string, isWirelesslyConnected: boolean }[] = [];
	public startLoggerError: Error | null = null;

	public async startLogger(deviceIdentifier: string, isWirelesslyConnected: boolean): Promise<Mobile.ILogCaptureProcess> {
		this.startLoggerArgs.push({ deviceIdentifier, isWirelesslyConnected });
		if (this.startLoggerError) {
			throw this.startLoggerError;
		}

		const loggingProcess = new LogCaptureProcessStub();
		this.processes.push(loggingProcess);
		return loggingProcess;
	}
}

export class NativeDebuggerStub extends EventEmitter implements Mobile.INativeDebugger {
	public debuggerAttached = true;
	public detachCount = 0;

	public async detach(): Promise<void> {
		this.detachCount++;
		this.debuggerAttached = false;
	}
}

export class RemoteConsoleLoggerStub extends EventEmitter implements Mobile.IRemoteConsoleLogger { }

export class ManagedRuntimeConnectionStub extends EventEmitter implements Mobile.IManagedRuntimeConnection {
	public listenedStreams: string[] = [];
	public streamListenErrors: IDictionary<Error> = {};

	public async streamListen(streamId: string): Promise<void> {
		this.listenedStreams.push(streamId);
		const err = this.streamListenErrors[streamId];
		if (err) {
			throw err;
		}
	}

	public writeMessage(streamId: string, message: string): void {
		this.emit(streamId, { bytes: Buffer.from(message, "utf8").toString("base64") });
	}
}

export class RuntimeServiceError extends Error {
	constructor(message: string, public code: number) {
		super(message);
	}
}

/**
 * Lets pending promises, timers and stream events run until the condition is met.
 */
export async function waitUntil(condition: () => boolean, attempts?: number): Promise<void> {
	attempts = attempts || 100;
	for (let i = 0; i < attempts && !condition(); i++) {
		await new Promise<void>(resolve => setImmediate(resolve));
	}
}

export async function flushPromises(): Promise<void> {
	await waitUntil(() => false, 10);
}
