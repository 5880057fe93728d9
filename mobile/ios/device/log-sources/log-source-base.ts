import { EventEmitter } from "events";
import { LogSourceKind, LogStreamEvents } from "../../../../constants";
import { getErrorMessage } from "../../../../helpers";

type EventListener = Parameters<NodeJS.EventEmitter["on"]>[1];

interface ISubscription {
	emitter: NodeJS.EventEmitter;
	eventName: string;
	listener: EventListener;
}

export abstract class LogSourceBase extends EventEmitter implements Mobile.IiOSLogSource {
	public abstract kind: LogSourceKind;
	public closesOutputOnEnd = false;

	protected isStopped = false;
	protected isStarted = false;
	private subscriptions: ISubscription[] = [];

	constructor(protected $logger: ILogger) {
		super();
	}

	public get canStart(): boolean {
		return true;
	}

	public async start(): Promise<void> {
		if (this.isStarted || this.isStopped || !this.canStart) {
			return;
		}

		this.isStarted = true;
		try {
			await this.startCore();
		} catch (err) {
			this.$logger.trace(`Unable to start ${this.kind} log source: ${getErrorMessage(err)}`);
		}
	}

	public async stop(): Promise<void> {
		if (this.isStopped) {
			return;
		}

		this.isStopped = true;
		_.each(this.subscriptions, subscription => subscription.emitter.removeListener(subscription.eventName, subscription.listener));
		this.subscriptions = [];

		await this.stopCore();
	}

	protected abstract startCore(): Promise<void>;

	protected async stopCore(): Promise<void> {
		return;
	}

	protected subscribe(emitter: NodeJS.EventEmitter, eventName: string, listener: EventListener): void {
		if (this.isStopped) {
			return;
		}

		emitter.on(eventName, listener);
		this.subscriptions.push({ emitter, eventName, listener });
	}

	protected emitLine(line: string): void {
		if (!this.isStopped) {
			this.emit(LogStreamEvents.LINE, line);
		}
	}

	protected emitError(err: Error): void {
		if (!this.isStopped) {
			this.emit(LogStreamEvents.ERROR, err);
		}
	}

	protected emitEnd(): void {
		if (!this.isStopped) {
			this.emit(LogStreamEvents.END);
		}
	}
}

/**
 * Log source that reads from a handle which becomes available after the application is started.
 */
export abstract class AttachableLogSourceBase<T extends NodeJS.EventEmitter> extends LogSourceBase {
	protected handle: T | null = null;

	public get isAttached(): boolean {
		return this.handle !== null;
	}

	public get canStart(): boolean {
		return this.isAttached;
	}

	/**
	 * Sets the handle to read from. Ignored once the source is started or stopped, the first handle stays subscribed until the end.
	 */
	public attach(handle: T): void {
		if (this.isStarted || this.isStopped) {
			this.$logger.trace(`The ${this.kind} log source is already started, the new handle is ignored.`);
			return;
		}

		this.handle = handle;
	}

	protected async startCore(): Promise<void> {
		if (this.handle) {
			await this.listenToLogs(this.handle);
		}
	}

	protected abstract listenToLogs(handle: T): Promise<void>;
}
