import { getErrorMessage } from "../helpers";

interface IListener {
	context: object;
	callback: () => void;
}

export class ProcessService implements IProcessService {
	private processExitSignals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
	private listeners: IListener[] = [];
	private hasExecutedCallbacks = false;

	public get listenersCount(): number {
		return this.listeners.length;
	}

	constructor(private $logger: ILogger) { }

	public attachToProcessExitSignals(context: object, callback: () => void): void {
		const callbackToString = callback.toString();

		if (this.listeners.length === 0) {
			process.on("exit", () => this.executeAllCallbacks());
			_.each(this.processExitSignals, (signal: NodeJS.Signals) => {
				process.on(signal, () => {
					this.executeAllCallbacks();
					process.exit();
				});
			});
		}

		if (!_.some(this.listeners, (listener: IListener) => context === listener.context && callbackToString === listener.callback.toString())) {
			this.listeners.push({ context, callback });
		}
	}

	public detachFromProcessExitSignals(context: object): void {
		_.remove(this.listeners, (listener: IListener) => listener.context === context);
	}

	private executeAllCallbacks(): void {
		if (this.hasExecutedCallbacks) {
			return;
		}

		this.hasExecutedCallbacks = true;
		_.each(this.listeners, (listener: IListener) => {
			try {
				listener.callback.apply(listener.context);
			} catch (err) {
				// Let the other callbacks run.
				this.$logger.trace(`Error while executing process exit callback: ${getErrorMessage(err)}`);
			}
		});
	}
}
$injector.register("processService", ProcessService);
