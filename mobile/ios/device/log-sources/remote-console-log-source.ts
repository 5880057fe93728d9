import { LogSourceKind, LogStreamEvents } from "../../../../constants";
import { AttachableLogSourceBase } from "./log-source-base";

/**
 * Reads the console of a CoreDevice. The console is closed when the application exits.
 */
export class RemoteConsoleLogSource extends AttachableLogSourceBase<Mobile.IRemoteConsoleLogger> {
	public kind = LogSourceKind.RemoteConsole;
	public closesOutputOnEnd = true;

	constructor(protected $logger: ILogger) {
		super($logger);
	}

	protected async listenToLogs(remoteConsoleLogger: Mobile.IRemoteConsoleLogger): Promise<void> {
		this.subscribe(remoteConsoleLogger, LogStreamEvents.LINE, (line: string) => this.emitLine(line));
		this.subscribe(remoteConsoleLogger, LogStreamEvents.ERROR, (err: Error) => this.emitError(err));
		this.subscribe(remoteConsoleLogger, LogStreamEvents.END, () => this.emitEnd());
	}
}
