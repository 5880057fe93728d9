import { LogSourceKind, LogStreamEvents } from "../../../../constants";
import { getErrorMessage } from "../../../../helpers";
import { AttachableLogSourceBase } from "./log-source-base";

// Native code prefixes its output with a timestamp and process information, for example:
// 2020-09-15 19:15:10.931434-0700 Runner[541:226276] [Category] Did finish launching.
const DEBUGGER_LOGGING_REGEX = /^\S* \S* \S*\[[0-9:]*] (.*)/;

export function stripDebuggerMetadata(line: string): string {
	const match = DEBUGGER_LOGGING_REGEX.exec(line);
	return match ? match[1] : line;
}

/**
 * Reads the output of the debugger attached to the application.
 * The debugger exits together with the application, so the end of its output ends the device log.
 */
export class NativeDebuggerLogSource extends AttachableLogSourceBase<Mobile.INativeDebugger> {
	public kind = LogSourceKind.NativeDebugger;
	public closesOutputOnEnd = true;

	constructor(protected $logger: ILogger) {
		super($logger);
	}

	public get debuggerAttached(): boolean {
		return this.handle ? this.handle.debuggerAttached : false;
	}

	protected async listenToLogs(nativeDebugger: Mobile.INativeDebugger): Promise<void> {
		this.subscribe(nativeDebugger, LogStreamEvents.LINE, (line: string) => this.emitLine(stripDebuggerMetadata(line)));
		this.subscribe(nativeDebugger, LogStreamEvents.ERROR, (err: Error) => this.emitError(err));
		this.subscribe(nativeDebugger, LogStreamEvents.END, () => this.emitEnd());
	}

	protected async stopCore(): Promise<void> {
		if (!this.handle) {
			return;
		}

		try {
			await this.handle.detach();
		} catch (err) {
			// The application may have already exited.
			this.$logger.trace(`Could not detach from debugger: ${getErrorMessage(err)}`);
		}
	}
}
