import byline = require("byline");
import { Readable } from "stream";
import { LogSourceKind } from "../../../../constants";
import { getRunnerLineRegex, IOSSyslogLineHandler } from "../ios-syslog-line-handler";
import { LogSourceBase } from "./log-source-base";

/**
 * Reads the system log of the device with idevicesyslog.
 * This is the only source which does not need a running application.
 */
export class SyslogLogSource extends LogSourceBase {
	public kind = LogSourceKind.SystemLog;

	private loggingProcess: Mobile.ILogCaptureProcess | null = null;
	private runnerLineRegex: RegExp;

	constructor(private options: Mobile.IiOSDeviceLogReaderOptions,
		private $iOSMobileDevice: Mobile.IiOSMobileDevice,
		private $processService: IProcessService,
		protected $logger: ILogger) {
		super($logger);
		this.runnerLineRegex = getRunnerLineRegex(this.options.appName || "");
	}

	protected async startCore(): Promise<void> {
		const deviceIdentifier = this.options.deviceIdentifier;
		const loggingProcess = await this.$iOSMobileDevice.startLogger(deviceIdentifier, !!this.options.isWirelesslyConnected);

		if (this.isStopped) {
			loggingProcess.kill();
			return;
		}

		this.loggingProcess = loggingProcess;

		loggingProcess.once("error", (err: Error) => {
			this.$logger.trace(`Unable to read the system log of device ${deviceIdentifier}. More info: ${err.message}.`);
		});

		loggingProcess.once("close", (code: number | null) => {
			this.$logger.trace(`The system log process of device ${deviceIdentifier} exited with code ${code}.`);
		});

		this.readLines(loggingProcess.stdout);
		this.readLines(loggingProcess.stderr);

		this.$processService.attachToProcessExitSignals(this, () => this.killLoggingProcess());
	}

	protected async stopCore(): Promise<void> {
		this.$processService.detachFromProcessExitSignals(this);
		this.killLoggingProcess();
	}

	private readLines(stream: Readable | null): void {
		if (!stream) {
			return;
		}

		// Each stream has its own multiline state.
		const lineHandler = new IOSSyslogLineHandler(this.runnerLineRegex);
		const lineStream = byline(stream);

		this.subscribe(lineStream, "data", (line: Buffer | string) => {
			const message = lineHandler.handleLine(line.toString());
			if (message !== null) {
				this.emitLine(message);
			}
		});

		this.subscribe(stream, "error", (err: Error) => this.emitError(err));
	}

	private killLoggingProcess(): void {
		if (this.loggingProcess) {
			this.loggingProcess.kill();
			this.loggingProcess = null;
		}
	}
}
