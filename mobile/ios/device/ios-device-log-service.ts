import { LogStreamEvents } from "../../../constants";
import { isNullOrWhitespace } from "../../../helpers";
import { IOSDeviceLogReader } from "./ios-device-log-reader";

export class IOSDeviceLogService implements Mobile.IiOSDeviceLogService {
	private logReaders: IDictionary<Mobile.IiOSDeviceLogReader> = {};

	constructor(private $injector: IInjector,
		private $errors: IErrors,
		private $logger: ILogger) { }

	public getLogReader(options: Mobile.IiOSDeviceLogReaderOptions): Mobile.IiOSDeviceLogReader {
		this.validateOptions(options);

		const key = this.getLogReaderKey(options);
		const existingLogReader = this.logReaders[key];
		if (existingLogReader && !existingLogReader.isDisposed) {
			return existingLogReader;
		}

		this.$logger.trace(`Creating log reader for device ${options.deviceIdentifier}.`);
		const logReader = this.$injector.resolve(IOSDeviceLogReader, { options });
		this.logReaders[key] = logReader;

		return logReader;
	}

	public printDeviceLog(options: Mobile.IiOSDeviceLogReaderOptions): IDisposable {
		const logReader = this.getLogReader(options);

		const printLine = (line: string) => this.$logger.out(line);
		const printError = (err: Error) => this.$logger.warn(`Unable to read the logs of device ${logReader.name}: ${err.message}`);
		const printEnd = () => this.$logger.trace(`The logs of device ${logReader.name} ended.`);

		logReader.on(LogStreamEvents.ERROR, printError);
		logReader.once(LogStreamEvents.END, printEnd);
		logReader.on(LogStreamEvents.LINE, printLine);

		return {
			dispose: () => {
				logReader.removeListener(LogStreamEvents.LINE, printLine);
				logReader.removeListener(LogStreamEvents.ERROR, printError);
				logReader.removeListener(LogStreamEvents.END, printEnd);
			}
		};
	}

	public async dispose(): Promise<void> {
		const logReaders = _.values(this.logReaders);
		this.logReaders = {};

		await Promise.all(_.map(logReaders, logReader => logReader.dispose()));
	}

	private validateOptions(options: Mobile.IiOSDeviceLogReaderOptions): void {
		if (isNullOrWhitespace(options.deviceIdentifier)) {
			this.$errors.failWithoutHelp("Device identifier is required in order to read device logs.");
		}

		if (!_.isInteger(options.osMajorVersion) || options.osMajorVersion < 0) {
			this.$errors.failWithoutHelp("Invalid major version of iOS '%s' for device %s.", options.osMajorVersion, options.deviceIdentifier);
		}
	}

	private getLogReaderKey(options: Mobile.IiOSDeviceLogReaderOptions): string {
		return `${options.deviceIdentifier}:${options.appName || ""}`;
	}
}
$injector.register("iOSDeviceLogService", IOSDeviceLogService);
