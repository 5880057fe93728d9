export class IOSMobileDevice implements Mobile.IiOSMobileDevice {
	constructor(private $childProcess: IChildProcess,
		private $config: Config.IConfig) { }

	public async startLogger(deviceIdentifier: string, isWirelesslyConnected: boolean): Promise<Mobile.ILogCaptureProcess> {
		const args = ["-u", deviceIdentifier];
		if (isWirelesslyConnected) {
			args.push("--network");
		}

		return this.$childProcess.spawn(this.$config.SYSLOG_EXECUTABLE, args);
	}
}
$injector.register("iOSMobileDevice", IOSMobileDevice);
