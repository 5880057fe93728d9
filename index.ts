import "./bootstrap";

export { LogSourceKind, LogStreamEvents } from "./constants";
export { decodeSyslog } from "./mobile/ios/device/ios-syslog-decoder";
export { IOSLogSourceClassifier } from "./mobile/ios/device/ios-log-source-classifier";
export { IOSSyslogLineHandler, getRunnerLineRegex } from "./mobile/ios/device/ios-syslog-line-handler";
export { IOSDeviceLogReader } from "./mobile/ios/device/ios-device-log-reader";

/**
 * Returns the service which creates the log readers of iOS devices.
 */
export function getDeviceLogService(): Mobile.IiOSDeviceLogService {
	return $injector.resolve<Mobile.IiOSDeviceLogService>("iOSDeviceLogService");
}
