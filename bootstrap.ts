import "./globals";
import { injector } from "./yok";

global.$injector = injector;

$injector.require("config", "./config");
$injector.require("logger", "./logger");
$injector.require("errors", "./errors");
$injector.require("childProcess", "./child-process");
$injector.require("processService", "./services/process-service");

$injector.require("iOSMobileDevice", "./mobile/ios/device/ios-mobile-device");
$injector.require("iOSLogSourceClassifier", "./mobile/ios/device/ios-log-source-classifier");
$injector.require("iOSDeviceLogService", "./mobile/ios/device/ios-device-log-service");
