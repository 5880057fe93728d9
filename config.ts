import { ConfigBase } from "./config-base";

export class Configuration extends ConfigBase implements Config.IConfig {
	DEBUG = false;
	CI_LOGGER = false;
	LOG_LEVEL?: string;
	SYSLOG_EXECUTABLE = "idevicesyslog";

	constructor() {
		super();

		const config = this.loadConfig("config");
		this.DEBUG = _.isBoolean(config.DEBUG) ? config.DEBUG : this.DEBUG;
		this.CI_LOGGER = _.isBoolean(config.CI_LOGGER) ? config.CI_LOGGER : this.CI_LOGGER;
		this.LOG_LEVEL = _.isString(config.LOG_LEVEL) ? config.LOG_LEVEL : this.LOG_LEVEL;
		this.SYSLOG_EXECUTABLE = _.isString(config.SYSLOG_EXECUTABLE) ? config.SYSLOG_EXECUTABLE : this.SYSLOG_EXECUTABLE;
	}
}
$injector.register("config", Configuration);
