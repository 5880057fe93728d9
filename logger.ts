import * as log4js from "log4js";
import * as util from "util";
import chalk from "chalk";
import { LoggerLevels } from "./constants";

export class Logger implements ILogger {
	private log4jsLogger: log4js.Logger;

	constructor(private $config: Config.IConfig) {
		const layout: log4js.Layout = this.$config.CI_LOGGER ?
			{ type: "messagePassThrough" } :
			{ type: "pattern", pattern: "%[[%d]%] %[[%p]%]: %m" };

		const logLevel = this.$config.LOG_LEVEL || (this.$config.DEBUG ? LoggerLevels.Debug : LoggerLevels.Info);

		log4js.configure({
			appenders: { out: { type: "console", layout } },
			categories: { default: { appenders: ["out"], level: logLevel } }
		});

		this.log4jsLogger = log4js.getLogger("default");
	}

	setLevel(level: string): void {
		this.log4jsLogger.level = level;
	}

	getLevel(): string {
		return this.log4jsLogger.level.toString();
	}

	error(...args: unknown[]): void {
		const message = util.format(...args);
		this.log4jsLogger.error(chalk.red(message));
	}

	warn(...args: unknown[]): void {
		const message = util.format(...args);
		this.log4jsLogger.warn(chalk.yellow(message));
	}

	info(...args: unknown[]): void {
		this.log4jsLogger.info(util.format(...args));
	}

	debug(...args: unknown[]): void {
		this.log4jsLogger.debug(util.format(...args));
	}

	trace(...args: unknown[]): void {
		this.log4jsLogger.trace(util.format(...args));
	}

	out(...args: unknown[]): void {
		this.log4jsLogger.info(util.format(...args));
	}
}

$injector.register("logger", Logger);
