declare module Config {
	interface IConfig {
		DEBUG: boolean;
		/**
		 * When set, log messages are printed without colors and timestamps.
		 */
		CI_LOGGER: boolean;
		/**
		 * Explicit log4js level. Takes precedence over DEBUG.
		 */
		LOG_LEVEL?: string;
		/**
		 * The executable used to read the system log of a device.
		 */
		SYSLOG_EXECUTABLE: string;
	}
}
