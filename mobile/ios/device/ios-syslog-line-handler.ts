import { decodeSyslog } from "./ios-syslog-decoder";

enum SyslogLineHandlerState {
	Idle,
	Printing
}

// Header of a log line written by any process, for example `locationd[57] <Notice>: `.
const ANY_LINE_REGEX = /\w+(\([^)]*\))?\[\d+\] <[A-Za-z]+>: /;

/**
 * Builds the regular expression that matches the header of the log lines written by the application.
 * iOS 9 writes `Runner[297] <Notice>: `, iOS 10 and later `Runner(Flutter)[297] <Notice>: `.
 */
export function getRunnerLineRegex(appName: string): RegExp {
	const namePattern = appName ? `(?<!\\w)${_.escapeRegExp(appName)}` : "";
	return new RegExp(`${namePattern}(\\(Flutter\\))?\\[[\\d]+\\] <[A-Za-z]+>: `);
}

/**
 * Extracts the messages of the application from the lines of the system log.
 * Only the first line of a multiline message has a header, so after such a line all following lines
 * are considered part of the message until a line with the header of any process appears.
 * Use one instance per stream of lines.
 */
export class IOSSyslogLineHandler {
	private state = SyslogLineHandlerState.Idle;

	constructor(private runnerLineRegex: RegExp) { }

	/**
	 * @param {string} line A line of the system log.
	 * @returns {string} The decoded message or null when the line does not belong to the application.
	 */
	public handleLine(line: string): string | null {
		if (this.state === SyslogLineHandlerState.Printing) {
			if (!ANY_LINE_REGEX.test(line)) {
				return decodeSyslog(line);
			}

			this.state = SyslogLineHandlerState.Idle;
		}

		const match = this.runnerLineRegex.exec(line);
		if (!match) {
			return null;
		}

		this.state = SyslogLineHandlerState.Printing;
		return decodeSyslog(line.substring(match.index + match[0].length));
	}
}
