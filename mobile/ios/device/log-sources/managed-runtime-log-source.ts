import { LogSourceKind, ManagedRuntimeStreams, STREAM_ALREADY_SUBSCRIBED_ERROR_CODE } from "../../../../constants";
import { getErrorMessage } from "../../../../helpers";
import { AttachableLogSourceBase } from "./log-source-base";

function isStreamAlreadySubscribedError(err: unknown): boolean {
	return _.isObject(err) && "code" in err && err.code === STREAM_ALREADY_SUBSCRIBED_ERROR_CODE;
}

/**
 * Converts an event of the Stdout or Stderr stream to the text written by the application.
 */
export function getManagedRuntimeMessage(event: Mobile.IManagedRuntimeStreamEvent): string {
	const message = Buffer.from(event.bytes || "", "base64").toString("utf8");

	// The runtime adds a new line after each message.
	return _.endsWith(message, "\n") ? message.substring(0, message.length - 1) : message;
}

/**
 * Reads the Stdout and Stderr streams of the managed runtime service.
 */
export class ManagedRuntimeLogSource extends AttachableLogSourceBase<Mobile.IManagedRuntimeConnection> {
	public kind = LogSourceKind.ManagedRuntime;

	constructor(protected $logger: ILogger) {
		super($logger);
	}

	protected async listenToLogs(connection: Mobile.IManagedRuntimeConnection): Promise<void> {
		// The runtime does not publish logging events unless the Debug stream is listened to.
		connection.streamListen(ManagedRuntimeStreams.Debug)
			.catch(err => this.$logger.trace(`Unable to listen to the ${ManagedRuntimeStreams.Debug} stream: ${getErrorMessage(err)}`));

		try {
			await Promise.all([
				connection.streamListen(ManagedRuntimeStreams.Stdout),
				connection.streamListen(ManagedRuntimeStreams.Stderr)
			]);
		} catch (err) {
			if (!isStreamAlreadySubscribedError(err)) {
				throw err;
			}
		}

		const logMessage = (event: Mobile.IManagedRuntimeStreamEvent) => {
			const message = getManagedRuntimeMessage(event);
			if (message) {
				this.emitLine(message);
			}
		};

		this.subscribe(connection, ManagedRuntimeStreams.Stdout, logMessage);
		this.subscribe(connection, ManagedRuntimeStreams.Stderr, logMessage);
	}
}
