import * as util from "util";
import { ErrorCodes } from "./constants";

export class Exception extends Error implements IException {
	public errorCode: number = ErrorCodes.UNKNOWN;

	constructor(message: string, name?: string) {
		super(message);
		this.name = name || "Exception";
	}
}

export function installUncaughtExceptionListener(actionOnException?: () => void): void {
	process.on("uncaughtException", (err: Error) => {
		console.error(err.stack || err.toString());

		if (actionOnException) {
			actionOnException();
		}
	});
}

export class Errors implements IErrors {
	constructor(private $injector: IInjector) {
	}

	public fail(optsOrFormatStr: string | IFailOptions, ...args: unknown[]): never {
		const opts: IFailOptions = _.isString(optsOrFormatStr) ? { formatStr: optsOrFormatStr } : optsOrFormatStr;

		const exception = new Exception(util.format(opts.formatStr, ...args), opts.name);
		exception.errorCode = opts.errorCode || ErrorCodes.UNKNOWN;
		this.$injector.resolve<ILogger>("logger").trace(opts.formatStr);
		throw exception;
	}

	public failWithoutHelp(message: string, ...args: unknown[]): never {
		return this.fail({ formatStr: util.format(message, ...args), errorCode: ErrorCodes.INVALID_ARGUMENT });
	}
}
$injector.register("errors", Errors);
