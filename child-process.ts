import * as child_process from "child_process";

export class ChildProcess implements IChildProcess {
	constructor(private $logger: ILogger) { }

	public spawn(command: string, args?: string[], options?: child_process.SpawnOptions): child_process.ChildProcess {
		this.$logger.debug("spawn: %s %s", command, this.getArgumentsAsQuotedString(args || []));
		return child_process.spawn(command, args || [], options || {});
	}

	private getArgumentsAsQuotedString(args: string[]): string {
		return args.map(argument => `"${argument}"`).join(" ");
	}
}
$injector.register("childProcess", ChildProcess);
