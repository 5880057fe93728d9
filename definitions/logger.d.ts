interface ILogger {
	setLevel(level: string): void;
	getLevel(): string;
	error(formatStr?: unknown, ...args: unknown[]): void;
	warn(formatStr?: unknown, ...args: unknown[]): void;
	info(formatStr?: unknown, ...args: unknown[]): void;
	debug(formatStr?: unknown, ...args: unknown[]): void;
	trace(formatStr?: unknown, ...args: unknown[]): void;

	out(formatStr?: unknown, ...args: unknown[]): void;
}
