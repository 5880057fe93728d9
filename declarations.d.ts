interface IDictionary<T> {
	[key: string]: T
}

interface IDisposable {
	dispose(): void | Promise<void>;
}

/**
 * Describes the dependency injection container.
 */
interface IInjector {
	/**
	 * Registers a module which will be required from `file` the first time it is resolved.
	 * The required file is expected to register the module itself.
	 */
	require(names: string | string[], file: string): void;

	/**
	 * Registers a class, a factory function or a ready instance under the specified name.
	 * @param {boolean} shared @optional Whether a single instance should be reused. Defaults to true.
	 */
	register(name: string, resolver: unknown, shared?: boolean): void;

	/**
	 * Creates a new instance of the passed class. Constructor parameters are resolved by name,
	 * the ones found in `ctorArguments` are taken from there.
	 */
	resolve<T>(ctor: new (...args: never[]) => T, ctorArguments?: IDictionary<unknown>): T;

	/**
	 * Returns the instance registered under the specified name. A leading `$` is ignored.
	 */
	resolve<T>(name: string, ctorArguments?: IDictionary<unknown>): T;

	/**
	 * Disposes all shared instances that have a `dispose` method.
	 */
	dispose(): Promise<void>;
}

declare var $injector: IInjector;

interface IFailOptions {
	formatStr?: string;
	errorCode?: number;
	name?: string;
}

interface IException extends Error {
	errorCode: number;
}

interface IErrors {
	fail(formatStr: string, ...args: unknown[]): never;
	fail(opts: IFailOptions, ...args: unknown[]): never;
	failWithoutHelp(message: string, ...args: unknown[]): never;
}

interface IChildProcess {
	spawn(command: string, args?: string[], options?: import("child_process").SpawnOptions): import("child_process").ChildProcess;
}

/**
 * Describes a service which executes callbacks when the current process exits.
 */
interface IProcessService {
	/**
	 * The number of the registered callbacks.
	 */
	listenersCount: number;

	/**
	 * Registers a callback which will be executed once when the process receives exit, SIGINT or SIGTERM.
	 * The same callback is registered only once for the same context.
	 * @param {object} context The `this` of the callback.
	 * @param {Function} callback The action that will be executed.
	 */
	attachToProcessExitSignals(context: object, callback: () => void): void;

	/**
	 * Removes all callbacks registered for the context.
	 */
	detachFromProcessExitSignals(context: object): void;
}
