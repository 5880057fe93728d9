import * as path from "path";
import { annotate, Injectable } from "./helpers";

function forEachName(names: string | string[], action: (name: string) => void): void {
	if (_.isString(names)) {
		action(names);
	} else {
		names.forEach(action);
	}
}

export interface IDependency {
	require?: string;
	resolver?: Injectable;
	instance?: unknown;
	shared?: boolean;
}

function isDisposable(instance: unknown): instance is IDisposable {
	return _.isObject(instance) && "dispose" in instance && _.isFunction(instance.dispose);
}

export class Yok implements IInjector {
	constructor() {
		this.register("injector", this);
	}

	private modules: IDictionary<IDependency> = {};

	private resolutionProgress: IDictionary<boolean> = {};

	public require(names: string | string[], file: string): void {
		forEachName(names, (name) => this.requireOne(name, file));
	}

	private requireOne(name: string, file: string): void {
		const dependency: IDependency = {
			require: path.join(__dirname, file),
			shared: true
		};

		if (!this.modules[name]) {
			this.modules[name] = dependency;
		} else {
			throw new Error(`module '${name}' require'd twice.`);
		}
	}

	public register(name: string, resolver: unknown, shared?: boolean): void {
		shared = shared === undefined ? true : shared;

		const dependency: IDependency = this.modules[name] || {};
		dependency.shared = shared;

		if (_.isFunction(resolver)) {
			dependency.resolver = resolver;
			delete dependency.instance;
		} else {
			dependency.instance = resolver;
		}

		this.modules[name] = dependency;
	}

	public resolve<T>(param: Injectable | string, ctorArguments?: IDictionary<unknown>): T {
		const instance = _.isString(param) ? this.resolveByName(param, ctorArguments) : this.resolveConstructor(param, ctorArguments);
		// The container knows nothing about the registered types, the caller states what it expects.
		return <T>instance;
	}

	private resolveConstructor(ctor: Injectable, ctorArguments?: IDictionary<unknown>): unknown {
		const $inject = annotate(ctor);

		const resolvedArgs = $inject.args.map(paramName => {
			if (ctorArguments && _.has(ctorArguments, paramName)) {
				return ctorArguments[paramName];
			} else {
				return this.resolve(paramName);
			}
		});

		const name = $inject.name;
		if (name && name[0] === name[0].toUpperCase()) {
			return Reflect.construct(ctor, resolvedArgs);
		} else {
			return Reflect.apply(ctor, null, resolvedArgs);
		}
	}

	private resolveByName(name: string, ctorArguments?: IDictionary<unknown>): unknown {
		if (name[0] === "$") {
			name = name.substr(1);
		}

		if (this.resolutionProgress[name]) {
			throw new Error(`Cyclic dependency detected on dependency '${name}'`);
		}
		this.resolutionProgress[name] = true;

		let dependency: IDependency;
		try {
			dependency = this.resolveDependency(name);

			if (!dependency.instance || !dependency.shared) {
				if (!dependency.resolver) {
					throw new Error("no resolver registered for " + name);
				}

				dependency.instance = this.resolveConstructor(dependency.resolver, ctorArguments);
			}
		} finally {
			delete this.resolutionProgress[name];
		}

		return dependency.instance;
	}

	private resolveDependency(name: string): IDependency {
		const module = this.modules[name];
		if (!module) {
			throw new Error("unable to resolve " + name);
		}

		if (module.require) {
			require(module.require);
		}

		return module;
	}

	public async dispose(): Promise<void> {
		for (const moduleName of Object.keys(this.modules)) {
			const instance = this.modules[moduleName].instance;
			if (instance !== this && isDisposable(instance)) {
				await instance.dispose();
			}
		}
	}
}

export const injector = new Yok();
