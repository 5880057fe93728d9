import { LogSourceKind } from "../../../constants";

// Devices on lower versions log to the system log only.
export const MINIMUM_UNIVERSAL_LOGGING_OS_VERSION = 13;
export const MINIMUM_REMOTE_CONSOLE_XCODE_VERSION = 26;
export const MINIMUM_CI_NATIVE_DEBUGGER_OS_VERSION = 16;

/**
 * Chooses the primary and fallback sources of device logs.
 * The result depends on whether the debugger is attached and whether the managed runtime is connected,
 * both of which change while the application runs, so it must be computed again on every use.
 */
export class IOSLogSourceClassifier implements Mobile.IiOSLogSourceClassifier {
	public classify(state: Mobile.IiOSLogSourceState): Mobile.IiOSLogSources {
		if (state.isCoreDevice) {
			if (state.xcodeMajorVersion !== null && state.xcodeMajorVersion >= MINIMUM_REMOTE_CONSOLE_XCODE_VERSION) {
				return { primarySource: LogSourceKind.RemoteConsole, fallbackSource: LogSourceKind.ManagedRuntime };
			}

			// The system log cannot be read over the network.
			if (state.isWirelesslyConnected) {
				return { primarySource: LogSourceKind.ManagedRuntime };
			}

			return { primarySource: LogSourceKind.SystemLog, fallbackSource: LogSourceKind.ManagedRuntime };
		}

		if (state.osMajorVersion < MINIMUM_UNIVERSAL_LOGGING_OS_VERSION) {
			return { primarySource: LogSourceKind.SystemLog };
		}

		// The debugger output is flaky on CI machines, so the system log backs it up.
		if (state.usingCISystem && state.osMajorVersion >= MINIMUM_CI_NATIVE_DEBUGGER_OS_VERSION) {
			return { primarySource: LogSourceKind.NativeDebugger, fallbackSource: LogSourceKind.SystemLog };
		}

		if (state.isManagedRuntimeConnected && !state.isNativeDebuggerAttached) {
			return { primarySource: LogSourceKind.ManagedRuntime, fallbackSource: LogSourceKind.NativeDebugger };
		}

		return { primarySource: LogSourceKind.NativeDebugger, fallbackSource: LogSourceKind.ManagedRuntime };
	}

	public usesLogSource(logSources: Mobile.IiOSLogSources, logSourceKind: LogSourceKind): boolean {
		return logSources.primarySource === logSourceKind || logSources.fallbackSource === logSourceKind;
	}
}
$injector.register("iOSLogSourceClassifier", IOSLogSourceClassifier);
