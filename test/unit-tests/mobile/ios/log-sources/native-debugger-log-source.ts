import { NativeDebuggerLogSource, stripDebuggerMetadata } from "../../../../../mobile/ios/device/log-sources/native-debugger-log-source";
import { LogStreamEvents } from "../../../../../constants";
import { Yok } from "../../../../../yok";
import { CommonLoggerStub, NativeDebuggerStub } from "../../../stubs";
import { assert } from "chai";

describe("NativeDebuggerLogSource", () => {
	let logger: CommonLoggerStub;
	let logSource: NativeDebuggerLogSource;
	let nativeDebugger: NativeDebuggerStub;
	let lines: string[];

	beforeEach(() => {
		logger = new CommonLoggerStub();
		const testInjector: IInjector = new Yok();
		testInjector.register("logger", logger);

		logSource = testInjector.resolve(NativeDebuggerLogSource);
		nativeDebugger = new NativeDebuggerStub();
		lines = [];
		logSource.on(LogStreamEvents.LINE, (line: string) => lines.push(line));
	});

	describe("stripDebuggerMetadata", () => {
		it("removes the timestamp and the process information", () => {
			assert.equal(stripDebuggerMetadata("2020-09-15 19:15:10.931434-0700 Runner[541:226276] Did finish launching."), "Did finish launching.");
			assert.equal(stripDebuggerMetadata("2020-09-15 19:15:10.931434-0700 Runner[541:226276] [Category] Did finish launching."), "[Category] Did finish launching.");
		});

		it("returns lines without metadata as they are", () => {
			assert.equal(stripDebuggerMetadata("flutter: The service is listening"), "flutter: The service is listening");
		});
	});

	it("cannot start before a debugger is attached", async () => {
		assert.isFalse(logSource.canStart);
		assert.isFalse(logSource.debuggerAttached);

		await logSource.start();
		logSource.attach(nativeDebugger);
		await logSource.start();
		nativeDebugger.emit(LogStreamEvents.LINE, "flutter: hello");

		assert.deepEqual(lines, ["flutter: hello"]);
	});

	it("emits the debugger output without metadata", async () => {
		logSource.attach(nativeDebugger);
		await logSource.start();
		nativeDebugger.emit(LogStreamEvents.LINE, "2020-09-15 19:15:10.931434-0700 Runner[541:226276] flutter: hello");

		assert.deepEqual(lines, ["flutter: hello"]);
	});

	it("reports whether the debugger is attached", () => {
		logSource.attach(nativeDebugger);
		assert.isTrue(logSource.debuggerAttached);

		nativeDebugger.debuggerAttached = false;
		assert.isFalse(logSource.debuggerAttached);
	});

	it("forwards the end of the debugger output", async () => {
		let ended = false;
		logSource.on(LogStreamEvents.END, () => ended = true);
		logSource.attach(nativeDebugger);
		await logSource.start();

		nativeDebugger.emit(LogStreamEvents.END);

		assert.isTrue(ended);
		assert.isTrue(logSource.closesOutputOnEnd);
	});

	it("detaches the debugger when stopped", async () => {
		logSource.attach(nativeDebugger);
		await logSource.start();
		await logSource.stop();
		nativeDebugger.emit(LogStreamEvents.LINE, "flutter: late");

		assert.equal(nativeDebugger.detachCount, 1);
		assert.deepEqual(lines, []);
		assert.equal(nativeDebugger.listenerCount(LogStreamEvents.LINE), 0);
	});

	it("keeps reading the first debugger when another one is attached after start", async () => {
		const otherDebugger = new NativeDebuggerStub();
		logSource.attach(nativeDebugger);
		await logSource.start();

		logSource.attach(otherDebugger);
		otherDebugger.emit(LogStreamEvents.LINE, "flutter: ignored");
		nativeDebugger.emit(LogStreamEvents.LINE, "flutter: hello");
		await logSource.stop();

		assert.deepEqual(lines, ["flutter: hello"]);
		assert.equal(nativeDebugger.detachCount, 1);
		assert.equal(otherDebugger.detachCount, 0);
		assert.equal(logger.traceOutput, "The NativeDebugger log source is already started, the new handle is ignored.\n");
	});

	it("does not fail when the debugger cannot be detached", async () => {
		nativeDebugger.detach = async () => { throw new Error("process exited"); };
		logSource.attach(nativeDebugger);
		await logSource.start();
		await logSource.stop();

		assert.equal(logger.traceOutput, "Could not detach from debugger: process exited\n");
	});
});
