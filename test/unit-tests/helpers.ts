import * as helpers from "../../helpers";
import { assert } from "chai";

interface ITestData<TInput, TResult> {
	input: TInput;
	expectedResult: TResult;
}

describe("helpers", () => {
	const assertTestData = <TInput, TResult>(testData: ITestData<TInput, TResult>, method: (input: TInput) => TResult) => {
		const actualResult = method(testData.input);
		assert.deepEqual(actualResult, testData.expectedResult, `For input ${testData.input}, the expected result is: ${testData.expectedResult}, but actual result is: ${actualResult}.`);
	};

	describe("isNullOrWhitespace", () => {
		const testData: ITestData<unknown, boolean>[] = [
			{ input: null, expectedResult: true },
			{ input: undefined, expectedResult: true },
			{ input: "", expectedResult: true },
			{ input: "   ", expectedResult: true },
			{ input: "\t\n", expectedResult: true },
			{ input: "test-device", expectedResult: false },
			{ input: " a ", expectedResult: false },
			{ input: false, expectedResult: false },
			{ input: 42, expectedResult: false }
		];

		it("returns correct result for each input", () => {
			_.each(testData, data => assertTestData(data, helpers.isNullOrWhitespace));
		});
	});

	describe("getErrorMessage", () => {
		it("returns the message of errors", () => {
			assert.equal(helpers.getErrorMessage(new Error("failed")), "failed");
		});

		it("converts other values to string", () => {
			assert.equal(helpers.getErrorMessage("failed"), "failed");
			assert.equal(helpers.getErrorMessage(103), "103");
		});
	});

	describe("removeFirst", () => {
		it("removes only the first occurrence of the element", () => {
			const array = ["a", "b", "a"];

			assert.isTrue(helpers.removeFirst(array, "a"));
			assert.deepEqual(array, ["b", "a"]);
		});

		it("returns false when the element is not found", () => {
			const array = ["a"];

			assert.isFalse(helpers.removeFirst(array, "b"));
			assert.deepEqual(array, ["a"]);
		});
	});

	describe("annotate", () => {
		it("returns the names of the constructor parameters", () => {
			class TestService {
				constructor(private $logger: ILogger, private options: IDictionary<string>) { }
			}

			assert.deepEqual(helpers.annotate(TestService), { name: "TestService", args: ["$logger", "options"] });
		});

		it("returns the names of the function parameters", () => {
			function createService($config: Config.IConfig, $logger: ILogger): void { /* no implementation required */ }

			assert.deepEqual(helpers.annotate(createService), { name: "createService", args: ["$config", "$logger"] });
		});
	});
});
