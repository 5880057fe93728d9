import { decodeSyslog } from "../../../../mobile/ios/device/ios-syslog-decoder";
import { assert } from "chai";

describe("decodeSyslog", () => {
	it("returns lines without escape sequences as they are", () => {
		assert.equal(decodeSyslog("flutter: Hello world"), "flutter: Hello world");
		assert.equal(decodeSyslog(""), "");
	});

	it("keeps a leading byte order mark", () => {
		assert.equal(decodeSyslog("\uFEFFflutter: hello"), "\uFEFFflutter: hello");
		assert.equal(decodeSyslog("\uFEFF\\M-C\\M-)"), "\uFEFF\u00e9");
	});

	it("keeps characters which are not ASCII", () => {
		assert.equal(decodeSyslog("flutter: héllo"), "flutter: héllo");
	});

	it("decodes meta characters", () => {
		assert.equal(decodeSyslog("caf\\M-C\\M-)"), "café");
	});

	it("decodes control meta characters", () => {
		assert.equal(decodeSyslog("a\\M-b\\M^@\\M^Tb"), "a\u2014b");
	});

	it("decodes octal triplets", () => {
		assert.equal(decodeSyslog("\\134"), "\\");
		assert.equal(decodeSyslog("\\M-B\\240"), "\u00a0");
	});

	it("returns the line as is when the decoded bytes are not valid UTF-8", () => {
		assert.equal(decodeSyslog("\\240"), "\\240");
		assert.equal(decodeSyslog("flutter: \\M-C"), "flutter: \\M-C");
	});

	it("copies backslash close to the end of the line", () => {
		assert.equal(decodeSyslog("path\\"), "path\\");
		assert.equal(decodeSyslog("ab\\M-"), "ab\\M-");
	});

	it("copies unknown escape sequences", () => {
		assert.equal(decodeSyslog("\\xyz!"), "\\xyz!");
		assert.equal(decodeSyslog("C:\\Users\\test"), "C:\\Users\\test");
	});

	it("returns the same result when called again with the same line", () => {
		const line = "caf\\M-C\\M-) \\134";
		assert.equal(decodeSyslog(line), decodeSyslog(line));
	});
});
