import { describe, expect, it } from "vitest";
import { isJsonObject, readJson, writeJson } from "../src/json-text.js";

describe("readJson", () => {
	it("reads objects into maps in document order", () => {
		const value = readJson('{"b":1,"2":[true,false,null,-1.5e2],"__proto__":{"x":"\\u0041\\n"}}');

		expect(isJsonObject(value)).toBe(true);
		if (!isJsonObject(value)) {
			return;
		}
		expect([...value.keys()]).toEqual(["b", "2", "__proto__"]);
		expect(value.get("2")).toEqual([true, false, null, -150]);
		const nested = value.get("__proto__");
		expect(isJsonObject(nested) && nested.get("x")).toBe("A\n");
	});

	it("accepts whitespace around tokens", () => {
		expect(writeJson(readJson(' { "a" : [ 1 , { } , [ ] ] } \n'))).toBe('{"a":[1,{},[]]}');
	});

	it("rejects trailing commas", () => {
		expect(() => readJson("[1,]")).toThrow("Expected a JSON value at position 3");
	});

	it("rejects text after the value", () => {
		expect(() => readJson('{"a":1} x')).toThrow("Expected end of input at position 8");
	});

	it("rejects leading zeros", () => {
		expect(() => readJson("01")).toThrow("Expected end of input at position 1");
	});

	it("rejects unquoted member names", () => {
		expect(() => readJson("{a:1}")).toThrow("Expected a string at position 1");
	});

	it("rejects control characters in strings", () => {
		expect(() => readJson('"a\u0001"')).toThrow("Expected a string at position 0");
	});

	it("rejects duplicate member names", () => {
		expect(() => readJson('{"a":1,"a":2}')).toThrow('Duplicate member "a" at position 7');
	});

	it("rejects empty input", () => {
		expect(() => readJson("")).toThrow(SyntaxError);
	});
});

describe("writeJson", () => {
	it("matches JSON.stringify for ordinary names", () => {
		const text = '{"files":{"app":{"files":{"main.js":{"size":12,"offset":"0","executable":true}}}},"list":["a\\"b",0.5]}';

		expect(writeJson(readJson(text))).toBe(text);
		expect(writeJson(readJson(text))).toBe(JSON.stringify(JSON.parse(text)));
	});

	it("keeps integer-like names where they were", () => {
		expect(writeJson(readJson('{"b":0,"10":1,"9":2}'))).toBe('{"b":0,"10":1,"9":2}');
	});
});
