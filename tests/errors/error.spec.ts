import { describe, expect, test } from "vitest";

import { ApplicationError, ErrorCode, extractErrorMessage } from "@/errors";

describe("ApplicationError", () => {
	test("should carry code, operation and metadata", () => {
		const error = new ApplicationError("Translation failed", ErrorCode.TranslationFailed, "Op.run", {
			sequence: 3,
		});

		expect(error).toBeInstanceOf(Error);
		expect(error).toBeInstanceOf(ApplicationError);
		expect(error.name).toBe("ApplicationError");
		expect(error.code).toBe(ErrorCode.TranslationFailed);
		expect(error.metadata).toEqual({ sequence: 3 });
	});

	test("should default to an unknown error and operation", () => {
		const error = new ApplicationError("Something broke");

		expect(error.code).toBe(ErrorCode.UnknownError);
		expect(error.displayMessage).toBe("Something broke (in UnknownOperation)");
	});
});

describe("extractErrorMessage", () => {
	test("should include the operation of an application error", () => {
		expect(extractErrorMessage(new ApplicationError("Bad", ErrorCode.NoContent, "A.b"))).toBe(
			"Bad (in A.b)",
		);
	});

	test("should return the message of a plain error", () => {
		expect(extractErrorMessage(new Error("plain"))).toBe("plain");
	});

	test("should stringify anything else", () => {
		expect(extractErrorMessage(42)).toBe("42");
	});
});
