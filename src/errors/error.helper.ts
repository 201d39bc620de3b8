import { APIError } from "openai/error";
import { z } from "zod";

import { logger as baseLogger } from "@/utils/logger.util";
import { detectRateLimit } from "@/utils/rate-limit-detector.util";

import { ApplicationError, ErrorCode } from "./error";

/** Metadata fields added by {@link mapError} for LLM API errors */
export interface LLMApiErrorMetadata {
	/** HTTP status code from LLM API response */
	statusCode?: number;

	/** Specific error type from LLM API (if available) */
	type?: string;

	/** Original error message */
	originalMessage?: string;
}

/** Metadata fields added by {@link mapError} for file system errors */
export interface FileSystemErrorMetadata {
	/** `errno` code such as `ENOENT` */
	systemCode?: string;

	/** Path the failing call operated on */
	path?: string;
}

/** Metadata fields added by {@link mapError} for schema validation errors */
export interface ValidationErrorMetadata {
	/** Flattened validation issues */
	issues?: string[];
}

/** Metadata carried by every error returned from {@link mapError} */
export type MappedErrorMetadata = Record<string, unknown> &
	LLMApiErrorMetadata &
	FileSystemErrorMetadata &
	ValidationErrorMetadata;

/** Node's file system error codes that mean "the resource is not there or not readable" */
const UNREADABLE_RESOURCE_CODES = new Set(["ENOENT", "EACCES", "EISDIR", "ENOTDIR", "EPERM"]);

/**
 * Maps errors to {@link ApplicationError} with appropriate error codes.
 *
 * @param error The error to map
 * @param operation The operation that failed
 * @param metadata Optional additional debugging context
 *
 * @returns An `ApplicationError` with appropriate code and context
 *
 * @example
 * ```typescript
 * try {
 *   await openai.chat.completions.create({ ... });
 * } catch (error) {
 *   throw mapError(error, "LLMTranslatorService.complete", { model: "gpt-4o-mini" });
 * }
 * ```
 */
export function mapError(
	error: unknown,
	operation: string,
	metadata: Record<string, unknown> = {},
): ApplicationError<MappedErrorMetadata> {
	const logger = baseLogger.child({ component: mapError.name });

	if (error instanceof ApplicationError) {
		return new ApplicationError<MappedErrorMetadata>(
			error.message,
			error.code,
			error.operation,
			{ ...metadata, ...error.metadata },
			error.statusCode,
		);
	}

	if (error instanceof APIError) {
		const isRateLimit = detectRateLimit(error.message, error.status);
		const errorCode = isRateLimit ? ErrorCode.RateLimitExceeded : ErrorCode.LLMApiError;

		logger.error(
			{ operation, errorCode, errorType: error.type, isRateLimit },
			"LLM API error",
		);

		return new ApplicationError<MappedErrorMetadata>(error.message, errorCode, operation, {
			...metadata,
			statusCode: error.status,
			type: error.type,
			originalMessage: error.message,
		});
	}

	if (error instanceof z.ZodError) {
		const issues = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);

		logger.error({ operation, issues }, "Schema validation error");

		return new ApplicationError<MappedErrorMetadata>(
			`Validation failed: ${issues.join("; ")}`,
			ErrorCode.MalformedResponse,
			operation,
			{ ...metadata, issues },
		);
	}

	if (isSystemError(error)) {
		const errorCode =
			error.code && UNREADABLE_RESOURCE_CODES.has(error.code) ?
				ErrorCode.ResourceLoadError
			:	ErrorCode.UnknownError;

		logger.error({ error, operation, errorCode }, "File system error");

		return new ApplicationError<MappedErrorMetadata>(error.message, errorCode, operation, {
			...metadata,
			systemCode: error.code,
			path: error.path,
		});
	}

	if (error instanceof Error) {
		if (detectRateLimit(error.message)) {
			logger.warn({ error, operation, metadata }, "Rate limit detected in error message");

			return new ApplicationError<MappedErrorMetadata>(
				error.message,
				ErrorCode.RateLimitExceeded,
				operation,
				metadata,
			);
		}

		logger.error({ error, operation, metadata }, "Unexpected error");

		return new ApplicationError<MappedErrorMetadata>(
			error.message,
			ErrorCode.UnknownError,
			operation,
			metadata,
		);
	}

	logger.error({ error: String(error), operation, metadata }, "Unknown non-error Exception");

	return new ApplicationError<MappedErrorMetadata>(
		String(error),
		ErrorCode.UnknownError,
		operation,
		metadata,
	);
}

/**
 * Checks whether the provided error carries Node's system error fields.
 *
 * @param error The error to check
 *
 * @returns `true` if the error has a string `code` as set by `node:fs`
 */
function isSystemError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error && typeof error.code === "string";
}
