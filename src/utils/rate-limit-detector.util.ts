import { StatusCodes } from "http-status-codes";

/** Common rate limit patterns from OpenAI-compatible providers */
const RATE_LIMIT_PATTERNS = [
	"rate limit",
	"429",
	"free-models-per-",
	"quota",
	"too many requests",
	"requests per",
	"tokens per min",
] as const;

/**
 * Detects if an error message indicates a rate limit has been exceeded.
 *
 * @param errorMessage The error message to analyze
 * @param statusCode Optional HTTP status code to check
 *
 * @returns `true` if the error indicates a rate limit has been exceeded
 *
 * @example
 * ```typescript
 * detectRateLimit("Rate limit exceeded"); // true
 * detectRateLimit("Bad gateway", 429); // true
 * ```
 */
export function detectRateLimit(errorMessage: string, statusCode?: number): boolean {
	if (statusCode === StatusCodes.TOO_MANY_REQUESTS) return true;

	const normalizedMessage = errorMessage.toLowerCase();

	return RATE_LIMIT_PATTERNS.some((pattern) => normalizedMessage.includes(pattern));
}
