import { z } from "zod";

import { ApplicationError, ErrorCode } from "@/errors/error";

/**
 * Parses and validates `--name=value` command line arguments.
 *
 * Argument names are converted to camelCase properties (`--output-suffix` becomes
 * `outputSuffix`) before being handed to the schema.
 *
 * @param expectedArgs The argument names to look for, including the leading `--`
 * @param argsSchema Schema the collected values are validated against
 * @param commandLineArgs Raw arguments (defaults to `process.argv.slice(2)`)
 *
 * @throws {ApplicationError} with {@link ErrorCode.InvalidConfiguration} if the arguments are invalid
 *
 * @example
 * ```typescript
 * const options = parseCommandLineArgs(["--source", "--target"], schema);
 * ```
 */
export function parseCommandLineArgs<TSchema extends z.ZodType>(
	expectedArgs: readonly string[],
	argsSchema: TSchema,
	commandLineArgs: readonly string[] = process.argv.slice(2),
): z.infer<TSchema> {
	const malformedArgs = commandLineArgs.filter(
		(arg) => arg.startsWith("--") && !arg.includes("="),
	);

	if (malformedArgs.length > 0) {
		throw new ApplicationError(
			`Invalid argument format: ${malformedArgs.join(", ")}. Use --name=value`,
			ErrorCode.InvalidConfiguration,
			parseCommandLineArgs.name,
			{ args: [...commandLineArgs] },
		);
	}

	const options = Object.fromEntries(
		expectedArgs.map((argName) => [toPropertyName(argName), getArgValue(argName)]),
	);

	try {
		return argsSchema.parse(options);
	} catch (error) {
		if (error instanceof z.ZodError) {
			const messages = error.issues.map(({ path, message }) => `${path.join(".")}: ${message}`);

			throw new ApplicationError(
				`Invalid arguments: ${messages.join(", ")}`,
				ErrorCode.InvalidConfiguration,
				parseCommandLineArgs.name,
				{ args: [...commandLineArgs] },
			);
		}

		throw error;
	}

	/**
	 * Retrieves the value of a single command line argument.
	 *
	 * @param argName The expected argument, e.g. `--target`
	 */
	function getArgValue(argName: string): string | undefined {
		const matchingArg = commandLineArgs.find((arg) => arg.startsWith(`${argName}=`));

		return matchingArg?.slice(argName.length + 1);
	}
}

/**
 * Converts an argument name to a camelCase property.
 *
 * - `--target` -> `target`
 * - `--output-suffix` -> `outputSuffix`
 */
function toPropertyName(argName: string): string {
	return argName.replace(/^--/, "").replace(/-([a-z])/g, (_, char: string) => char.toUpperCase());
}
