import { processSignals } from "./constants.util";

/**
 * Formats a time duration in milliseconds to a human-readable string.
 *
 * Uses the {@link Intl.NumberFormat} API with `style: "unit"` for proper
 * locale-independent duration formatting.
 *
 * @param elapsedTime The elapsed time in milliseconds
 * @param locale The locale to use for formatting (default: "en")
 *
 * @returns A formatted duration string (e.g., "5 seconds", "2 minutes", "1 hour")
 *
 * @example
 * ```typescript
 * formatElapsedTime(5000); // "5 seconds"
 * formatElapsedTime(120000); // "2 minutes"
 * ```
 */
export function formatElapsedTime(
	elapsedTime: number,
	locale: Intl.LocalesArgument = "en",
): string {
	const seconds = Math.floor(elapsedTime / 1000);

	const formatUnit = (value: number, unit: "second" | "minute" | "hour") =>
		new Intl.NumberFormat(locale, { style: "unit", unit, unitDisplay: "long" }).format(value);

	if (seconds < 60) {
		return formatUnit(seconds, "second");
	} else if (seconds < 3600) {
		return formatUnit(Math.floor(seconds / 60), "minute");
	} else {
		return formatUnit(Math.floor(seconds / 3600), "hour");
	}
}

/** Registry for cleanup functions to be executed on process termination */
const cleanupRegistry = new Set<() => void | Promise<void>>();

/** Tracks whether signal handlers have been registered */
let signalHandlersRegistered = false;

/**
 * Registers a cleanup function to be executed on process termination.
 *
 * @param cleanUpFn The cleanup function to register
 *
 * @returns A function that removes the registration again
 */
export function registerCleanup(cleanUpFn: () => void | Promise<void>): () => void {
	cleanupRegistry.add(cleanUpFn);

	return () => void cleanupRegistry.delete(cleanUpFn);
}

/**
 * Sets up process signal handlers with proper error management.
 *
 * Registers handlers once at application startup. All registered cleanup functions
 * run when a termination signal is received, after which the process exits.
 *
 * @param errorReporter Optional error reporter for cleanup failures
 */
export function setupSignalHandlers(
	errorReporter?: (message: string, error: unknown) => void,
): void {
	if (signalHandlersRegistered) return;

	signalHandlersRegistered = true;

	const executeCleanups = async (signal: NodeJS.Signals) => {
		for (const cleanUpFn of cleanupRegistry) {
			try {
				await cleanUpFn();
			} catch (error) {
				errorReporter?.(`Cleanup failed for signal ${signal}:`, error);
			}
		}

		process.exit(130);
	};

	for (const signal of Object.values(processSignals)) {
		process.once(signal, (received: NodeJS.Signals) => {
			void executeCleanups(received);
		});
	}
}
