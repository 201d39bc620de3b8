import pino from "pino";

import { LogLevel, RuntimeEnvironment } from "./constants.util";
import { env } from "./env.util";

/**
 * Determines the log level based on environment
 *
 * - Production: info and above
 * - Development: debug and above
 * - Can be overridden with `LOG_LEVEL` env var
 */
const logLevel =
	env.LOG_LEVEL ??
	(env.NODE_ENV === RuntimeEnvironment.Production ? LogLevel.Info : LogLevel.Debug);

/**
 * Builds the transport targets.
 *
 * Tests log nowhere: transports run in worker threads that would outlive the test run.
 */
function createTransport(): pino.TransportMultiOptions | undefined {
	if (env.NODE_ENV === RuntimeEnvironment.Test) return undefined;

	return {
		targets: [
			/**
			 * File transport - structured JSON logs
			 * Creates log files in logs/ directory with ISO timestamp
			 */
			{
				target: "pino/file",
				level: "debug",
				options: {
					destination: `${process.cwd()}/logs/${new Date().toISOString().replace(/:/g, "-")}.pino.log`,
					mkdir: true,
				},
			},

			/**
			 * Console transport - pretty-printed for development
			 * Only active when LOG_TO_CONSOLE is enabled and not in production
			 */
			...(env.LOG_TO_CONSOLE && env.NODE_ENV !== RuntimeEnvironment.Production ?
				[
					{
						target: "pino-pretty",
						level: logLevel,
						options: {
							colorize: true,
							translateTime: "HH:MM:ss.l",
							ignore: "pid,hostname",
							singleLine: false,
						},
					},
				]
			:	[]),
		],
	};
}

/**
 * Main logger instance
 *
 * @example
 * ```typescript
 * import { logger } from '@/utils/logger.util';
 *
 * logger.info({ item: 'OEBPS/ch01.xhtml', chunks: 4 }, 'Item segmented');
 *
 * const itemLogger = logger.child({ component: 'Segmenter' });
 * itemLogger.debug('Starting segmentation');
 * ```
 */
export const logger = pino({
	level: env.NODE_ENV === RuntimeEnvironment.Test ? "silent" : logLevel,
	base: {
		pid: process.pid,
		hostname: undefined,
	},

	/** Timestamp format - ISO 8601 */
	timestamp: pino.stdTimeFunctions.isoTime,

	serializers: {
		err: pino.stdSerializers.err,
		error: pino.stdSerializers.err,
	},

	transport: createTransport(),
});
