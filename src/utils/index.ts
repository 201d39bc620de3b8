export * from "./common.util";
export * from "./constants.util";
export * from "./env.util";
export * from "./logger.util";
export * from "./parse-command-args.util";
export * from "./rate-limit-detector.util";
export * from "./script-detector.util";
