export * from "./orchestrator.service";
export * from "./orchestrator.types";
