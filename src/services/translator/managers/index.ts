export * from "./placeholder-validator.manager";
