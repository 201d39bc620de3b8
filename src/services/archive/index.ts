export * from "./archive.constants";
export * from "./archive.service";
