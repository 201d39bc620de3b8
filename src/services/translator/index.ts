export * from "./base.service";
export * from "./llm-translator.service";
export * from "./managers";
export * from "./mock-translator.service";
export * from "./noop-translator.service";
export * from "./translator.constants";
export * from "./translator.factory";
export * from "./translator.schemas";
export * from "./translator.types";
