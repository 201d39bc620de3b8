export * from "./tokenizer.constants";
export * from "./tokenizer.service";
