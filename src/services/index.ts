export * from "./archive";
export * from "./book";
export * from "./glossary";
export * from "./orchestrator";
export * from "./protector";
export * from "./reassembler";
export * from "./segmenter";
export * from "./tokenizer";
export * from "./translator";
