export * from "./openai.client";
export * from "./queue.client";
