export * from "./reassembler.constants";
export * from "./reassembler.service";
