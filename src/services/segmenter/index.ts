export * from "./segmenter.constants";
export * from "./segmenter.service";
