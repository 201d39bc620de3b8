export * from "./markup-tree";
export * from "./protector.constants";
export * from "./protector.service";
