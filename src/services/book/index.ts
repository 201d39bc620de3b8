export * from "./book.schema";
export * from "./book.service";
export * from "./book.types";
export * from "./snapshot.service";
