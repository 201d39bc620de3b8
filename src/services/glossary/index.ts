export * from "./glossary.service";
