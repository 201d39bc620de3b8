import { z } from "zod";

/** JSON object the model answers a translation request with */
export const translationResponseSchema = z.object({
	translation: z.string(),
});

/** JSON object the model answers a proofreading request with */
export const proofreadingResponseSchema = z.object({
	corrections: z.record(z.string(), z.string()).default({}),
});

/** Contents of a glossary file: source term to target term */
export const glossarySchema = z.record(z.string().min(1), z.string());

export type TranslationResponse = z.infer<typeof translationResponseSchema>;

export type ProofreadingResponse = z.infer<typeof proofreadingResponseSchema>;

export type Glossary = z.infer<typeof glossarySchema>;
