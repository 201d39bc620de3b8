import { z } from "zod";

import type { Book } from "./book.types";

import { ChunkStatus } from "./book.types";

const chunkSchema = z.object({
	sequence: z.number().int().positive(),
	original: z.string(),
	translated: z.string().nullable(),
	tokens: z.number().int().nonnegative(),
	status: z.enum(ChunkStatus),
	error: z.string().nullable(),
});

const itemSchema = z.object({
	id: z.string().min(1),
	path: z.string().min(1),
	content: z.string(),
	translated: z.string().nullable(),
	placeholders: z.record(z.string(), z.string()),
	chunks: z.array(chunkSchema),
});

/** Shape of the snapshot file, validated on every load */
export const bookSchema: z.ZodType<Book> = z.object({
	name: z.string().min(1),
	path: z.string().min(1),
	extractPath: z.string().min(1),
	items: z.array(itemSchema),
});
