/**
 * Elements replaced wholesale, descendants included, by a placeholder token.
 *
 * Names are compared lower-cased, so `pageList` from NCX documents matches `pagelist`.
 */
export const IGNORED_TAGS: ReadonlySet<string> = new Set([
	"script",
	"style",
	"code",
	"pre",
	"svg",
	"math",
	"img",
	"source",
	"figure",
	"meta",
	"link",
	"pagelist",
	"content",
]);

/** `(tag, class)` pairs replaced wholesale even though the tag itself is translatable */
export const IGNORED_TAG_CLASSES: ReadonlyArray<{ readonly tag: string; readonly className: string }> =
	[{ tag: "table", className: "processedcode" }];

/** Characters a placeholder token is drawn from (62 symbols) */
export const PLACEHOLDER_ALPHABET =
	"abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

/** Delimiter wrapping both ends of a placeholder token */
export const PLACEHOLDER_DELIMITER = "##";

/** Samples of leftover tokens included in the restore warning */
export const LEFTOVER_SAMPLE_SIZE = 5;

/**
 * Builds the pattern matching token-shaped substrings of the given length.
 *
 * @param length Number of random characters between the delimiters
 *
 * @example
 * ```typescript
 * "a ##Ab12Cd## b".match(createPlaceholderRegex(6)); // ["##Ab12Cd##"]
 * ```
 */
export function createPlaceholderRegex(length: number): RegExp {
	return new RegExp(`${PLACEHOLDER_DELIMITER}[A-Za-z0-9]{${length}}${PLACEHOLDER_DELIMITER}`, "g");
}
