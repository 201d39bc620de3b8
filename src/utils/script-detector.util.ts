/** CJK Unified Ideographs block */
const CJK_SCRIPT_REGEX = /[\u4e00-\u9fff]/;

/**
 * Tells whether a text contains at least one CJK ideograph.
 *
 * Used to recognize chunks translated into Chinese by an earlier run. The check
 * only works for CJK targets; prefer the chunk status wherever it is reliable.
 *
 * @param text Text to inspect
 *
 * @example
 * ```typescript
 * containsCjkScript("<p>你好</p>"); // true
 * containsCjkScript("<p>Hello</p>"); // false
 * ```
 */
export function containsCjkScript(text: string): boolean {
	return CJK_SCRIPT_REGEX.test(text);
}
