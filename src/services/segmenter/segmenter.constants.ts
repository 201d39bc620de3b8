/**
 * Closing tags a chunk may end on.
 *
 * Inline closers (`</b>`, `</i>`, `</em>`, `</a>`, `</strong>`, `</span>`, `</small>`,
 * `</big>`) are excluded so a sentence is not cut in the middle of its formatting.
 */
export const SPLIT_TAG_REGEX = /<\/(?!(?:b|i|em|a|strong|span|small|big)\s*>)[^>]+>/gi;
