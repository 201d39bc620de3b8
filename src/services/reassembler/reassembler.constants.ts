/**
 * Matches `lang` and `xml:lang` attributes holding an English locale
 * (`en`, `en-US`, `en_GB`, ...), quoted either way.
 *
 * Groups: attribute name, separator, quote.
 */
export const ENGLISH_LOCALE_ATTRIBUTE_REGEX =
	/(?<![\w:-])((?:xml:)?lang)(\s*=\s*)(["'])en(?:[-_][A-Za-z0-9]+)*\3/g;
