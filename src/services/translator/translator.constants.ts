import type { Glossary } from "./translator.schemas";
import type { TranslatorLanguages } from "./translator.types";

/** Temperature setting for LLM API calls (lower = more deterministic) */
export const LLM_TEMPERATURE = 0.1;

/** Maximum tokens for connectivity test API call */
export const CONNECTIVITY_TEST_MAX_TOKENS = 5;

/** Prefix the mock translator puts in front of every text */
export const MOCK_TRANSLATION_PREFIX = "[TRANSLATED] ";

/**
 * Resolves a locale code to an English language name for prompts.
 *
 * @example
 * ```typescript
 * getLanguageName("zh"); // "Chinese"
 * getLanguageName("pt-BR"); // "Brazilian Portuguese"
 * ```
 */
export function getLanguageName(locale: string): string {
	try {
		return new Intl.DisplayNames(["en"], { type: "language" }).of(locale) ?? locale;
	} catch {
		return locale;
	}
}

function formatGlossary(glossary: Glossary): string {
	const entries = Object.entries(glossary);
	if (entries.length === 0) return "";

	return `\n# TERMINOLOGY GLOSSARY\nApply these exact translations for the specified terms:\n${entries
		.map(([term, translation]) => `- ${term}: ${translation}`)
		.join("\n")}\n`;
}

/**
 * Builds the system prompt of a translation request.
 *
 * @param languages Language pair of the run
 * @param glossary Terms with a fixed translation
 */
export function buildTranslationPrompt(languages: TranslatorLanguages, glossary: Glossary): string {
	const source = getLanguageName(languages.source);
	const target = getLanguageName(languages.target);

	return `# ROLE
You are a professional translator of technical books, translating ${source} into natural, fluent ${target}.

# TASK
Translate the "text" field of the user message. It is a fragment of an XHTML document.

# CRITICAL PRESERVATION RULES
1. **Placeholders**: Every token listed in "placeholders" (format ##XXXXXX##) must appear in the translation exactly once per occurrence in the source, unchanged in spelling and casing, at the matching position
2. **Markup**: Keep every tag and attribute exactly as written; translate only text content
3. **Completeness**: Translate every sentence WITHOUT adding, removing, or summarizing anything
4. **Proper nouns**: Keep names of programming languages, frameworks and tools in their original form unless the glossary says otherwise
${formatGlossary(glossary)}
# OUTPUT REQUIREMENTS
- Respond with ONLY a JSON object: {"translation": "<translated fragment>"}
- No explanations, no code fences`;
}

/**
 * Builds the system prompt of a proofreading request.
 *
 * @param languages Language pair of the run
 */
export function buildProofreadingPrompt(languages: TranslatorLanguages): string {
	const target = getLanguageName(languages.target);

	return `# ROLE
You are an expert ${target} proofreader of technical content.

# TASK
Review the "text" field of the user message for grammar errors, typos and awkward phrasing.

# RULES
1. Propose corrections as a JSON object mapping each faulty ${target} phrase, exactly as it appears, to its corrected form
2. Never change tokens listed in "placeholders" or any markup
3. Keys and values contain ${target} text only

# OUTPUT REQUIREMENTS
- Respond with ONLY a JSON object: {"corrections": {"<phrase>": "<corrected phrase>"}}
- Respond with {"corrections": {}} when nothing needs to change`;
}
