import { ApplicationError, ErrorCode } from "@/errors";
import { extractPlaceholders } from "@/services/protector";

/** Differences between the placeholder sets of a source and its translation */
export interface PlaceholderComparison {
	/** Tokens of the source absent from the output */
	missing: string[];

	/** Tokens of the output that the source never had */
	unexpected: string[];
}

/** Checks that a translation carries exactly the placeholder tokens of its source */
export class PlaceholderValidatorManager {
	constructor(private readonly placeholderLength: number) {}

	/**
	 * Lists the distinct tokens of a text.
	 *
	 * @param text Text to scan
	 */
	public extract(text: string): string[] {
		return extractPlaceholders(text, this.placeholderLength);
	}

	public compare(source: string, output: string): PlaceholderComparison {
		const sourceTokens = new Set(this.extract(source));
		const outputTokens = new Set(this.extract(output));

		return {
			missing: [...sourceTokens].filter((token) => !outputTokens.has(token)),
			unexpected: [...outputTokens].filter((token) => !sourceTokens.has(token)),
		};
	}

	/**
	 * Requires equal token sets in source and output.
	 *
	 * @param source Text sent to the translator
	 * @param output Text received back
	 *
	 * @throws {ApplicationError} with {@link ErrorCode.PlaceholderMismatch} if the sets differ
	 */
	public validate(source: string, output: string): void {
		const { missing, unexpected } = this.compare(source, output);
		if (missing.length === 0 && unexpected.length === 0) return;

		throw new ApplicationError(
			`Placeholder mismatch: ${missing.length} missing, ${unexpected.length} unexpected`,
			ErrorCode.PlaceholderMismatch,
			`${PlaceholderValidatorManager.name}.${this.validate.name}`,
			{ missing, unexpected },
		);
	}
}
