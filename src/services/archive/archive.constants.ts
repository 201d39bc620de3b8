/** Extensions of documents handed to the translation pipeline */
export const TRANSLATABLE_EXTENSIONS: ReadonlySet<string> = new Set([
	"xhtml",
	"html",
	"htm",
	"xml",
	"ncx",
]);

/** Extensions parsed leniently as HTML rather than XML */
export const HTML_EXTENSIONS: ReadonlySet<string> = new Set(["html", "htm"]);

/** Directory holding container metadata, never translated */
export const META_INF_DIRECTORY = "META-INF";

export const CONTAINER_FILE_NAME = "container.xml";

export const CONTAINER_PATH = `${META_INF_DIRECTORY}/${CONTAINER_FILE_NAME}`;

export const MIMETYPE_FILE_NAME = "mimetype";

/** Written as the `mimetype` entry when the extracted tree has none */
export const DEFAULT_MIMETYPE = "application/epub+zip";

/** Directory under the archive's directory that books are extracted into */
export const EXTRACTION_DIRECTORY = "temp";

export const OUTPUT_EXTENSION = ".epub";

/** Matches the package language element, tolerating whitespace after the prefix */
export const DC_LANGUAGE_REGEX = /<dc:\s*language>[^<]*<\/dc:\s*language>/;

export const METADATA_CLOSE_TAG = "</metadata>";
