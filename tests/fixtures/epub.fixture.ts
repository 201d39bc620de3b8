import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import JSZip from "jszip";

/** Package document naming `OEBPS/ch01.xhtml` */
export const OPF_FIXTURE = `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="id">
<metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
<dc:title>Fixture Book</dc:title>
<dc:language>en</dc:language>
</metadata>
<manifest><item id="ch01" href="ch01.xhtml" media-type="application/xhtml+xml"/></manifest>
<spine><itemref idref="ch01"/></spine>
</package>
`;

export const CONTAINER_FIXTURE = `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
<rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles>
</container>
`;

export const CHAPTER_FIXTURE = `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml" lang="en" xml:lang="en">
<head><title>Chapter 1</title><link rel="stylesheet" href="style.css"/></head>
<body>
<h1>Hello</h1>
<p>Run <code>npm test</code> before you commit &amp; push.</p>
<pre>const answer = 42;</pre>
</body>
</html>
`;

export const NCX_FIXTURE = `<?xml version="1.0" encoding="utf-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
<navMap><navPoint id="p1"><navLabel><text>Chapter 1</text></navLabel><content src="ch01.xhtml"/></navPoint></navMap>
</ncx>
`;

/** Entries of a minimal EPUB, `mimetype` first */
export const EPUB_FIXTURE_FILES: Readonly<Record<string, string>> = {
	mimetype: "application/epub+zip",
	"META-INF/container.xml": CONTAINER_FIXTURE,
	"OEBPS/content.opf": OPF_FIXTURE,
	"OEBPS/ch01.xhtml": CHAPTER_FIXTURE,
	"OEBPS/toc.ncx": NCX_FIXTURE,
	"OEBPS/style.css": "p { margin: 0; }\n",
};

/**
 * Writes a zip archive with the given entries.
 *
 * @param path Archive to write
 * @param files Entry name to content
 */
export async function writeEpubFixture(
	path: string,
	files: Readonly<Record<string, string>> = EPUB_FIXTURE_FILES,
): Promise<string> {
	const zip = new JSZip();

	for (const [name, content] of Object.entries(files)) {
		zip.file(name, content);
	}

	await writeFile(path, await zip.generateAsync({ type: "nodebuffer" }));

	return path;
}

/** Creates an empty temporary directory; pair with {@link removeTempDirectory} */
export function createTempDirectory(): Promise<string> {
	return mkdtemp(join(tmpdir(), "epub-segment-translate-"));
}

export function removeTempDirectory(path: string): Promise<void> {
	return rm(path, { recursive: true, force: true });
}
