/**
 * EPUB 3 assembly: builds an in-memory book model from fetched episodes
 * and writes it as a zip container.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as cheerio from "cheerio";
import JSZip from "jszip";
import type { Episode } from "./types.js";
import { escapeXml, isoDateTime } from "./utils.js";

export const DEFAULT_LANGUAGE = "ja";

const STYLESHEET_HREF = "style/style.css";

export interface EpubItem {
  id: string;
  /** Path relative to the package document */
  href: string;
  mediaType: string;
  content: string;
  properties?: string;
}

export interface TocEntry {
  label: string;
  href: string;
}

export interface EpubBook {
  identifier: string;
  title: string;
  language: string;
  /** Omitted from the metadata when empty */
  author: string;
  /** dcterms:modified value */
  modified: string;
  /** Manifest items, in manifest order */
  items: EpubItem[];
  /** Item ids in reading order; the navigation document comes first */
  spine: string[];
  toc: TocEntry[];
}

export interface BuildBookOptions {
  identifier: string;
  title: string;
  author: string;
  episodes: readonly Episode[];
  vertical: boolean;
  language?: string;
  modified?: Date;
}

/**
 * Generate the book stylesheet.
 *
 * @param vertical - Add vertical writing (top-to-bottom, right-to-left) rules
 */
export function buildCss(vertical: boolean): string {
  const rules = [
    "body { line-height: 1.8; }",
    "h1 { font-size: 1.2em; margin: 0 0 1em 0; }",
    "hr { border: none; border-top: 1px solid #ccc; margin: 1em 0; }",
    "ruby { ruby-position: over; }",
  ];
  if (vertical) {
    rules.push("body { writing-mode: vertical-rl; }", "body { text-orientation: mixed; }");
  }
  return `${rules.join("\n")}\n`;
}

/** Manifest id of a chapter; its file is `{id}.xhtml` */
export function chapterId(index: number): string {
  return `chap_${String(index).padStart(5, "0")}`;
}

export function chapterLabel(episode: Episode): string {
  return `${episode.index}. ${episode.title}`;
}

/** Characters outside the XML 1.0 `Char` production */
const INVALID_XML_CHARS = /[^\t\n\r\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/gu;

/** `"`, `&`, `'`, `<` and `>` must stay escaped */
const XML_SPECIAL_CODE_POINTS = new Set([0x22, 0x26, 0x27, 0x3c, 0x3e]);

function isXmlChar(codePoint: number): boolean {
  return (
    codePoint === 0x9 ||
    codePoint === 0xa ||
    codePoint === 0xd ||
    (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
    (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
    (codePoint >= 0x10000 && codePoint <= 0x10ffff)
  );
}

/**
 * Re-serialize an HTML fragment as XML so that it is valid inside an
 * XHTML content document (void elements become self-closing).
 * Text stays UTF-8 and characters XML cannot carry are dropped.
 */
export function toXhtml(fragment: string): string {
  const xml = cheerio.load(fragment, null, false).xml().replace(INVALID_XML_CHARS, "");
  // The XML serializer writes every non-ASCII character as a hex reference
  return xml.replace(/&#x([0-9a-f]+);/gi, (reference, hex: string) => {
    const codePoint = parseInt(hex, 16);
    if (XML_SPECIAL_CODE_POINTS.has(codePoint)) return reference;
    return isXmlChar(codePoint) ? String.fromCodePoint(codePoint) : "";
  });
}

export function buildChapterXhtml(episode: Episode, language: string): string {
  const label = escapeXml(chapterLabel(episode));
  const lang = escapeXml(language);
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" lang="${lang}" xml:lang="${lang}">
<head>
  <meta charset="utf-8"/>
  <title>${label}</title>
  <link rel="stylesheet" type="text/css" href="${STYLESHEET_HREF}"/>
</head>
<body>
  <h1>${label}</h1>
${toXhtml(episode.htmlBody)}
</body>
</html>
`;
}

function buildNavXhtml(title: string, toc: TocEntry[], language: string): string {
  const lang = escapeXml(language);
  const items = toc
    .map((entry) => `      <li><a href="${escapeXml(entry.href)}">${escapeXml(entry.label)}</a></li>`)
    .join("\n");

  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="${lang}" xml:lang="${lang}">
<head>
  <meta charset="utf-8"/>
  <title>${escapeXml(title)}</title>
</head>
<body>
  <nav epub:type="toc" id="toc">
    <h2>${escapeXml(title)}</h2>
    <ol>
${items}
    </ol>
  </nav>
</body>
</html>
`;
}

function buildNcx(identifier: string, title: string, toc: TocEntry[]): string {
  const navPoints = toc
    .map((entry, i) => {
      const playOrder = i + 1;
      return `    <navPoint id="navPoint-${playOrder}" playOrder="${playOrder}">
      <navLabel><text>${escapeXml(entry.label)}</text></navLabel>
      <content src="${escapeXml(entry.href)}"/>
    </navPoint>`;
    })
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="${escapeXml(identifier)}"/>
    <meta name="dtb:depth" content="1"/>
    <meta name="dtb:totalPageCount" content="0"/>
    <meta name="dtb:maxPageNumber" content="0"/>
  </head>
  <docTitle><text>${escapeXml(title)}</text></docTitle>
  <navMap>
${navPoints}
  </navMap>
</ncx>
`;
}

/** Package document (content.opf) for a book model */
export function buildOpf(book: EpubBook): string {
  const creator = book.author ? `\n    <dc:creator id="creator">${escapeXml(book.author)}</dc:creator>` : "";
  const manifest = book.items
    .map((item) => {
      const properties = item.properties ? ` properties="${item.properties}"` : "";
      return `    <item id="${item.id}" href="${escapeXml(item.href)}" media-type="${item.mediaType}"${properties}/>`;
    })
    .join("\n");
  const spine = book.spine.map((id) => `    <itemref idref="${id}"/>`).join("\n");

  return `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" unique-identifier="id" version="3.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="id">${escapeXml(book.identifier)}</dc:identifier>
    <dc:title>${escapeXml(book.title)}</dc:title>
    <dc:language>${escapeXml(book.language)}</dc:language>${creator}
    <meta property="dcterms:modified">${book.modified}</meta>
  </metadata>
  <manifest>
${manifest}
  </manifest>
  <spine toc="ncx">
${spine}
  </spine>
</package>
`;
}

/**
 * Compose the book model: stylesheet, one chapter per episode in input
 * order, navigation document and NCX. The reading order starts with the
 * navigation document followed by the chapters; the table of contents
 * lists the chapters in the same order.
 */
export function buildBook(options: BuildBookOptions): EpubBook {
  const language = options.language ?? DEFAULT_LANGUAGE;

  const used = new Set<string>();
  const chapters: EpubItem[] = options.episodes.map((episode) => {
    // Episodes sharing an index (URLs without a number) get a suffixed name
    const base = chapterId(episode.index);
    let id = base;
    for (let n = 2; used.has(id); n++) {
      id = `${base}_${n}`;
    }
    used.add(id);
    return {
      id,
      href: `${id}.xhtml`,
      mediaType: "application/xhtml+xml",
      content: buildChapterXhtml(episode, language),
    };
  });
  const toc: TocEntry[] = options.episodes.map((episode, i) => ({
    label: chapterLabel(episode),
    href: chapters[i].href,
  }));

  const items: EpubItem[] = [
    { id: "style_base", href: STYLESHEET_HREF, mediaType: "text/css", content: buildCss(options.vertical) },
    ...chapters,
    {
      id: "ncx",
      href: "toc.ncx",
      mediaType: "application/x-dtbncx+xml",
      content: buildNcx(options.identifier, options.title, toc),
    },
    {
      id: "nav",
      href: "nav.xhtml",
      mediaType: "application/xhtml+xml",
      content: buildNavXhtml(options.title, toc, language),
      properties: "nav",
    },
  ];

  return {
    identifier: options.identifier,
    title: options.title,
    language,
    author: options.author,
    modified: isoDateTime(options.modified ?? new Date()),
    items,
    spine: ["nav", ...chapters.map((chapter) => chapter.id)],
    toc,
  };
}

const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

/** Serialize a book model into EPUB container bytes */
export async function packEpub(book: EpubBook): Promise<Buffer> {
  const zip = new JSZip();
  // mimetype must be the first entry and stored uncompressed
  zip.file("mimetype", "application/epub+zip", { compression: "STORE" });
  zip.file("META-INF/container.xml", CONTAINER_XML);
  zip.file("OEBPS/content.opf", buildOpf(book));
  for (const item of book.items) {
    zip.file(`OEBPS/${item.href}`, item.content);
  }
  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE", mimeType: "application/epub+zip" });
}

/** Temporary path an EPUB is written to before it is moved into place */
export function partialPath(outPath: string): string {
  return `${outPath}.part`;
}

/**
 * Write a book to disk, creating parent directories as needed.
 * The file appears at `outPath` only once it is complete.
 */
export async function writeEpub(book: EpubBook, outPath: string): Promise<void> {
  const data = await packEpub(book);
  await fs.mkdir(path.dirname(outPath), { recursive: true });

  const partial = partialPath(outPath);
  try {
    await fs.writeFile(partial, data);
    await fs.rename(partial, outPath);
  } catch (error) {
    await fs.rm(partial, { force: true });
    throw error;
  }
}
