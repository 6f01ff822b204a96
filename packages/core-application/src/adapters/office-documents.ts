import fs from "node:fs/promises";
import JSZip from "jszip";

const XML_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

function decodeXmlText(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g, (match, entity: string) => {
    if (entity.startsWith("#x")) return String.fromCodePoint(parseInt(entity.slice(2), 16));
    if (entity.startsWith("#")) return String.fromCodePoint(parseInt(entity.slice(1), 10));
    return XML_ENTITIES[entity] ?? match;
  });
}

/** Concatenate every `<prefix:t>` run inside an XML fragment. */
function collectTextRuns(xml: string, prefix: "w" | "a"): string {
  const runPattern = new RegExp(`<${prefix}:t(?:\\s[^>]*)?>([^<]*)</${prefix}:t>`, "g");
  let text = "";
  for (const match of xml.matchAll(runPattern)) {
    text += decodeXmlText(match[1] ?? "");
  }
  return text;
}

async function openZip(filePath: string): Promise<JSZip> {
  const data = await fs.readFile(filePath);
  return JSZip.loadAsync(data);
}

async function readEntry(zip: JSZip, name: string): Promise<string> {
  const entry = zip.file(name);
  if (!entry) throw new Error(`missing ${name}`);
  return entry.async("string");
}

/** Remove every `<tag>...</tag>` element, nested ones included. */
function stripElements(xml: string, tag: string): string {
  const innermost = new RegExp(`<${tag}\\b(?:(?!<${tag}\\b)[\\s\\S])*?</${tag}>`, "g");
  let current = xml;
  let previous: string;
  do {
    previous = current;
    current = current.replace(innermost, "");
  } while (current !== previous);
  return current;
}

/**
 * Texts of the paragraphs directly under the document body, in document
 * order. Table cells and text boxes are not part of the body flow. Empty
 * paragraphs are kept as empty strings.
 */
export async function readDocxParagraphs(filePath: string): Promise<string[]> {
  const zip = await openZip(filePath);
  const xml = await readEntry(zip, "word/document.xml");

  let body = /<w:body\b[^>]*>([\s\S]*)<\/w:body>/.exec(xml)?.[1] ?? "";
  body = stripElements(body, "w:tbl");
  body = stripElements(body, "w:txbxContent");

  const paragraphs: string[] = [];
  // <w:p> or <w:p ...>, but not <w:pPr>/<w:proofErr>
  const paragraphPattern = /<w:p(?:\s[^>]*?)?(?:\/>|>([\s\S]*?)<\/w:p>)/g;
  for (const match of body.matchAll(paragraphPattern)) {
    paragraphs.push(collectTextRuns(match[1] ?? "", "w"));
  }
  return paragraphs;
}

export type SlideSummary = {
  // undefined when the slide has no title placeholder
  title?: string;
};

function slideNumber(name: string): number {
  const match = /slide(\d+)\.xml$/.exec(name);
  return match ? Number(match[1]) : Number.MAX_SAFE_INTEGER;
}

/** Slides of a presentation ordered by slide number. */
export async function readPptxSlides(filePath: string): Promise<SlideSummary[]> {
  const zip = await openZip(filePath);
  if (!zip.file("ppt/presentation.xml")) throw new Error("missing ppt/presentation.xml");

  const slideEntries = zip
    .file(/^ppt\/slides\/slide\d+\.xml$/)
    .sort((a, b) => slideNumber(a.name) - slideNumber(b.name));

  const slides: SlideSummary[] = [];
  for (const entry of slideEntries) {
    const xml = await entry.async("string");
    slides.push({ title: findSlideTitle(xml) });
  }
  return slides;
}

function findSlideTitle(slideXml: string): string | undefined {
  const shapePattern = /<p:sp>([\s\S]*?)<\/p:sp>/g;
  for (const match of slideXml.matchAll(shapePattern)) {
    const shape = match[1] ?? "";
    if (/<p:ph\b[^>]*\btype="(?:title|ctrTitle)"/.test(shape)) {
      return collectTextRuns(shape, "a");
    }
  }
  return undefined;
}
