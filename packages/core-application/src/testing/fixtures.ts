import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import JSZip from "jszip";

import type { FileRecord } from "@file-inventory/core-domain";
import { createPinoLogger } from "../adapters/pino-logger";

export const silentLogger = createPinoLogger({ level: "silent" });

export function makeRecord(fullPath: string, overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    folderPath: path.dirname(fullPath),
    fileName: path.basename(fullPath),
    extension: path.extname(fullPath).toLowerCase(),
    sizeBytes: 10,
    lastModified: "2024-01-02T03:04:05.000Z",
    fullPath,
    contentHint: "N/A",
    topics: [],
    status: "Added",
    manualNotes: "",
    ...overrides,
  };
}

export function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `file-inventory-${prefix}-`));
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export async function writeDocx(filePath: string, paragraphs: string[]): Promise<void> {
  const body = paragraphs
    .map((p) =>
      p ? `<w:p><w:r><w:t xml:space="preserve">${escapeXml(p)}</w:t></w:r></w:p>` : `<w:p><w:pPr/></w:p>`
    )
    .join("");
  await writeDocxBody(filePath, body);
}

/** Writes a document whose `<w:body>` holds the given markup. */
export async function writeDocxBody(filePath: string, bodyXml: string): Promise<void> {
  const zip = new JSZip();
  zip.file(
    "word/document.xml",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
      `<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">` +
      `<w:body>${bodyXml}</w:body></w:document>`
  );
  await fs.writeFile(filePath, await zip.generateAsync({ type: "nodebuffer" }));
}

/** Each slide is its title, or null for a slide without a title placeholder. */
export async function writePptx(filePath: string, slides: Array<string | null>): Promise<void> {
  const zip = new JSZip();
  zip.file("ppt/presentation.xml", `<?xml version="1.0" encoding="UTF-8"?><p:presentation/>`);

  slides.forEach((title, index) => {
    const titleShape =
      title === null
        ? ""
        : `<p:sp><p:nvSpPr><p:cNvPr id="2" name="Title 1"/><p:cNvSpPr/><p:nvPr><p:ph type="title"/></p:nvPr></p:nvSpPr>` +
          `<p:txBody><a:p><a:r><a:t>${escapeXml(title)}</a:t></a:r></a:p></p:txBody></p:sp>`;
    const bodyShape =
      `<p:sp><p:nvSpPr><p:cNvPr id="3" name="Content 2"/><p:cNvSpPr/><p:nvPr><p:ph idx="1"/></p:nvPr></p:nvSpPr>` +
      `<p:txBody><a:p><a:r><a:t>Body text</a:t></a:r></a:p></p:txBody></p:sp>`;

    zip.file(
      `ppt/slides/slide${index + 1}.xml`,
      `<?xml version="1.0" encoding="UTF-8"?><p:sld><p:cSld><p:spTree>${titleShape}${bodyShape}</p:spTree></p:cSld></p:sld>`
    );
  });

  await fs.writeFile(filePath, await zip.generateAsync({ type: "nodebuffer" }));
}
