import fs from "node:fs/promises";
import path from "node:path";

import type { TopicRule } from "@file-inventory/core-domain";
import { describeError } from "../application/errors";
import { classifyTopics } from "../services/topic-classifier";
import { readDocxParagraphs, readPptxSlides, type SlideSummary } from "./office-documents";

export const TEXT_EXTENSIONS = [".txt", ".py", ".r", ".md"];
export const SPREADSHEET_EXTENSIONS = [".xlsx", ".csv", ".prism"];

const DOCX_EXCERPT_MAX = 150;
const PPTX_TITLE_MAX = 150;
const TEXT_EXCERPT_MAX = 200;

export const NOT_APPLICABLE_HINT = "N/A";

export type ContentDescription = {
  contentHint: string;
  topics: string[];
};

// enough for two lines of any reasonable text file
const HEAD_BYTES = 64 * 1024;

async function readFirstLines(filePath: string, count: number): Promise<string[]> {
  const handle = await fs.open(filePath, "r");
  try {
    const { buffer, bytesRead } = await handle.read(Buffer.alloc(HEAD_BYTES), 0, HEAD_BYTES, 0);
    return buffer
      .toString("utf-8", 0, bytesRead)
      // bytes that are not valid UTF-8 are dropped
      .replace(/\uFFFD/g, "")
      .split(/\r\n|\r|\n/)
      .slice(0, count)
      .map((line) => line.trim());
  } finally {
    await handle.close();
  }
}

async function describeDocx(filePath: string, rules: readonly TopicRule[]): Promise<ContentDescription> {
  let paragraphs: string[];
  try {
    paragraphs = await readDocxParagraphs(filePath);
  } catch {
    return { contentHint: "DOCX: Corrupt or unreadable.", topics: [] };
  }

  const topics = classifyTopics(paragraphs.join("\n"), rules);
  const first = paragraphs.find((p) => p.trim().length > 0);
  if (first === undefined) {
    return { contentHint: "DOCX: No paragraphs found.", topics };
  }
  return { contentHint: `First para: ${first.trim().slice(0, DOCX_EXCERPT_MAX)}...`, topics };
}

async function pptxHint(filePath: string): Promise<string> {
  let slides: SlideSummary[];
  try {
    slides = await readPptxSlides(filePath);
  } catch {
    return "PPTX: Corrupt or unreadable.";
  }

  const first = slides[0];
  if (!first) return "PPTX: No slides.";
  if (first.title === undefined || !first.title.trim()) return "PPTX: First slide no title.";
  return `First slide title: ${first.title.trim().slice(0, PPTX_TITLE_MAX)}`;
}

async function textHint(filePath: string, extension: string): Promise<string> {
  const label = extension.toUpperCase();
  try {
    const text = (await readFirstLines(filePath, 2)).join(" ").trim();
    return text ? `First 2 lines: ${text.slice(0, TEXT_EXCERPT_MAX)}...` : `${label}: Empty`;
  } catch {
    return `${label}: Read error`;
  }
}

/**
 * Short excerpt and topic tags for one file. Topics are only derived for
 * `.docx` documents. Never rejects: failures become the hint text.
 */
export async function describeContent(
  filePath: string,
  extension: string,
  rules: readonly TopicRule[]
): Promise<ContentDescription> {
  const ext = extension.toLowerCase();
  try {
    if (ext === ".docx") return await describeDocx(filePath, rules);
    if (ext === ".pptx") return { contentHint: await pptxHint(filePath), topics: [] };
    if (TEXT_EXTENSIONS.includes(ext)) return { contentHint: await textHint(filePath, ext), topics: [] };
    if (SPREADSHEET_EXTENSIONS.includes(ext)) return { contentHint: "Spreadsheet file.", topics: [] };
    return { contentHint: NOT_APPLICABLE_HINT, topics: [] };
  } catch (err) {
    return {
      contentHint: `Hint Error for ${path.basename(filePath)}: ${describeError(err)}`,
      topics: [],
    };
  }
}

export async function contentHint(filePath: string, extension: string): Promise<string> {
  const { contentHint: hint } = await describeContent(filePath, extension, []);
  return hint;
}
