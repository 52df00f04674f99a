/**
 * Document Text Extraction
 *
 * Turns uploaded file bytes into plain text:
 * - PDF documents (via pdf-parse v1)
 * - Word .docx documents (via mammoth)
 * - HTML files (via cheerio)
 * - plain text, markdown and CSV as UTF-8
 *
 * Failures raise ExtractionError("file").
 */

import { createRequire } from "module";
import * as cheerio from "cheerio";
import mammoth from "mammoth";
import { ExtractionError, toErrorMessage } from "./error-classification";
import type { DocumentInput } from "./analyzer/types";

export const MIN_DOCUMENT_TEXT_CHARS = 20;
const DEFAULT_MAX_FILE_BYTES = 16 * 1024 * 1024;

const TEXT_EXTENSIONS = new Set([".txt", ".md", ".markdown", ".csv"]);
const HTML_EXTENSIONS = new Set([".html", ".htm"]);
const DOCX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export type DocumentExtractor = (input: DocumentInput) => Promise<string>;

/** Any parsed node (element or document), as cheerio's own API names it. */
type CheerioNode = Parameters<typeof cheerio.contains>[0];

const nodeRequire = createRequire(import.meta.url);

/**
 * Extract text from a PDF buffer using pdf-parse v1
 * v1 API: pdf(buffer) returns Promise<{text, numpages, info}>
 * Loaded with require: imported from ESM, v1 runs its bundled self-test.
 */
export async function extractPdfText(buffer: Buffer): Promise<string> {
  try {
    const pdfParse: typeof import("pdf-parse") = nodeRequire("pdf-parse");
    const data = await pdfParse(buffer);
    console.log(`[Extraction] PDF parsed: ${data.numpages} pages, ${data.text?.length || 0} chars`);
    return data.text || "";
  } catch (err) {
    throw new ExtractionError(`Failed to parse PDF: ${toErrorMessage(err)}`, "file");
  }
}

/**
 * Raw text of a .docx document; paragraphs are separated by blank lines.
 */
export async function extractDocxText(buffer: Buffer): Promise<string> {
  try {
    const { value, messages } = await mammoth.extractRawText({ buffer });
    if (messages.length > 0) {
      console.warn(`[Extraction] DOCX parsed with ${messages.length} warnings`);
    }
    return value;
  } catch (err) {
    throw new ExtractionError(`Failed to parse DOCX: ${toErrorMessage(err)}`, "file");
  }
}

/**
 * Strip scripts, styles and page chrome, then collapse whitespace.
 */
export function extractTextFromHtml(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, noscript, nav, header, footer, aside").remove();
  const root: cheerio.Cheerio<CheerioNode> = $("body").length > 0 ? $("body") : $.root();
  return root.text().replace(/\s+/g, " ").trim();
}

export function fileExtension(filename: string | undefined): string {
  if (!filename) return "";
  const dot = filename.lastIndexOf(".");
  return dot >= 0 ? filename.slice(dot).toLowerCase() : "";
}

function formatMegabytes(bytes: number): string {
  return `${Math.round(bytes / (1024 * 1024))}MB`;
}

export async function extractDocumentText(
  input: DocumentInput,
  options: { maxFileBytes?: number } = {},
): Promise<string> {
  const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;

  if (!input.bytes || input.bytes.length === 0) {
    throw new ExtractionError("No file provided", "file");
  }
  if (input.bytes.length > maxFileBytes) {
    throw new ExtractionError(`File too large. Maximum size is ${formatMegabytes(maxFileBytes)}.`, "file");
  }

  const ext = fileExtension(input.filename);
  const contentType = (input.contentType ?? "").toLowerCase();
  const buffer = Buffer.from(input.bytes);

  let text: string;
  if (ext === ".pdf" || contentType.includes("application/pdf")) {
    text = await extractPdfText(buffer);
  } else if (ext === ".docx" || contentType.includes(DOCX_CONTENT_TYPE)) {
    text = await extractDocxText(buffer);
  } else if (HTML_EXTENSIONS.has(ext) || contentType.includes("text/html")) {
    text = extractTextFromHtml(buffer.toString("utf-8"));
  } else if (TEXT_EXTENSIONS.has(ext) || contentType.startsWith("text/")) {
    text = buffer.toString("utf-8");
  } else {
    throw new ExtractionError(`File type not supported: ${ext || contentType || "unknown"}`, "file");
  }

  if (text.trim().length < MIN_DOCUMENT_TEXT_CHARS) {
    throw new ExtractionError("Insufficient text content in file", "file");
  }

  console.log(`[Extraction] Extracted ${text.length} characters from ${input.filename ?? "upload"}`);
  return text;
}
