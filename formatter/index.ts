import { parseText } from "./textParser";
import { assembleDocument } from "./documentAssembler";
import { renderDocx } from "./docxPackage";
import { saveDocument } from "./documentWriter";
import { validateTitleData } from "./titleData";
import type { Block } from "./types";

export interface CreateDocumentResult {
  outputPath: string;
  bytes: number;
  blocks: Block[];
  references: string[];
}

/**
 * Parses the raw text, lays it out on the APA page and writes the .docx.
 * Title data is validated before anything is rendered.
 */
export async function createAcademicDocument(
  titleData: unknown,
  rawText: string,
  outputPath: string
): Promise<CreateDocumentResult> {
  const title = validateTitleData(titleData);

  const { blocks, references } = parseText(rawText);
  const directives = assembleDocument(title, { blocks, references });

  const buffer = await renderDocx(directives);
  saveDocument(buffer, outputPath);

  return { outputPath, bytes: buffer.length, blocks, references };
}

export * from "./types";
export * from "./errors";
export { parseText, extractFormula } from "./textParser";
export { mapBodyBlocks, mapReferences, mapTitlePage } from "./styleMapper";
export { assembleDocument } from "./documentAssembler";
export { renderDocx } from "./docxPackage";
export { saveDocument } from "./documentWriter";
export { validateTitleData } from "./titleData";
export { extractDocxParagraphs, extractHeaderFields } from "./docxExtractor";
export { readFormatRequest, outputFileName, errorStatus } from "./formatRequest";
