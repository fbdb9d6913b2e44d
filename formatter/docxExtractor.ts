import JSZip from "jszip";
import { XMLParser } from "fast-xml-parser";
import { DocumentReadError, errorMessage } from "./errors";
import type { DocxParagraph, DocxRun } from "./types";

// With preserveOrder every element is { [tagName]: children, ":@"?: attributes }
type OrderedNode = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function childNodes(node: OrderedNode, tag: string): OrderedNode[] {
  const value = node[tag];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function findAll(nodes: OrderedNode[], tag: string): OrderedNode[] {
  return nodes.filter((node) => tag in node);
}

function attribute(node: OrderedNode, name: string): string | undefined {
  const attrs = node[":@"];
  if (!isRecord(attrs)) return undefined;
  const value = attrs[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function textContent(nodes: OrderedNode[]): string {
  return nodes.map((node) => (typeof node["#text"] === "string" ? node["#text"] : "")).join("");
}

// <w:b/> and <w:i/> are toggles unless switched off with w:val
function isToggleOn(rPr: OrderedNode[], tag: string): boolean {
  const node = findAll(rPr, tag)[0];
  if (!node) return false;
  const val = attribute(node, "w:val");
  return val === undefined || !["0", "false", "off"].includes(val);
}

function parseTwips(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function createXmlParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    preserveOrder: true, // Preserve order of elements
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: false,
  });
}

async function loadPart(buffer: Buffer, partName: string): Promise<OrderedNode[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (zipError) {
    throw new DocumentReadError(`Failed to load DOCX file: ${errorMessage(zipError)}`, { cause: zipError });
  }

  const file = zip.file(partName);
  if (!file) {
    throw new DocumentReadError(`Could not find ${partName} in DOCX file`);
  }

  const xml = await file.async("string");
  const parsed: unknown = createXmlParser().parse(xml);
  return Array.isArray(parsed) ? parsed.filter(isRecord) : [];
}

function extractParagraph(pNode: OrderedNode[]): DocxParagraph {
  const runs: DocxRun[] = [];
  let hasPageBreak = false;

  for (const r of findAll(pNode, "w:r")) {
    const runChildren = childNodes(r, "w:r");
    const rPr = findAll(runChildren, "w:rPr").flatMap((node) => childNodes(node, "w:rPr"));

    for (const br of findAll(runChildren, "w:br")) {
      if (attribute(br, "w:type") === "page") {
        hasPageBreak = true;
      }
    }

    const text = findAll(runChildren, "w:t")
      .map((t) => textContent(childNodes(t, "w:t")))
      .join("");
    if (text) {
      runs.push({ text, isBold: isToggleOn(rPr, "w:b"), isItalic: isToggleOn(rPr, "w:i") });
    }
  }

  const pPr = findAll(pNode, "w:pPr").flatMap((node) => childNodes(node, "w:pPr"));
  const jc = findAll(pPr, "w:jc")[0];
  const ind = findAll(pPr, "w:ind")[0];

  const paragraph: DocxParagraph = {
    runs,
    text: runs.map((run) => run.text).join(""),
    hasPageBreak,
  };
  if (jc) {
    paragraph.alignment = attribute(jc, "w:val");
  }
  if (ind) {
    paragraph.leftIndent = parseTwips(attribute(ind, "w:left") ?? attribute(ind, "w:start"));
    const hanging = parseTwips(attribute(ind, "w:hanging"));
    paragraph.firstLineIndent = hanging !== undefined ? -hanging : parseTwips(attribute(ind, "w:firstLine"));
  }
  return paragraph;
}

/**
 * Reads the body paragraphs of a .docx back, in document order.
 */
export async function extractDocxParagraphs(buffer: Buffer): Promise<DocxParagraph[]> {
  const doc = await loadPart(buffer, "word/document.xml");

  const document = findAll(doc, "w:document").flatMap((node) => childNodes(node, "w:document"));
  const body = findAll(document, "w:body").flatMap((node) => childNodes(node, "w:body"));
  if (body.length === 0) {
    throw new DocumentReadError("Could not find document body");
  }

  // Ignore other elements like w:sectPr
  return findAll(body, "w:p").map((node) => extractParagraph(childNodes(node, "w:p")));
}

export interface HeaderField {
  instruction: string;
  alignment?: string;
}

/**
 * Field instructions (PAGE, DATE, ...) found in the default header.
 */
export async function extractHeaderFields(buffer: Buffer, partName = "word/header1.xml"): Promise<HeaderField[]> {
  const header = await loadPart(buffer, partName);
  const hdr = findAll(header, "w:hdr").flatMap((node) => childNodes(node, "w:hdr"));
  const fields: HeaderField[] = [];

  for (const p of findAll(hdr, "w:p")) {
    const pChildren = childNodes(p, "w:p");
    const pPr = findAll(pChildren, "w:pPr").flatMap((node) => childNodes(node, "w:pPr"));
    const jc = findAll(pPr, "w:jc")[0];

    for (const r of findAll(pChildren, "w:r")) {
      for (const instr of findAll(childNodes(r, "w:r"), "w:instrText")) {
        const instruction = textContent(childNodes(instr, "w:instrText")).trim();
        if (instruction) {
          fields.push({ instruction, alignment: jc ? attribute(jc, "w:val") : undefined });
        }
      }
    }
  }

  return fields;
}
