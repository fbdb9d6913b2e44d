import { mapBodyBlocks, mapReferences, mapTitlePage } from "./styleMapper";
import type { ParseResult, StyleDirective, TitleData } from "./types";

/**
 * Orders the whole document: title page, page break, body, and the
 * reference list on its own page when there is one.
 */
export function assembleDocument(titleData: TitleData, parsed: ParseResult): StyleDirective[] {
  const directives: StyleDirective[] = [...mapTitlePage(titleData), { type: "pageBreak" }];

  directives.push(...mapBodyBlocks(parsed.blocks));

  const references = mapReferences(parsed.references);
  if (references.length > 0) {
    directives.push({ type: "pageBreak" }, ...references);
  }

  return directives;
}
