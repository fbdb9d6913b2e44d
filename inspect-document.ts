import * as fs from "fs";
import { extractDocxParagraphs, extractHeaderFields } from "./formatter";

function describeIndent(twips: number | undefined): string {
  return twips === undefined ? "-" : `${twips / 1440}in`;
}

async function main() {
  const docxPath = process.argv[2];

  if (!docxPath || !fs.existsSync(docxPath)) {
    console.error(`File not found: ${docxPath ?? "(no path given)"}`);
    process.exit(1);
  }

  console.log(`Loading DOCX file: ${docxPath}...`);
  const buffer = fs.readFileSync(docxPath);

  const fields = await extractHeaderFields(buffer);
  console.log(`\n=== HEADER ===\n`);
  fields.forEach((field) => {
    console.log(`  field ${field.instruction} (${field.alignment ?? "left"})`);
  });

  const paragraphs = await extractDocxParagraphs(buffer);
  console.log(`\n=== PARAGRAPHS (${paragraphs.length}) ===\n`);

  paragraphs.forEach((para, idx) => {
    const number = String(idx + 1).padStart(3, " ");
    if (para.hasPageBreak) {
      console.log(`${number}. ---------- page break ----------`);
      return;
    }
    if (para.runs.length === 0) {
      console.log(`${number}. (blank)`);
      return;
    }

    const layout = `[${(para.alignment ?? "left").padEnd(6, " ")} left=${describeIndent(para.leftIndent)} first=${describeIndent(para.firstLineIndent)}]`;
    const runs = para.runs
      .map((run) => {
        const marks = `${run.isBold ? "B" : ""}${run.isItalic ? "I" : ""}`;
        const preview = run.text.length > 80 ? run.text.substring(0, 80) + "..." : run.text;
        return marks ? `{${marks}}"${preview}"` : `"${preview}"`;
      })
      .join(" + ");

    console.log(`${number}. ${layout} ${runs}`);
  });
}

main().catch(console.error);
