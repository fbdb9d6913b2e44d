import * as fs from "fs";
import * as path from "path";
import { createAcademicDocument, errorMessage } from "./formatter";

async function main() {
  const [inputPath, titlePath, outputArg] = process.argv.slice(2);

  if (!inputPath || !titlePath) {
    console.error("Usage: format.ts <input.md> <title.json> [output.docx]");
    process.exit(1);
  }

  for (const file of [inputPath, titlePath]) {
    if (!fs.existsSync(file)) {
      console.error(`File not found: ${file}`);
      process.exit(1);
    }
  }

  const outputPath = outputArg || path.join(path.dirname(inputPath), `${path.parse(inputPath).name}.docx`);

  console.log(`Loading text: ${inputPath}...`);
  const rawText = fs.readFileSync(inputPath, "utf8");

  let titleData: unknown;
  try {
    titleData = JSON.parse(fs.readFileSync(titlePath, "utf8"));
  } catch (parseError) {
    throw new Error(`Failed to read title data from ${titlePath}: ${errorMessage(parseError)}`);
  }

  const result = await createAcademicDocument(titleData, rawText, outputPath);

  console.log(`Parsed ${result.blocks.length} body blocks and ${result.references.length} references`);
  console.log(`✓ APA document created successfully: ${result.outputPath}`);
}

main().catch((error) => {
  console.error(`✗ ${errorMessage(error)}`);
  process.exit(1);
});
