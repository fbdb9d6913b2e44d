import * as fs from "fs";
import * as path from "path";
import { mapBodyBlocks, parseText } from "./formatter";

async function main() {
  const inputPath = process.argv[2] || path.join(__dirname, "samples", "sample.md");

  if (!fs.existsSync(inputPath)) {
    console.error(`File not found: ${inputPath}`);
    process.exit(1);
  }

  console.log(`Loading text: ${inputPath}...`);
  const rawText = fs.readFileSync(inputPath, "utf8");

  console.log("Parsing text...");
  const result = parseText(rawText);

  const output = {
    metadata: {
      totalBlocks: result.blocks.length,
      totalReferences: result.references.length,
      source: path.basename(inputPath),
      parsedAt: new Date().toISOString(),
    },
    blocks: result.blocks.map((block, idx) => ({ index: idx + 1, ...block })),
    references: result.references,
    directives: mapBodyBlocks(result.blocks),
    summary: (() => {
      const counts: Record<string, number> = {};
      result.blocks.forEach((block) => {
        const key = block.type === "heading" ? `heading${block.level}` : block.type;
        counts[key] = (counts[key] || 0) + 1;
      });
      return counts;
    })(),
  };

  const jsonPath = process.argv[3] || path.join(path.dirname(inputPath), `${path.parse(inputPath).name}.blocks.json`);
  fs.writeFileSync(jsonPath, JSON.stringify(output, null, 2));

  console.log(`\n✅ Blocks exported to: ${jsonPath}`);
  console.log(`\nSummary:`);
  Object.entries(output.summary)
    .sort((a, b) => b[1] - a[1])
    .forEach(([type, count]) => {
      console.log(`  ${type}: ${count}`);
    });
}

main().catch(console.error);
