/**
 * Runs the extraction pipeline on one local PDF and prints the selected
 * products as JSON. `--details` prints the whole result instead.
 */
import "dotenv/config";
import { existsSync } from "fs";
import { loadConfig } from "../src/config.js";
import { SubmittalPipeline } from "../src/pipeline.js";

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const details = args.includes("--details");
  const paths = args.filter((arg) => arg !== "--details");

  if (paths.length !== 1) {
    console.log(
      "Usage: npx tsx workers/scripts/extract-submittal.ts [--details] <pdf_path>",
    );
    return 1;
  }

  const pdfPath = paths[0];
  if (!existsSync(pdfPath)) {
    console.log(`Error: File ${pdfPath} not found`);
    return 1;
  }

  console.log(`Processing: ${pdfPath}`);
  const pipeline = SubmittalPipeline.fromConfig(loadConfig());
  const result = await pipeline.run(pdfPath);

  if (!result.success) {
    console.log(`Error: ${result.error}`);
    return 1;
  }

  console.log(JSON.stringify(details ? result : result.products, null, 2));
  return 0;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error("Error:", error);
    process.exit(1);
  },
);
