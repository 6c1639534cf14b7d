#!/usr/bin/env node
import 'dotenv/config';
import * as path from 'path';
import { createGeminiExtractionDeps, extractFromFiles } from './extraction/runExtraction';
import { isExtractionError } from './extraction/errors';
import { writeExtractionExports } from './export/writeExports';
import { flattenExtraction } from './flatten/flattenResult';

interface CliArgs {
  outDir: string;
  files: string[];
}

function parseArgs(argv: string[]): CliArgs {
  const files: string[] = [];
  let outDir = process.cwd();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--out' || arg === '-o') {
      const value = argv[i + 1];
      if (!value) {
        throw new Error(`${arg} requires a directory`);
      }
      outDir = path.resolve(value);
      i++;
    } else if (arg) {
      files.push(arg);
    }
  }
  return { outDir, files };
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  if (args.files.length === 0) {
    console.error('Usage: npm run dev -- [--out <dir>] <file> [more files...]');
    console.error('Supported formats: .pdf, .docx, .xlsx/.xls/.ods, .csv/.tsv/.txt/.md, .png/.jpg/.webp');
    console.error('Example: npm run dev -- --out exports papers/main.pdf papers/supplement.xlsx');
    process.exit(1);
  }

  try {
    const run = await extractFromFiles(args.files, createGeminiExtractionDeps());
    const stem = path.parse(args.files[0] ?? 'extraction').name;
    const written = await writeExtractionExports(run.result, args.outDir, stem);

    for (const skipped of run.skippedFiles) {
      console.warn(`Skipped ${skipped.file}: ${skipped.reason}`);
    }
    console.log(
      `Extraction completed: ${run.result.variants.length} variant(s), ${flattenExtraction(run.result).length} row(s)`
    );
    for (const file of written) {
      console.log(`  wrote ${file}`);
    }
  } catch (error) {
    if (isExtractionError(error)) {
      console.error(`${error.kind}: ${error.message}`);
    } else {
      console.error('Fatal error:', error);
    }
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { extractFromFiles, createGeminiExtractionDeps } from './extraction/runExtraction';
export { runBatch } from './pipeline/runBatch';
export * from './schema/extraction';
export * from './extraction/errors';
export * from './flatten/flattenResult';
export * from './export/csv';
export * from './pipeline/types';
