import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { EvidenceBundle } from './types';

export const BatchManifestSchema = z.object({
  bundles: z
    .array(
      z.object({
        name: z.string().min(1),
        files: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
});

export type BatchManifest = z.infer<typeof BatchManifestSchema>;

/**
 * Validates a manifest document. Relative file paths are resolved against
 * `baseDir` (the manifest's directory when loaded from disk).
 */
export function parseBatchManifest(document: unknown, baseDir: string): EvidenceBundle[] {
  const parsed = BatchManifestSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `- ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid batch manifest:\n${issues.join('\n')}`);
  }

  const names = new Set<string>();
  for (const bundle of parsed.data.bundles) {
    if (names.has(bundle.name)) {
      throw new Error(`Invalid batch manifest: duplicate bundle name "${bundle.name}"`);
    }
    names.add(bundle.name);
  }

  return parsed.data.bundles.map((bundle) => ({
    name: bundle.name,
    files: bundle.files.map((file) => path.resolve(baseDir, file)),
  }));
}

export async function loadBatchManifest(manifestPath: string): Promise<EvidenceBundle[]> {
  const raw = await fs.readFile(manifestPath, 'utf-8');
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Failed to parse manifest ${manifestPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseBatchManifest(document, path.dirname(path.resolve(manifestPath)));
}
