// packages/core/src/discovery/entity-registry.ts — Platform lookup from the stored entity registry

import { join } from 'node:path';
import { z } from 'zod';
import { readOptionalJsonFile, toLoadIssue } from '../corpus/read.js';
import type { LoadIssue } from '../types/analysis.js';

const entityRegistrySchema = z.object({
  data: z.object({
    entities: z.array(
      z
        .object({
          entity_id: z.string(),
          platform: z.string(),
        })
        .passthrough(),
    ),
  }),
});

export interface EntityRegistryResult {
  /** entity_id -> integration platform */
  platforms: Map<string, string>;
  issue: LoadIssue | null;
}

/**
 * Read `<storageDir>/<file>`. A missing registry is not an error: platform
 * based helpers then fall back to attribute inference.
 */
export async function loadEntityRegistry(
  root: string,
  options: { storageDir: string; file: string; timeoutMs: number },
): Promise<EntityRegistryResult> {
  const relPath = `${options.storageDir}/${options.file}`;
  let raw: unknown;
  try {
    raw = await readOptionalJsonFile(join(root, options.storageDir, options.file), relPath, options.timeoutMs);
  } catch (err) {
    return { platforms: new Map(), issue: toLoadIssue(err, relPath) };
  }
  if (raw === undefined) return { platforms: new Map(), issue: null };

  const parsed = entityRegistrySchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return {
      platforms: new Map(),
      issue: {
        path: relPath,
        phase: 'parse',
        message: `Unexpected entity registry shape at ${first?.path.join('.') ?? '<root>'}`,
      },
    };
  }

  const platforms = new Map<string, string>();
  for (const entity of parsed.data.data.entities) {
    platforms.set(entity.entity_id, entity.platform);
  }
  return { platforms, issue: null };
}
