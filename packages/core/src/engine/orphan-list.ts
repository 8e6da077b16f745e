// packages/core/src/engine/orphan-list.ts — Parse the user-reviewed orphan list

import { isValidEntityId } from '../scanners/entity-id.js';
import type { OrphanListEntry, ParsedOrphanList, ValidationIssue } from '../types/deletion.js';

/**
 * One entity id per line. Blank lines are ignored, `#` lines are kept by the
 * user and excluded, trailing `# …` annotations are stripped and repeated ids
 * collapse onto their first line.
 */
export function parseOrphanList(text: string): ParsedOrphanList {
  const entries: OrphanListEntry[] = [];
  const issues: ValidationIssue[] = [];
  const seen = new Set<string>();
  let keptCount = 0;

  text.split(/\r?\n/).forEach((raw, i) => {
    const lineNumber = i + 1;
    const line = raw.trim();
    if (!line) return;
    if (line.startsWith('#')) {
      keptCount++;
      return;
    }

    const entityId = line.split('#')[0].trim().split(/\s+/)[0];
    if (!isValidEntityId(entityId)) {
      issues.push({
        lineNumber,
        entityId,
        reason: 'malformed_entity_id',
        message: `"${entityId}" is not a valid entity id`,
      });
      return;
    }
    if (seen.has(entityId)) return;
    seen.add(entityId);
    entries.push({ lineNumber, entityId });
  });

  return { entries, keptCount, issues };
}
