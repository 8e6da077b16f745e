// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate an analysis run ID with "run_" prefix. */
export function generateRunId(): string {
  return `run_${nanoid(16)}`;
}

