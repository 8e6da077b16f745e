// packages/core/src/report/sink.ts — Where artifacts end up

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ReportArtifact } from './generator.js';

export interface ReportSink {
  write(artifact: ReportArtifact): Promise<void>;
}

/** Writes artifacts into a directory, creating it on first write. */
export class DirectorySink implements ReportSink {
  private created = false;

  constructor(readonly dir: string) {}

  async write(artifact: ReportArtifact): Promise<void> {
    if (!this.created) {
      await mkdir(this.dir, { recursive: true });
      this.created = true;
    }
    await writeFile(join(this.dir, artifact.name), artifact.content, 'utf-8');
  }
}

/** Write artifacts in order; returns their names. */
export async function writeArtifacts(sink: ReportSink, artifacts: readonly ReportArtifact[]): Promise<string[]> {
  for (const artifact of artifacts) {
    await sink.write(artifact);
  }
  return artifacts.map((a) => a.name);
}
