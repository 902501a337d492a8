import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { BuildRecord, BuildRecordSink } from '../pipeline/types.js';

export type SinkTarget = string | ((record: BuildRecord) => string);

/** Writes the record as pretty JSON to a file, or to stdout when the target is "-". */
export class JsonFileSink implements BuildRecordSink {
  constructor(
    private readonly target: SinkTarget,
    private readonly stdout: NodeJS.WritableStream = process.stdout,
  ) {}

  async persist(record: BuildRecord): Promise<void> {
    const body = JSON.stringify(record, null, 2) + '\n';
    const target = typeof this.target === 'function' ? this.target(record) : this.target;
    if (target === '-') {
      this.stdout.write(body);
      return;
    }
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, body, 'utf8');
  }
}
