import { appendFileSync } from 'node:fs';

/**
 * Appends hash lines to a file. Each call opens, writes one whole line, and
 * closes, so a concurrent reader never sees a partial line.
 */
export class HashFileWriter {
  constructor(readonly path: string) {}

  append(line: string): void {
    appendFileSync(this.path, `${line}\n`, 'utf8');
  }
}
