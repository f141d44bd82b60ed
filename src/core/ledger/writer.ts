import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { isMissingFile } from '../../utils/fs.js';
import { LedgerEntrySchema, type LedgerEntry, type LedgerEntryInput } from './types.js';

/**
 * Append-only JSONL run log. `seq` is assigned when `append` is called and writes are
 * chained, so entries from parallel steps land in the file in `seq` order.
 */
export class LedgerWriter {
  private nextSeq: number;
  private pending: Promise<unknown> = Promise.resolve();

  private constructor(
    readonly ledgerPath: string,
    nextSeq: number
  ) {
    this.nextSeq = nextSeq;
  }

  static async open(ledgerPath: string): Promise<LedgerWriter> {
    await mkdir(dirname(ledgerPath), { recursive: true });
    const existing = await readExisting(ledgerPath);
    // Terminate a torn final line so the next entry starts on its own line.
    if (existing !== '' && !existing.endsWith('\n')) await appendLine(ledgerPath, '\n');
    return new LedgerWriter(ledgerPath, nextSeqAfter(existing));
  }

  append(event: LedgerEntryInput): Promise<LedgerEntry> {
    const entry = LedgerEntrySchema.parse({
      ...event,
      seq: this.nextSeq,
      timestamp: new Date().toISOString()
    });
    this.nextSeq += 1;

    const write = this.pending.then(() => appendLine(this.ledgerPath, `${JSON.stringify(entry)}\n`));
    // A failed write must not wedge later appends; the caller still sees the rejection.
    this.pending = write.catch(() => undefined);
    return write.then(() => entry);
  }

  /** Resolves once every append issued so far has hit the file. */
  async flush(): Promise<void> {
    await this.pending;
  }
}

async function appendLine(path: string, line: string): Promise<void> {
  const fh = await open(path, 'a');
  try {
    await fh.writeFile(line, 'utf8');
    await fh.sync();
  } finally {
    await fh.close();
  }
}

async function readExisting(ledgerPath: string): Promise<string> {
  try {
    return await readFile(ledgerPath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return '';
    throw err;
  }
}

function nextSeqAfter(content: string): number {
  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  // Skip a trailing partial line left by a crash mid-write.
  for (let i = lines.length - 1; i >= 0; i--) {
    const seq = readSeq(lines[i]);
    if (seq !== null) return seq + 1;
  }
  return 1;
}

function readSeq(line: string): number | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== 'object' || !('seq' in parsed)) return null;
  const { seq } = parsed;
  return typeof seq === 'number' && Number.isInteger(seq) && seq > 0 ? seq : null;
}
