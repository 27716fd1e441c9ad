/**
 * Recorded unit hashes (`current.txt`) and the hash primitive.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import { safeExistsSync, safeReadTextSync } from '../utils/safe-fs.js';

/**
 * Hex SHA-256 digest of a unit's source bytes.
 */
export function hashSource(source: Buffer | string): string {
  return createHash('sha256').update(source).digest('hex');
}

/**
 * Parsed ledger: canonical unit name → every hash recorded for it.
 */
export class HashLedger {
  private readonly entries = new Map<string, string[]>();

  /**
   * Parses ledger text. Each non-blank line not starting with `#` is
   * `<hex> <fqname>`; anything after the name is ignored.
   */
  static parse(text: string): HashLedger {
    const ledger = new HashLedger();
    for (const rawLine of text.split('\n')) {
      const line = rawLine.trim();
      if (line === '' || line.startsWith('#')) {
        continue;
      }
      const [hash, name] = line.split(/\s+/);
      if (hash === undefined || name === undefined) {
        continue;
      }
      ledger.record(name, hash.toLowerCase());
    }
    return ledger;
  }

  /** Reads a ledger file; a missing file is an empty ledger. */
  static load(filePath: string): HashLedger {
    if (!safeExistsSync(filePath)) {
      return new HashLedger();
    }
    return HashLedger.parse(safeReadTextSync(filePath));
  }

  record(name: string, hash: string): void {
    const hashes = this.entries.get(name);
    if (hashes === undefined) {
      this.entries.set(name, [hash]);
    } else {
      hashes.push(hash);
    }
  }

  hashesFor(name: string): readonly string[] {
    return this.entries.get(name) ?? [];
  }

  /**
   * True unless the ledger lists the unit and none of the listed hashes match.
   */
  accepts(name: string, hash: string): boolean {
    const hashes = this.hashesFor(name);
    return hashes.length === 0 || hashes.includes(hash);
  }
}
