/**
 * Download Ledger and Claim Registry
 *
 * The ledger is a snapshot of the output directory's file names taken once
 * per run, plus the paths written during the run. The claim registry makes
 * sure at most one task fetches to a given destination path.
 */

import * as path from 'path';
import { listFileNames } from '../utils/fileScanner';

function foldName(fileName: string): string {
  return fileName.toLowerCase();
}

function foldPath(filePath: string): string {
  return path.resolve(filePath).toLowerCase();
}

// ─── Download Ledger ─────────────────────────────────────────────────────────

export class DownloadLedger {
  private readonly names: Set<string>;

  private constructor(names: Iterable<string>) {
    this.names = new Set<string>();
    for (const name of names) {
      this.names.add(foldName(name));
    }
  }

  /**
   * Lists `dir` once. A missing directory gives an empty ledger.
   */
  static snapshot(dir: string): DownloadLedger {
    return new DownloadLedger(listFileNames(dir));
  }

  static fromNames(names: Iterable<string>): DownloadLedger {
    return new DownloadLedger(names);
  }

  /**
   * Whether a file with the destination's name (case-insensitive) existed
   * at snapshot time or was recorded since.
   */
  exists(destinationPath: string): boolean {
    return this.names.has(foldName(path.basename(destinationPath)));
  }

  /** Marks a destination as written */
  record(destinationPath: string): void {
    this.names.add(foldName(path.basename(destinationPath)));
  }

  get size(): number {
    return this.names.size;
  }
}

// ─── Claim Registry ──────────────────────────────────────────────────────────

/**
 * Per-run set of claimed destination paths, keyed by the case-folded
 * resolved path. tryClaim is a synchronous check-and-set.
 */
export class ClaimRegistry {
  private readonly claims = new Set<string>();

  /** Returns true if the caller now owns the path, false if it was already claimed */
  tryClaim(destinationPath: string): boolean {
    const key = foldPath(destinationPath);
    if (this.claims.has(key)) {
      return false;
    }
    this.claims.add(key);
    return true;
  }

  release(destinationPath: string): void {
    this.claims.delete(foldPath(destinationPath));
  }

  isClaimed(destinationPath: string): boolean {
    return this.claims.has(foldPath(destinationPath));
  }

  get size(): number {
    return this.claims.size;
  }
}
