import fs from "node:fs/promises";
import path from "node:path";
import type { SaveResult, SnapshotEntry } from "./types.js";
import { formatDay, md5 } from "./utils.js";

const SNAPSHOT_EXT = ".html";
const PRINT_DIR = "print";
const SCREENSHOT_FILE = "homepage.png";
export const DEFAULT_RECHECK_THRESHOLD_MS = 600_000;

interface IncumbentDigest {
  filename: string;
  mtimeMs: number;
  size: number;
  hash: string;
}

export interface ContentVersionStoreOptions {
  baseDir: string;
  recheckThresholdMs?: number;
  now?: () => Date;
}

export function snapshotFilename(day: string, sequence: number): string {
  return sequence === 0 ? `${day}${SNAPSHOT_EXT}` : `${day}_${sequence}${SNAPSHOT_EXT}`;
}

/**
 * Sequence index encoded in a snapshot file name, or null when the name does
 * not belong to `day` or carries a suffix we did not write ("_x", "_01", "_0").
 */
export function parseSnapshotSequence(filename: string, day: string): number | null {
  if (!filename.startsWith(day) || !filename.endsWith(SNAPSHOT_EXT)) return null;
  const rest = filename.slice(day.length, filename.length - SNAPSHOT_EXT.length);
  if (rest === "") return 0;
  const match = /^_([1-9]\d*)$/.exec(rest);
  if (!match) return null;
  const sequence = Number(match[1]);
  return Number.isSafeInteger(sequence) ? sequence : null;
}

function assertDomain(domain: string): void {
  if (!domain || domain === "." || domain === ".." || /[\\/]/.test(domain)) {
    throw new Error(`Invalid domain for storage: "${domain}"`);
  }
}

/**
 * Day-granular, hash-deduplicated archive of homepage snapshots.
 *
 * Every save rescans the domain directory, so the disk stays authoritative
 * for the version list and counts survive restarts and outside writers.
 * Only the incumbent's digest is kept in memory, keyed by name, mtime and size.
 * Files that merely share the day prefix are left alone.
 */
export class ContentVersionStore {
  private readonly baseDir: string;
  private readonly recheckThresholdMs: number;
  private readonly now: () => Date;
  private readonly digests = new Map<string, IncumbentDigest>();

  constructor(options: ContentVersionStoreOptions) {
    this.baseDir = options.baseDir;
    this.recheckThresholdMs = options.recheckThresholdMs ?? DEFAULT_RECHECK_THRESHOLD_MS;
    this.now = options.now ?? (() => new Date());
  }

  domainDir(domain: string): string {
    assertDomain(domain);
    return path.join(this.baseDir, domain);
  }

  screenshotPath(domain: string): string {
    return path.join(this.domainDir(domain), PRINT_DIR, SCREENSHOT_FILE);
  }

  async ensureDomainDirectory(domain: string): Promise<string> {
    const dir = this.domainDir(domain);
    await fs.mkdir(path.join(dir, PRINT_DIR), { recursive: true });
    return dir;
  }

  async listVersions(domain: string, day: string = formatDay(this.now())): Promise<SnapshotEntry[]> {
    return this.scanDay(domain, day);
  }

  async save(domain: string, content: Buffer | null): Promise<SaveResult> {
    const bytes = content ?? Buffer.alloc(0);
    const dir = await this.ensureDomainDirectory(domain);
    const now = this.now();
    const day = formatDay(now);
    const versions = await this.scanDay(domain, day);
    const incumbent = versions[versions.length - 1];
    const hash = md5(bytes);

    if (incumbent) {
      const incumbentPath = path.join(dir, incumbent.filename);
      const stat = await fs.stat(incumbentPath);
      if (now.getTime() - stat.mtimeMs < this.recheckThresholdMs) {
        return { filename: null, totalToday: versions.length };
      }
      const previousHash = await this.digestOf(domain, incumbentPath, incumbent.filename, stat);
      if (previousHash === hash) {
        return { filename: null, totalToday: versions.length };
      }
    }

    const sequence = incumbent ? incumbent.sequence + 1 : 0;
    const filename = snapshotFilename(day, sequence);
    const filePath = path.join(dir, filename);
    // "wx": never clobber a file written between the scan and this write
    await fs.writeFile(filePath, bytes, { flag: "wx" });
    const written = await fs.stat(filePath);
    this.digests.set(domain, { filename, mtimeMs: written.mtimeMs, size: written.size, hash });

    return { filename, totalToday: versions.length + 1 };
  }

  private async scanDay(domain: string, day: string): Promise<SnapshotEntry[]> {
    let names: string[] = [];
    try {
      names = await fs.readdir(this.domainDir(domain));
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }

    const versions: SnapshotEntry[] = [];
    for (const filename of names) {
      const sequence = parseSnapshotSequence(filename, day);
      if (sequence === null) continue;
      versions.push({ day, sequence, filename });
    }
    return versions.sort((a, b) => a.sequence - b.sequence);
  }

  private async digestOf(
    domain: string,
    filePath: string,
    filename: string,
    stat: { mtimeMs: number; size: number }
  ): Promise<string> {
    const cached = this.digests.get(domain);
    if (cached && cached.filename === filename && cached.mtimeMs === stat.mtimeMs && cached.size === stat.size) {
      return cached.hash;
    }
    const hash = md5(await fs.readFile(filePath));
    this.digests.set(domain, { filename, mtimeMs: stat.mtimeMs, size: stat.size, hash });
    return hash;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
