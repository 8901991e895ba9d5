import type { Stats } from "fs";
import { open, readdir, stat } from "fs/promises";
import path from "path";
import { Logger } from "../utils/logger.js";
import type { Font, FontLoader } from "./font.js";
import { loadFigletFont } from "./figletFont.js";

export const FONT_EXTENSION = ".flf";

const FIGLET_SIGNATURE = "flf2a";

export interface SkippedFont {
  name: string;
  reason: string;
}

export interface PopulateResult {
  /** Number of requested names available in the cache after the call. */
  loaded: number;
  skipped: SkippedFont[];
}

export interface FontCacheOptions {
  loader?: FontLoader;
  logger?: Logger;
}

export class FontValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FontValidationError";
  }
}

/**
 * Named font registry shared by every request.
 *
 * Reads go against an immutable snapshot. `populate` builds the next snapshot
 * privately and publishes it in one assignment; overlapping calls are
 * serialised. A name, once present, keeps its Font for the life of the cache.
 */
export class FontCache {
  private fonts: ReadonlyMap<string, Font> = new Map();
  private writeLock: Promise<void> = Promise.resolve();
  private loader: FontLoader;
  private logger: Logger;

  constructor(options: FontCacheOptions = {}) {
    this.loader = options.loader ?? loadFigletFont;
    this.logger = options.logger || new Logger("FontCache");
  }

  /**
   * Register `directory/<name>.flf` for each allowed name.
   * Names that fail validation are skipped with a warning; this never rejects
   * because of a bad font, even when nothing loads.
   */
  populate(directory: string, allowedNames: readonly string[]): Promise<PopulateResult> {
    const run = this.writeLock.then(() => this.load(directory, allowedNames));
    // The caller observes failures through `run`; the lock only orders writers.
    this.writeLock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(directory: string, allowedNames: readonly string[]): Promise<PopulateResult> {
    const next = new Map(this.fonts);
    const skipped: SkippedFont[] = [];
    const requested = new Set(allowedNames);
    let listing: string[] | null = null;

    for (const name of requested) {
      if (next.has(name)) {
        continue;
      }

      if (listing === null) {
        listing = await listDirectory(directory);
      }
      const fontPath = resolveFontPath(directory, name, listing);

      try {
        await validateFontFile(fontPath);
        next.set(name, this.loader(name, fontPath));
        this.logger.log(`Loaded font: ${name}`);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Could not load font ${name}: ${reason}`);
        skipped.push({ name, reason });
      }
    }

    this.fonts = next;

    const loaded = [...requested].filter((name) => next.has(name)).length;
    this.logger.log(`Loaded ${loaded} fonts successfully`);
    return { loaded, skipped };
  }

  lookup(name: string): Font | undefined {
    return this.fonts.get(name);
  }

  has(name: string): boolean {
    return this.fonts.has(name);
  }

  /**
   * The named font, else the default font, else undefined (nothing loaded).
   */
  lookupOrDefault(name: string, defaultName: string): Font | undefined {
    return this.fonts.get(name) ?? this.fonts.get(defaultName);
  }

  /**
   * Sorted snapshot of loaded font names.
   */
  list(): string[] {
    return [...this.fonts.keys()].sort();
  }

  get size(): number {
    return this.fonts.size;
  }
}

async function listDirectory(directory: string): Promise<string[]> {
  try {
    return await readdir(directory);
  } catch {
    // A missing directory surfaces per font as "does not exist".
    return [];
  }
}

/**
 * `directory/<name>.flf`, or a file in the directory whose name matches it
 * ignoring case.
 */
export function resolveFontPath(directory: string, name: string, listing: readonly string[]): string {
  const fileName = `${name}${FONT_EXTENSION}`;
  if (listing.includes(fileName)) {
    return path.join(directory, fileName);
  }
  const wanted = fileName.toLowerCase();
  const match = listing.find((entry) => entry.toLowerCase() === wanted);
  return path.join(directory, match ?? fileName);
}

/**
 * Check that a font file exists, is a regular file, is readable, and starts
 * with a FIGlet signature.
 */
export async function validateFontFile(fontPath: string): Promise<void> {
  let info: Stats;
  try {
    info = await stat(fontPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new FontValidationError(`font file does not exist: ${fontPath}`);
    }
    throw new FontValidationError(`cannot access font file: ${describe(error)}`);
  }

  if (!info.isFile()) {
    throw new FontValidationError(`font path is not a regular file: ${fontPath}`);
  }

  let header: string;
  try {
    const handle = await open(fontPath, "r");
    try {
      const { bytesRead, buffer } = await handle.read(Buffer.alloc(FIGLET_SIGNATURE.length), 0, FIGLET_SIGNATURE.length, 0);
      header = buffer.toString("utf8", 0, bytesRead);
    } finally {
      await handle.close();
    }
  } catch (error) {
    throw new FontValidationError(`cannot read font file: ${describe(error)}`);
  }

  if (header !== FIGLET_SIGNATURE) {
    throw new FontValidationError(`not a FIGlet font file: ${fontPath}`);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
