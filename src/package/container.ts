import { copyFileSync, existsSync, mkdirSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join, relative, sep } from "node:path";
import AdmZip from "adm-zip";
import { compress, decompress, init as initZstd } from "@bokuweb/zstd-wasm";
import { v7 as uuidv7 } from "uuid";
import {
  InvalidContainerError,
  MissingPayloadError,
  PackageNotFoundError,
} from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { PayloadKind } from "../types.js";
import { LEGACY_DB_FILE, MODERN_DB_FILE, SCRATCH_FILES, WORKING_DB_FILE } from "../types.js";

export const ZSTD_LEVEL = 3;
const INITIAL_OUTPUT_BYTES = 1024 * 1024;
const MAX_OUTPUT_BYTES = 1024 * 1024 * 1024;
const ZSTD_MAGIC = 0xfd2fb528;

let zstdReady: Promise<void> | null = null;

function ensureZstd(): Promise<void> {
  zstdReady ??= initZstd();
  return zstdReady;
}

export async function compressPayload(data: Uint8Array): Promise<Buffer> {
  await ensureZstd();
  return Buffer.from(compress(Buffer.from(data), ZSTD_LEVEL));
}

/**
 * Frames written by a streaming encoder (Anki's own) declare no content size,
 * so the output buffer is a guess that doubles until the frame fits.
 */
export async function decompressPayload(data: Uint8Array): Promise<Buffer> {
  await ensureZstd();
  const frame = Buffer.from(data);
  if (frame.length < 4 || frame.readUInt32LE(0) !== ZSTD_MAGIC) {
    throw new Error("not a zstd frame");
  }
  let outputBytes = Math.max(INITIAL_OUTPUT_BYTES, frame.length * 4);

  for (;;) {
    try {
      return Buffer.from(decompress(frame, { defaultHeapSize: outputBytes }));
    } catch (err) {
      if (!isOutputTooSmall(err) || outputBytes >= MAX_OUTPUT_BYTES) throw err;
      outputBytes = Math.min(outputBytes * 2, MAX_OUTPUT_BYTES);
    }
  }
}

// ZSTD_error_dstSize_tooSmall
function isOutputTooSmall(err: unknown): boolean {
  return err instanceof Error && /code -70\b/.test(err.message);
}

/**
 * Unpacks a flashcard package into a scratch directory, exposes one plain
 * SQLite working copy of its collection, and packs the directory back up.
 *
 * Whichever payload the package carried, the output carries both: the legacy
 * collection.anki2 and a recompressed collection.anki21b.
 *
 * The scratch directory is a fresh subdirectory of baseDir; nothing else under
 * baseDir is touched.
 */
export class PackageContainer {
  readonly workDir: string;
  private payload: PayloadKind | null = null;

  constructor(
    baseDir: string,
    private readonly logger: Logger = silentLogger,
  ) {
    this.workDir = join(baseDir, `deck-augment-${uuidv7()}`);
  }

  get workingDatabasePath(): string {
    return join(this.workDir, WORKING_DB_FILE);
  }

  async open(packagePath: string): Promise<string> {
    if (!existsSync(packagePath) || !statSync(packagePath).isFile()) {
      throw new PackageNotFoundError(packagePath);
    }

    this.reset();

    this.logger.info(`Extracting ${packagePath}...`);
    let archive: AdmZip;
    try {
      archive = new AdmZip(packagePath);
      archive.extractAllTo(this.workDir, true);
    } catch (err) {
      throw new InvalidContainerError(packagePath, err instanceof Error ? err.message : String(err));
    }

    const modernPath = join(this.workDir, MODERN_DB_FILE);
    const legacyPath = join(this.workDir, LEGACY_DB_FILE);

    if (existsSync(modernPath)) {
      this.logger.info(`Decompressing ${MODERN_DB_FILE} to use as working DB...`);
      let working: Buffer;
      try {
        working = await decompressPayload(readFileSync(modernPath));
      } catch (err) {
        throw new InvalidContainerError(
          packagePath,
          `${MODERN_DB_FILE} could not be decompressed (${err instanceof Error ? err.message : String(err)})`,
        );
      }
      writeFileSync(this.workingDatabasePath, working);
      this.payload = "modern";
    } else if (existsSync(legacyPath)) {
      this.logger.info(`Using ${LEGACY_DB_FILE} as working DB...`);
      copyFileSync(legacyPath, this.workingDatabasePath);
      this.payload = "legacy";
    } else {
      throw new MissingPayloadError(packagePath);
    }

    return this.workingDatabasePath;
  }

  /**
   * Mirror the working database into both payload slots and archive the
   * scratch directory, minus scratch artifacts, at outputPath.
   */
  async close(outputPath: string): Promise<string[]> {
    if (!this.payload) {
      throw new Error("Package not opened. Call open() first.");
    }

    const working = readFileSync(this.workingDatabasePath);
    writeFileSync(join(this.workDir, LEGACY_DB_FILE), working);
    this.logger.info(`Compressing to ${MODERN_DB_FILE}...`);
    writeFileSync(join(this.workDir, MODERN_DB_FILE), await compressPayload(working));

    this.logger.info(`Creating ${outputPath}...`);
    const archive = new AdmZip();
    const entries = listFiles(this.workDir)
      .map((file) => relative(this.workDir, file).split(sep).join("/"))
      .filter((entry) => !SCRATCH_FILES.includes(entry))
      .sort();

    for (const entry of entries) {
      archive.addFile(entry, readFileSync(join(this.workDir, ...entry.split("/"))));
    }
    archive.writeZip(outputPath);

    return entries;
  }

  dispose(): void {
    rmSync(this.workDir, { recursive: true, force: true });
    this.payload = null;
  }

  private reset(): void {
    rmSync(this.workDir, { recursive: true, force: true });
    mkdirSync(this.workDir, { recursive: true });
    this.payload = null;
  }
}

function listFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFiles(full));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}
