import { randomUUID } from "node:crypto";
import { constants } from "node:fs";
import {
  access,
  mkdir,
  readdir,
  readFile,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import path from "node:path";
import type { BlockRecord } from "../types/BlockRecord";
import getValue from "../utils/getValue";
import { mapAndFilterNull } from "../utils/mapAndFilterNull";
import parseStringToInt from "../utils/parseStringToInt";
import type { IngestConfig } from "./config";
import { describeError, StorageUnavailableError } from "./errors";
import { createLogger } from "./logger";
import { StorageBackend, WriteOutcome } from "./storageBackend";

const logger = createLogger("file-storage");

const JSON_EXTENSION = ".json";
const TMP_EXTENSION = ".tmp";

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

export type FileCleanupReport = {
  // Temporary files left behind by interrupted writes
  removedTmpFiles: string[];
  // Heights whose documents failed verification
  removedHeights: number[];
};

/**
 * Stores one JSON document per block, named by height, under a data directory.
 * Documents are written to a temporary file and renamed into place.
 */
export class FileBackend extends StorageBackend {
  public readonly name = "file";
  private readonly dataDir: string;
  private readonly addJsonExtension: boolean;
  private readonly prettyPrint: boolean;

  constructor({
    dataDir,
    addJsonExtension,
    prettyPrint,
  }: Pick<
    IngestConfig["storage"]["file"],
    "dataDir" | "addJsonExtension" | "prettyPrint"
  >) {
    super();
    this.dataDir = dataDir;
    this.addJsonExtension = addJsonExtension;
    this.prettyPrint = prettyPrint;
  }

  /**
   * Path of the document holding a height
   */
  public pathFor(height: number): string {
    return path.join(
      this.dataDir,
      `${height}${this.addJsonExtension ? JSON_EXTENSION : ""}`
    );
  }

  public async connect(): Promise<void> {
    try {
      await mkdir(this.dataDir, { recursive: true });
    } catch (error) {
      throw new StorageUnavailableError(
        this.name,
        `Cannot create data directory ${this.dataDir}`,
        error
      );
    }
    logger.info(`Writing blocks to ${path.resolve(this.dataDir)}`);
  }

  public async disconnect(): Promise<void> {}

  public async has(height: number): Promise<boolean> {
    try {
      await stat(this.pathFor(height));
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return false;
      }
      throw new StorageUnavailableError(
        this.name,
        `Cannot stat block ${height}`,
        error
      );
    }
  }

  public async write(record: BlockRecord): Promise<WriteOutcome> {
    if (await this.has(record.height)) {
      return WriteOutcome.EXISTS;
    }

    const target = this.pathFor(record.height);
    const tmpPath = path.join(
      this.dataDir,
      `.${record.height}.${randomUUID()}${TMP_EXTENSION}`
    );
    const document = {
      height: record.height,
      hash: record.hash,
      timestamp: record.timestamp.toISOString(),
      chainId: record.chainId,
      txs: record.txs,
      payload: record.payload,
    };

    try {
      await writeFile(
        tmpPath,
        JSON.stringify(document, null, this.prettyPrint ? 2 : undefined),
        "utf8"
      );
      await rename(tmpPath, target);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw new StorageUnavailableError(
        this.name,
        `Cannot write block ${record.height}`,
        error
      );
    }
    return WriteOutcome.WRITTEN;
  }

  private async listEntries(): Promise<string[]> {
    try {
      return await readdir(this.dataDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw new StorageUnavailableError(
        this.name,
        `Cannot list ${this.dataDir}`,
        error
      );
    }
  }

  public async listHeights(): Promise<number[]> {
    const entries = await this.listEntries();

    return mapAndFilterNull(entries, (entry) => {
      if (entry.endsWith(TMP_EXTENSION)) {
        return null;
      }
      const base = entry.endsWith(JSON_EXTENSION)
        ? entry.slice(0, -JSON_EXTENSION.length)
        : entry;
      return parseStringToInt(base);
    }).sort((a, b) => a - b);
  }

  /**
   * Checks that the document of a height parses and belongs to that height
   * @returns False if the document is missing or corrupt
   */
  public async verify(height: number): Promise<boolean> {
    let document: unknown;
    try {
      document = JSON.parse(await readFile(this.pathFor(height), "utf8"));
    } catch (error) {
      logger.warn(`Cannot read block ${height}: ${describeError(error)}`);
      return false;
    }

    const storedHeight = getValue(document, ["height"]);
    if (storedHeight !== height) {
      logger.warn(`Block ${height} holds height ${String(storedHeight)}`);
      return false;
    }
    if (typeof getValue(document, ["hash"]) !== "string") {
      logger.warn(`Block ${height} has no hash`);
      return false;
    }
    return true;
  }

  /**
   * Deletes stale temporary files and documents that fail verification
   * @param tmpOlderThanMs Age past which a temporary file is stale
   */
  public async cleanup(tmpOlderThanMs: number): Promise<FileCleanupReport> {
    const report: FileCleanupReport = { removedTmpFiles: [], removedHeights: [] };
    const cutoff = Date.now() - tmpOlderThanMs;

    for (const entry of await this.listEntries()) {
      if (!entry.endsWith(TMP_EXTENSION)) {
        continue;
      }
      const tmpPath = path.join(this.dataDir, entry);
      const { mtimeMs } = await stat(tmpPath);
      if (mtimeMs < cutoff) {
        await rm(tmpPath, { force: true });
        report.removedTmpFiles.push(entry);
      }
    }

    for (const height of await this.listHeights()) {
      if (!(await this.verify(height))) {
        await rm(this.pathFor(height), { force: true });
        report.removedHeights.push(height);
      }
    }

    logger.info(
      `Removed ${report.removedTmpFiles.length} temporary files and ${report.removedHeights.length} corrupt blocks`
    );
    return report;
  }

  public async healthCheck(): Promise<void> {
    try {
      await access(this.dataDir, constants.W_OK);
    } catch (error) {
      throw new StorageUnavailableError(
        this.name,
        `Data directory ${this.dataDir} is not writable`,
        error
      );
    }
  }
}
