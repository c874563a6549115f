import { readFile } from "node:fs/promises";
import path from "node:path";
import { asc, count, eq, max, min, sql } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import type { BlockRange } from "../types/BlockRange";
import type { BlockRecord } from "../types/BlockRecord";
import { mapAndFilterNull } from "../utils/mapAndFilterNull";
import parseStringToInt from "../utils/parseStringToInt";
import type { IngestConfig } from "./config";
import { describeError, StorageUnavailableError } from "./errors";
import { createLogger } from "./logger";
import { blocks, transactions } from "./postgresSchema";
import { createErrorRetrier, type ErrorRetrier, type Retrier } from "./retry";
import {
  StorageBackend,
  WriteOutcome,
  type StorageStats,
} from "./storageBackend";

const logger = createLogger("postgres");

export const SCHEMA_PATH = path.join(__dirname, "..", "..", "sql", "schema.sql");

/**
 * Stores blocks and their transactions in PostgreSQL through a pg pool
 */
export class PostgresBackend extends StorageBackend {
  public readonly name = "postgres";
  private readonly pool: Pool;
  private readonly db: NodePgDatabase;
  private readonly errorRetrier: ErrorRetrier;

  /**
   * @param url PostgreSQL connection URL
   * @param poolSize Maximum number of pooled connections
   * @param retrier Retries failed connection attempts
   */
  constructor(
    { url, poolSize }: { url: string; poolSize: number },
    retrier: Retrier
  ) {
    super();
    this.pool = new Pool({ connectionString: url, max: poolSize });
    this.db = drizzle(this.pool);
    this.errorRetrier = createErrorRetrier(retrier);

    this.pool.on("error", (error) => {
      logger.warn(`Idle database client error: ${error}`);
    });
  }

  /**
   * Builds the backend from the database section of the configuration
   */
  static fromConfig(
    db: IngestConfig["storage"]["db"],
    retrier: Retrier
  ): PostgresBackend {
    if (db.url == null) {
      throw new StorageUnavailableError("postgres", "DATABASE_URL is not set");
    }
    return new PostgresBackend({ url: db.url, poolSize: db.poolSize }, retrier);
  }

  /**
   * Waits until the database accepts queries, retrying failed attempts
   */
  public async connect(): Promise<void> {
    await this.errorRetrier.wrap(() => this.pool.query("SELECT 1"), {
      onFailedAttempt: (error, attempt) => {
        logger.error(
          `Failed to connect to database on attempt ${attempt}: ${error}`
        );
      },
      onFailedLastAttempt: (error, attempt) => {
        logger.fatal(
          `Failed to connect to database on attempt ${attempt}: ${error}. Aborting...`
        );
      },
    }).catch((error: unknown) => {
      throw new StorageUnavailableError(
        this.name,
        `Cannot connect: ${describeError(error)}`,
        error
      );
    });
    logger.info("Connected to database");
  }

  public async disconnect(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Applies sql/schema.sql
   */
  public async setup(): Promise<void> {
    const schema = await readFile(SCHEMA_PATH, "utf8");
    await this.pool.query(schema);
    logger.info("Database schema applied");
  }

  private async run<T>(description: string, query: () => Promise<T>) {
    try {
      return await query();
    } catch (error) {
      throw new StorageUnavailableError(
        this.name,
        `${description}: ${describeError(error)}`,
        error
      );
    }
  }

  public async write(record: BlockRecord): Promise<WriteOutcome> {
    return this.run(`Cannot write block ${record.height}`, () =>
      this.db.transaction(
        async (tx) => {
          const inserted = await tx
            .insert(blocks)
            .values({
              blockHeight: record.height,
              blockHash: record.hash,
              timestamp: record.timestamp,
              chainId: record.chainId,
              txCount: record.txs.length,
            })
            .onConflictDoNothing({ target: blocks.blockHeight })
            .returning({ blockHeight: blocks.blockHeight });

          if (inserted.length === 0) {
            return WriteOutcome.EXISTS;
          }

          if (record.txs.length > 0) {
            await tx
              .insert(transactions)
              .values(
                record.txs.map(({ hash, index }) => ({
                  txHash: hash,
                  blockHeight: record.height,
                  txIndex: index,
                }))
              )
              .onConflictDoNothing({ target: transactions.txHash });
          }
          return WriteOutcome.WRITTEN;
        },
        {
          isolationLevel: "read committed",
          accessMode: "read write",
        }
      )
    );
  }

  public async has(height: number): Promise<boolean> {
    const rows = await this.run(`Cannot read block ${height}`, () =>
      this.db
        .select({ blockHeight: blocks.blockHeight })
        .from(blocks)
        .where(eq(blocks.blockHeight, height))
        .limit(1)
    );
    return rows.length > 0;
  }

  public async listHeights(): Promise<number[]> {
    const rows = await this.run("Cannot list block heights", () =>
      this.db
        .select({ blockHeight: blocks.blockHeight })
        .from(blocks)
        .orderBy(asc(blocks.blockHeight))
    );
    return rows.map(({ blockHeight }) => blockHeight);
  }

  public async stats(): Promise<StorageStats> {
    const [row] = await this.run("Cannot read block stats", () =>
      this.db
        .select({
          count: count(),
          earliest: min(blocks.blockHeight),
          latest: max(blocks.blockHeight),
        })
        .from(blocks)
    );
    return row ?? { count: 0, earliest: null, latest: null };
  }

  /**
   * Gaps between stored heights at or below upperBound, computed by the database
   */
  public async detectGaps(upperBound: number): Promise<BlockRange[]> {
    const result = await this.run("Cannot detect gaps", () =>
      this.db.execute(
        sql`SELECT gap_start, gap_end FROM detect_block_gaps() WHERE gap_end < ${upperBound}`
      )
    );
    return mapAndFilterNull(result.rows, (row) => {
      const startBlockHeight = parseStringToInt(String(row.gap_start));
      const endBlockHeight = parseStringToInt(String(row.gap_end));
      return startBlockHeight == null || endBlockHeight == null
        ? null
        : { startBlockHeight, endBlockHeight };
    });
  }

  public async healthCheck(): Promise<void> {
    await this.run("Health check failed", () => this.db.execute(sql`SELECT 1`));
  }
}
