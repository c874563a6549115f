import {
  bigint,
  integer,
  pgTable,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";

/**
 * Drizzle view of the tables created by sql/schema.sql
 */
export const blocks = pgTable("blocks", {
  blockHeight: bigint("block_height", { mode: "number" }).primaryKey(),
  blockHash: varchar("block_hash", { length: 128 }).notNull().unique(),
  timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
  chainId: varchar("chain_id", { length: 64 }).notNull(),
  txCount: integer("tx_count").notNull().default(0),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const transactions = pgTable("transactions", {
  txHash: varchar("tx_hash", { length: 128 }).primaryKey(),
  blockHeight: bigint("block_height", { mode: "number" })
    .notNull()
    .references(() => blocks.blockHeight, { onDelete: "cascade" }),
  txIndex: integer("tx_index").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

