import { index, pgTable, serial, integer, varchar, timestamp } from "drizzle-orm/pg-core";
import type { PointReason } from "../constants/rewards";
import { users } from "./users";
import { bookings } from "./bookings";

// Append-only seeds ledger. Rows are never updated or deleted; corrections
// are new offsetting rows.
export const pointTransactions = pgTable("point_transactions", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").notNull().references(() => users.id),
  amount: integer("amount").notNull(),
  reason: varchar("reason", { length: 40 }).$type<PointReason>().notNull(),
  bookingId: integer("booking_id").references(() => bookings.id),
  redemptionOptionId: varchar("redemption_option_id", { length: 40 }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("point_transactions_user_idx").on(table.userId),
  index("point_transactions_booking_idx").on(table.bookingId, table.reason),
]);

export type PointTransaction = typeof pointTransactions.$inferSelect;
