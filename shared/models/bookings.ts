import { sql } from "drizzle-orm";
import { index, uniqueIndex, pgTable, serial, integer, varchar, text, timestamp } from "drizzle-orm/pg-core";
import type { BookingStatus } from "../constants/statuses";
import { users } from "./users";
import { services, products } from "./catalog";

export const bookings = pgTable("bookings", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").notNull().references(() => users.id),
  serviceId: integer("service_id").notNull().references(() => services.id),
  scheduledAt: timestamp("scheduled_at", { withTimezone: true }).notNull(),
  durationMinutes: integer("duration_minutes").notNull(),
  status: varchar("status", { length: 20 }).$type<BookingStatus>().notNull().default("pending"),
  // Price snapshots, copied at creation and never recomputed
  servicePriceCents: integer("service_price_cents").notNull(),
  productsTotalCents: integer("products_total_cents").notNull().default(0),
  totalPriceCents: integer("total_price_cents").notNull(),
  specialInstructions: text("special_instructions"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("bookings_user_idx").on(table.userId),
  uniqueIndex("bookings_active_slot_idx")
    .on(table.serviceId, table.scheduledAt)
    .where(sql`${table.status} <> 'cancelled'`),
]);

export const bookingProducts = pgTable("booking_products", {
  id: serial("id").primaryKey(),
  bookingId: integer("booking_id").notNull().references(() => bookings.id),
  productId: integer("product_id").notNull().references(() => products.id),
  productName: varchar("product_name", { length: 100 }).notNull(),
  unitPriceCents: integer("unit_price_cents").notNull(),
  quantity: integer("quantity").notNull().default(1),
}, (table) => [
  index("booking_products_booking_idx").on(table.bookingId),
]);

export type Booking = typeof bookings.$inferSelect;
export type BookingProduct = typeof bookingProducts.$inferSelect;
