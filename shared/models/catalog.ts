import { pgTable, serial, varchar, text, integer, boolean, numeric, jsonb } from "drizzle-orm/pg-core";

// Lawn services offered by the crews
export const services = pgTable("services", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 100 }).notNull(),
  description: text("description"),
  category: varchar("category", { length: 50 }).notNull(),
  priceCents: integer("price_cents").notNull(),
  durationMinutes: integer("duration_minutes").notNull().default(60),
  isActive: boolean("is_active").notNull().default(true),
});

// Retail products, offered as booking add-ons
export const products = pgTable("products", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 100 }).notNull(),
  description: text("description"),
  priceCents: integer("price_cents").notNull(),
  size: varchar("size", { length: 50 }),
  category: varchar("category", { length: 50 }).notNull(),
  rating: numeric("rating", { precision: 2, scale: 1 }),
  reviewCount: integer("review_count").notNull().default(0),
  features: jsonb("features").$type<string[]>().notNull().default([]),
  isActive: boolean("is_active").notNull().default(true),
});

export type Service = typeof services.$inferSelect;
export type Product = typeof products.$inferSelect;
