import { sql } from "drizzle-orm";
import { pgTable, serial, varchar, text, timestamp, uniqueIndex } from "drizzle-orm/pg-core";
import { z } from "zod";

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  username: varchar("username", { length: 80 }).notNull(),
  email: varchar("email", { length: 120 }).notNull(),
  passwordHash: varchar("password_hash").notNull(),
  fullName: varchar("full_name", { length: 200 }).notNull(),
  phone: varchar("phone", { length: 20 }),
  address: text("address"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex("users_email_idx").on(sql`lower(${table.email})`),
  uniqueIndex("users_username_idx").on(table.username),
]);

export type UserRow = typeof users.$inferSelect;

export const registerSchema = z.object({
  username: z.string().trim().min(3, 'username must be at least 3 characters').max(80),
  email: z.string().trim().toLowerCase().email('email must be a valid address').max(120),
  password: z.string().min(8, 'password must be at least 8 characters').max(200),
  fullName: z.string().trim().min(1, 'fullName is required').max(200),
  phone: z.string().trim().max(20).optional(),
  address: z.string().trim().max(500).optional(),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(1),
});

export const profileUpdateSchema = z.object({
  fullName: z.string().trim().min(1).max(200).optional(),
  phone: z.string().trim().max(20).optional(),
  address: z.string().trim().max(500).optional(),
});

export type ProfileUpdate = z.infer<typeof profileUpdateSchema>;

// Public shape; never carries the password hash
export interface UserProfile {
  id: number;
  username: string;
  email: string;
  fullName: string;
  phone: string | null;
  address: string | null;
  createdAt: Date;
}
