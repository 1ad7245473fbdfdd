import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, primaryKey, index, check } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const courses = pgTable("courses", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull().unique(),
  aliases: text("aliases").array().notNull().default(sql`'{}'::text[]`),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export const assignments = pgTable("assignments", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  courseId: varchar("course_id").references(() => courses.id, { onDelete: "set null" }),
  title: text("title").notNull(),
  description: text("description").notNull().default(""),
  deadline: timestamp("deadline", { withTimezone: true }), // stored in UTC
  parallelCode: text("parallel_code"), // lowercase: k1..r4 or "all"
  senderId: text("sender_id"),
  messageIds: text("message_ids").array().notNull().default(sql`'{}'::text[]`),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("assignments_created_at_idx").on(table.createdAt),
  index("assignments_sender_idx").on(table.senderId),
  check("assignments_parallel_lowercase", sql`${table.parallelCode} = lower(${table.parallelCode})`),
]);

export const assignmentCompletions = pgTable("assignment_completions", {
  assignmentId: varchar("assignment_id").notNull().references(() => assignments.id, { onDelete: "cascade" }),
  senderId: text("sender_id").notNull(),
  completedAt: timestamp("completed_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  primaryKey({ columns: [table.assignmentId, table.senderId] }),
]);

// Webhook deliveries already handled (WAHA retries and echoes)
export const messageDedupe = pgTable("message_dedupe", {
  id: text("id").primaryKey(),
  processedAt: timestamp("processed_at", { withTimezone: true }).defaultNow().notNull(),
});

export const insertCourseSchema = createInsertSchema(courses).omit({
  id: true,
  createdAt: true,
});

export const insertAssignmentSchema = createInsertSchema(assignments).omit({
  id: true,
  createdAt: true,
});

export const updateAssignmentSchema = insertAssignmentSchema
  .pick({
    courseId: true,
    title: true,
    description: true,
    deadline: true,
    parallelCode: true,
    messageIds: true,
  })
  .partial();

export type InsertCourse = z.infer<typeof insertCourseSchema>;
export type Course = typeof courses.$inferSelect;

export type InsertAssignment = z.infer<typeof insertAssignmentSchema>;
export type Assignment = typeof assignments.$inferSelect;
export type AssignmentPatch = z.infer<typeof updateAssignmentSchema>;

export type AssignmentCompletion = typeof assignmentCompletions.$inferSelect;

export type AssignmentWithCourse = Assignment & {
  courseName: string | null;
};

export type SenderHistoryEntry = {
  courseName: string;
  parallelCode: string;
  count: number;
};
