import {
  courses as coursesTable,
  assignments as assignmentsTable,
  assignmentCompletions as completionsTable,
  messageDedupe as dedupeTable,
  type Course,
  type InsertCourse,
  type Assignment,
  type InsertAssignment,
  type AssignmentPatch,
  type AssignmentWithCourse,
  type SenderHistoryEntry,
} from "@shared/schema";
import { randomUUID } from "crypto";
import { and, asc, desc, eq, gte, isNotNull, isNull, lt, notExists, or, sql as drizzleSql } from "drizzle-orm";
import { createDb, type Database } from "./db";
import { EXTRACTION_LIMITS } from "./config/constants";
import { logWarn } from "./utils/logger";

export type ActiveAssignmentQuery = {
  /** Reference instant; assignments whose deadline is before it are inactive. */
  now: Date;
  limit?: number;
  /** Per-sender to-do view: hide assignments this sender marked done. */
  excludeCompletedBy?: string;
};

export interface IStorage {
  // Courses
  listCourses(): Promise<Course[]>;

  // Assignments
  listActiveAssignments(query: ActiveAssignmentQuery): Promise<AssignmentWithCourse[]>;
  getAssignment(id: string): Promise<AssignmentWithCourse | undefined>;
  createAssignment(assignment: InsertAssignment): Promise<AssignmentWithCourse>;
  updateAssignment(id: string, patch: AssignmentPatch): Promise<AssignmentWithCourse | undefined>;
  getSenderHistory(senderId: string, limit?: number): Promise<SenderHistoryEntry[]>;

  // Completions
  markAssignmentDone(assignmentId: string, senderId: string): Promise<void>;
  getCompletedAssignmentIds(senderId: string): Promise<string[]>;
  /** Reverts the sender's most recent completion; returns the assignment it covered. */
  undoLastCompletion(senderId: string): Promise<AssignmentWithCourse | undefined>;

  // Webhook dedupe
  claimMessage(key: string): Promise<boolean>;
  pruneMessageClaims(olderThan: Date): Promise<number>;

  // Health
  ping(): Promise<void>;
}

/**
 * Courses seeded into a fresh store. Mirrors server/migrations/0000_init.sql.
 */
export const DEFAULT_COURSES: InsertCourse[] = [
  { name: "Pemrograman", aliases: ["pemrog", "prog"] },
  { name: "Struktur Data", aliases: ["strukdat", "sd"] },
  { name: "Rekayasa Perangkat Lunak", aliases: ["rpl"] },
  { name: "Organisasi dan Arsitektur Komputer", aliases: ["orkom", "oaak"] },
  { name: "Metode Kuantitatif", aliases: ["metkuan"] },
  { name: "Matematika Komputasi", aliases: ["matkom"] },
  { name: "Grafika Komputer dan Visualisasi", aliases: ["grafkom", "gkv"] },
  { name: "Desain Pengalaman Pengguna", aliases: ["ux", "uxd", "dpp", "user experience design"] },
];

function isActive(assignment: Assignment, now: Date): boolean {
  return assignment.deadline === null || assignment.deadline.getTime() >= now.getTime();
}

// Earliest deadline first, undated last
function compareDeadlines(a: Assignment, b: Assignment): number {
  if (a.deadline === null || b.deadline === null) {
    return (a.deadline === null ? 1 : 0) - (b.deadline === null ? 1 : 0);
  }
  return a.deadline.getTime() - b.deadline.getTime();
}

export class MemStorage implements IStorage {
  private courses: Map<string, Course>;
  private assignments: Map<string, Assignment>;
  private insertOrder: Map<string, number>;
  private completions: Map<string, Map<string, Date>>; // senderId -> assignment id -> completedAt
  private claims: Map<string, Date>;
  private clock: () => Date;

  constructor(options: { courses?: InsertCourse[]; clock?: () => Date } = {}) {
    this.courses = new Map();
    this.assignments = new Map();
    this.insertOrder = new Map();
    this.completions = new Map();
    this.claims = new Map();
    this.clock = options.clock ?? (() => new Date());

    (options.courses ?? DEFAULT_COURSES).forEach(({ name, aliases }) => {
      const id = randomUUID();
      this.courses.set(id, { id, name, aliases: aliases ?? [], createdAt: this.clock() });
    });
  }

  private withCourse(assignment: Assignment): AssignmentWithCourse {
    const course = assignment.courseId ? this.courses.get(assignment.courseId) : undefined;
    return { ...assignment, courseName: course?.name ?? null };
  }

  async listCourses(): Promise<Course[]> {
    return Array.from(this.courses.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  async listActiveAssignments(query: ActiveAssignmentQuery): Promise<AssignmentWithCourse[]> {
    const limit = query.limit ?? EXTRACTION_LIMITS.MAX_ACTIVE_ASSIGNMENTS;
    const done = query.excludeCompletedBy ? this.completions.get(query.excludeCompletedBy) : undefined;

    return Array.from(this.assignments.values())
      .filter((a) => isActive(a, query.now))
      .filter((a) => !done?.has(a.id))
      .sort((a, b) =>
        compareDeadlines(a, b) ||
        b.createdAt.getTime() - a.createdAt.getTime() ||
        (this.insertOrder.get(b.id) ?? 0) - (this.insertOrder.get(a.id) ?? 0)
      )
      .slice(0, limit)
      .map((a) => this.withCourse(a));
  }

  async getAssignment(id: string): Promise<AssignmentWithCourse | undefined> {
    const assignment = this.assignments.get(id);
    return assignment ? this.withCourse(assignment) : undefined;
  }

  async createAssignment(insert: InsertAssignment): Promise<AssignmentWithCourse> {
    const id = randomUUID();
    const assignment: Assignment = {
      id,
      courseId: insert.courseId ?? null,
      title: insert.title,
      description: insert.description ?? "",
      deadline: insert.deadline ?? null,
      parallelCode: insert.parallelCode ?? null,
      senderId: insert.senderId ?? null,
      messageIds: insert.messageIds ?? [],
      createdAt: this.clock(),
    };
    this.assignments.set(id, assignment);
    this.insertOrder.set(id, this.insertOrder.size);
    return this.withCourse(assignment);
  }

  async updateAssignment(id: string, patch: AssignmentPatch): Promise<AssignmentWithCourse | undefined> {
    const existing = this.assignments.get(id);
    if (!existing) return undefined;

    const updated: Assignment = {
      ...existing,
      ...(patch.courseId !== undefined && { courseId: patch.courseId }),
      ...(patch.title !== undefined && { title: patch.title }),
      ...(patch.description !== undefined && { description: patch.description }),
      ...(patch.deadline !== undefined && { deadline: patch.deadline }),
      ...(patch.parallelCode !== undefined && { parallelCode: patch.parallelCode }),
      ...(patch.messageIds !== undefined && { messageIds: patch.messageIds }),
    };
    this.assignments.set(id, updated);
    return this.withCourse(updated);
  }

  async getSenderHistory(senderId: string, limit: number = EXTRACTION_LIMITS.SENDER_HISTORY_LIMIT): Promise<SenderHistoryEntry[]> {
    const counts = new Map<string, SenderHistoryEntry>();
    this.assignments.forEach((a) => {
      if (a.senderId !== senderId || !a.parallelCode || !a.courseId) return;
      const course = this.courses.get(a.courseId);
      if (!course) return;
      const key = `${course.name}\u0000${a.parallelCode}`;
      const entry = counts.get(key) ?? { courseName: course.name, parallelCode: a.parallelCode, count: 0 };
      entry.count++;
      counts.set(key, entry);
    });
    return Array.from(counts.values())
      .sort((a, b) => b.count - a.count)
      .slice(0, limit);
  }

  async markAssignmentDone(assignmentId: string, senderId: string): Promise<void> {
    const done = this.completions.get(senderId) ?? new Map<string, Date>();
    if (!done.has(assignmentId)) done.set(assignmentId, this.clock());
    this.completions.set(senderId, done);
  }

  async getCompletedAssignmentIds(senderId: string): Promise<string[]> {
    return Array.from(this.completions.get(senderId)?.keys() ?? []);
  }

  async undoLastCompletion(senderId: string): Promise<AssignmentWithCourse | undefined> {
    const done = this.completions.get(senderId);
    if (!done) return undefined;

    // Later insertions win ties on completedAt
    let latest: { id: string; at: Date } | undefined;
    for (const [id, at] of done) {
      if (!latest || at.getTime() >= latest.at.getTime()) latest = { id, at };
    }
    if (!latest) return undefined;

    done.delete(latest.id);
    return this.getAssignment(latest.id);
  }

  async claimMessage(key: string): Promise<boolean> {
    if (this.claims.has(key)) return false;
    this.claims.set(key, this.clock());
    return true;
  }

  async pruneMessageClaims(olderThan: Date): Promise<number> {
    let removed = 0;
    this.claims.forEach((processedAt, key) => {
      if (processedAt.getTime() < olderThan.getTime()) {
        this.claims.delete(key);
        removed++;
      }
    });
    return removed;
  }

  async ping(): Promise<void> {
    return;
  }
}

export class DbStorage implements IStorage {
  private db: Database;

  constructor(databaseUrl: string) {
    this.db = createDb(databaseUrl);
  }

  private assignmentWithCourseQuery() {
    return this.db
      .select({
        id: assignmentsTable.id,
        courseId: assignmentsTable.courseId,
        title: assignmentsTable.title,
        description: assignmentsTable.description,
        deadline: assignmentsTable.deadline,
        parallelCode: assignmentsTable.parallelCode,
        senderId: assignmentsTable.senderId,
        messageIds: assignmentsTable.messageIds,
        createdAt: assignmentsTable.createdAt,
        courseName: coursesTable.name,
      })
      .from(assignmentsTable)
      .leftJoin(coursesTable, eq(assignmentsTable.courseId, coursesTable.id));
  }

  // Courses
  async listCourses(): Promise<Course[]> {
    return this.db.select().from(coursesTable).orderBy(asc(coursesTable.name));
  }

  // Assignments
  async listActiveAssignments(query: ActiveAssignmentQuery): Promise<AssignmentWithCourse[]> {
    const limit = query.limit ?? EXTRACTION_LIMITS.MAX_ACTIVE_ASSIGNMENTS;
    const active = or(isNull(assignmentsTable.deadline), gte(assignmentsTable.deadline, query.now));
    const notDone = query.excludeCompletedBy
      ? notExists(
          this.db
            .select({ id: completionsTable.assignmentId })
            .from(completionsTable)
            .where(and(
              eq(completionsTable.assignmentId, assignmentsTable.id),
              eq(completionsTable.senderId, query.excludeCompletedBy),
            ))
        )
      : undefined;

    return this.assignmentWithCourseQuery()
      .where(and(active, notDone))
      .orderBy(drizzleSql`${assignmentsTable.deadline} ASC NULLS LAST`, desc(assignmentsTable.createdAt))
      .limit(limit);
  }

  async getAssignment(id: string): Promise<AssignmentWithCourse | undefined> {
    const results = await this.assignmentWithCourseQuery()
      .where(eq(assignmentsTable.id, id))
      .limit(1);
    return results[0];
  }

  async createAssignment(insert: InsertAssignment): Promise<AssignmentWithCourse> {
    const results = await this.db
      .insert(assignmentsTable)
      .values(insert)
      .returning({ id: assignmentsTable.id });
    const created = await this.getAssignment(results[0].id);
    if (!created) {
      throw new Error(`[Storage] Assignment ${results[0].id} vanished after insert`);
    }
    return created;
  }

  async updateAssignment(id: string, patch: AssignmentPatch): Promise<AssignmentWithCourse | undefined> {
    if (Object.keys(patch).length === 0) {
      return this.getAssignment(id);
    }
    const results = await this.db
      .update(assignmentsTable)
      .set(patch)
      .where(eq(assignmentsTable.id, id))
      .returning({ id: assignmentsTable.id });
    if (results.length === 0) return undefined;
    return this.getAssignment(id);
  }

  async getSenderHistory(senderId: string, limit: number = EXTRACTION_LIMITS.SENDER_HISTORY_LIMIT): Promise<SenderHistoryEntry[]> {
    const rows = await this.db
      .select({
        courseName: coursesTable.name,
        parallelCode: assignmentsTable.parallelCode,
        count: drizzleSql<number>`count(*)::int`,
      })
      .from(assignmentsTable)
      .innerJoin(coursesTable, eq(assignmentsTable.courseId, coursesTable.id))
      .where(and(eq(assignmentsTable.senderId, senderId), isNotNull(assignmentsTable.parallelCode)))
      .groupBy(coursesTable.name, assignmentsTable.parallelCode)
      .orderBy(drizzleSql`count(*) DESC`)
      .limit(limit);

    return rows.flatMap((r) => (r.parallelCode ? [{ courseName: r.courseName, parallelCode: r.parallelCode, count: r.count }] : []));
  }

  // Completions
  async markAssignmentDone(assignmentId: string, senderId: string): Promise<void> {
    await this.db
      .insert(completionsTable)
      .values({ assignmentId, senderId })
      .onConflictDoNothing();
  }

  async getCompletedAssignmentIds(senderId: string): Promise<string[]> {
    const rows = await this.db
      .select({ id: completionsTable.assignmentId })
      .from(completionsTable)
      .where(eq(completionsTable.senderId, senderId));
    return rows.map((r) => r.id);
  }

  async undoLastCompletion(senderId: string): Promise<AssignmentWithCourse | undefined> {
    const [latest] = await this.db
      .select({ assignmentId: completionsTable.assignmentId })
      .from(completionsTable)
      .where(eq(completionsTable.senderId, senderId))
      .orderBy(desc(completionsTable.completedAt))
      .limit(1);
    if (!latest) return undefined;

    await this.db
      .delete(completionsTable)
      .where(and(
        eq(completionsTable.assignmentId, latest.assignmentId),
        eq(completionsTable.senderId, senderId),
      ));
    return this.getAssignment(latest.assignmentId);
  }

  // Webhook dedupe: insert-on-conflict is the atomic check
  async claimMessage(key: string): Promise<boolean> {
    const rows = await this.db
      .insert(dedupeTable)
      .values({ id: key })
      .onConflictDoNothing()
      .returning({ id: dedupeTable.id });
    return rows.length > 0;
  }

  async pruneMessageClaims(olderThan: Date): Promise<number> {
    const rows = await this.db
      .delete(dedupeTable)
      .where(lt(dedupeTable.processedAt, olderThan))
      .returning({ id: dedupeTable.id });
    return rows.length;
  }

  async ping(): Promise<void> {
    await this.db.execute(drizzleSql`SELECT 1`);
  }
}

export function createStorage(databaseUrl: string | undefined): IStorage {
  if (!databaseUrl) {
    logWarn("[Storage] DATABASE_URL not set, using in-memory storage (data is lost on restart)");
    return new MemStorage();
  }
  return new DbStorage(databaseUrl);
}
