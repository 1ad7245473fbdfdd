/**
 * Unit Tests: MemStorage
 *
 * The in-memory store backs local runs and every other test, so its
 * ordering and filtering must match what DbStorage queries for.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MemStorage, createStorage } from "../storage";
import { SENDER } from "./helpers/factories";

let current = new Date("2026-01-19T03:00:00Z");
const clock = () => current;

function advanceMinutes(minutes: number): void {
  current = new Date(current.getTime() + minutes * 60_000);
}

describe("MemStorage", () => {
  let storage: MemStorage;
  let courseIds: Map<string, string>;

  beforeEach(async () => {
    current = new Date("2026-01-19T03:00:00Z");
    storage = new MemStorage({ clock });
    courseIds = new Map((await storage.listCourses()).map((c) => [c.name, c.id]));
  });

  it("seeds the default courses sorted by name", async () => {
    const names = (await storage.listCourses()).map((c) => c.name);
    expect(names).toHaveLength(8);
    expect(names[0]).toBe("Desain Pengalaman Pengguna");
    expect(names[7]).toBe("Struktur Data");
  });

  it("fills defaults on create", async () => {
    const created = await storage.createAssignment({ title: "LKP 14" });
    expect(created).toMatchObject({
      title: "LKP 14",
      description: "",
      deadline: null,
      parallelCode: null,
      courseId: null,
      courseName: null,
      messageIds: [],
      createdAt: current,
    });
    expect(await storage.getAssignment(created.id)).toEqual(created);
  });

  it("lists active assignments by deadline with undated ones last", async () => {
    const undatedOld = await storage.createAssignment({ title: "LKP 13" });
    advanceMinutes(5);
    const late = await storage.createAssignment({ title: "LKP 15", deadline: new Date("2026-01-25T16:59:00Z") });
    const soon = await storage.createAssignment({ title: "LKP 14", deadline: current });
    const undatedNew = await storage.createAssignment({ title: "LKP 16" });
    await storage.createAssignment({ title: "Kuis 1", deadline: new Date("2026-01-18T16:59:00Z") });

    const active = await storage.listActiveAssignments({ now: current });
    expect(active.map((a) => a.id)).toEqual([soon.id, late.id, undatedNew.id, undatedOld.id]);

    const limited = await storage.listActiveAssignments({ now: current, limit: 1 });
    expect(limited.map((a) => a.title)).toEqual(["LKP 14"]);
  });

  it("patches only the given fields and resolves the course name", async () => {
    const created = await storage.createAssignment({ title: "LKP 14", description: "AVL" });
    const updated = await storage.updateAssignment(created.id, {
      courseId: courseIds.get("Struktur Data"),
      parallelCode: "k2",
    });

    expect(updated).toMatchObject({ title: "LKP 14", description: "AVL", parallelCode: "k2", courseName: "Struktur Data" });
    expect(await storage.updateAssignment("missing", { title: "x" })).toBeUndefined();
  });

  it("counts a sender's course and parallel pairs", async () => {
    const sd = courseIds.get("Struktur Data");
    const prog = courseIds.get("Pemrograman");
    await storage.createAssignment({ title: "A", courseId: sd, parallelCode: "k2", senderId: SENDER });
    await storage.createAssignment({ title: "B", courseId: sd, parallelCode: "k2", senderId: SENDER });
    await storage.createAssignment({ title: "C", courseId: prog, parallelCode: "k1", senderId: SENDER });
    await storage.createAssignment({ title: "D", courseId: prog, parallelCode: null, senderId: SENDER });
    await storage.createAssignment({ title: "E", courseId: prog, parallelCode: "k1", senderId: "someone-else" });

    expect(await storage.getSenderHistory(SENDER)).toEqual([
      { courseName: "Struktur Data", parallelCode: "k2", count: 2 },
      { courseName: "Pemrograman", parallelCode: "k1", count: 1 },
    ]);
    expect(await storage.getSenderHistory(SENDER, 1)).toHaveLength(1);
  });

  it("tracks completions per sender", async () => {
    const a = await storage.createAssignment({ title: "LKP 14" });
    await storage.createAssignment({ title: "LKP 15" });
    await storage.markAssignmentDone(a.id, SENDER);

    expect(await storage.getCompletedAssignmentIds(SENDER)).toEqual([a.id]);
    expect((await storage.listActiveAssignments({ now: current, excludeCompletedBy: SENDER })).map((x) => x.title)).toEqual([
      "LKP 15",
    ]);
    expect(await storage.listActiveAssignments({ now: current, excludeCompletedBy: "someone-else" })).toHaveLength(2);
  });

  it("undoes the most recent completion first", async () => {
    const a = await storage.createAssignment({ title: "LKP 14" });
    const b = await storage.createAssignment({ title: "LKP 15" });
    await storage.markAssignmentDone(a.id, SENDER);
    advanceMinutes(1);
    await storage.markAssignmentDone(b.id, SENDER);

    expect((await storage.undoLastCompletion(SENDER))?.id).toBe(b.id);
    expect(await storage.getCompletedAssignmentIds(SENDER)).toEqual([a.id]);
    expect((await storage.undoLastCompletion(SENDER))?.id).toBe(a.id);
    expect(await storage.undoLastCompletion(SENDER)).toBeUndefined();
    expect(await storage.undoLastCompletion("someone-else")).toBeUndefined();
  });

  it("claims each message key once and prunes old claims", async () => {
    expect(await storage.claimMessage("k1")).toBe(true);
    expect(await storage.claimMessage("k1")).toBe(false);

    advanceMinutes(90);
    expect(await storage.claimMessage("k2")).toBe(true);

    const cutoff = new Date(current.getTime() - 60 * 60_000);
    expect(await storage.pruneMessageClaims(cutoff)).toBe(1);
    expect(await storage.claimMessage("k1")).toBe(true);
    expect(await storage.claimMessage("k2")).toBe(false);
  });
});

describe("createStorage", () => {
  it("falls back to memory without a database url", () => {
    expect(createStorage(undefined)).toBeInstanceOf(MemStorage);
  });
});
