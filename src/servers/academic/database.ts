import Database from "better-sqlite3";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";

export type AcademicDatabase = Database.Database;

export const SEED_SQL_PATH = fileURLToPath(new URL("../../../data/academic.sql", import.meta.url));

const REQUIRED_TABLES = ["lecturers", "students", "courses", "transcripts"];

/**
 * Create the schema and seed rows; safe to run on an already-seeded database
 */
export function seedAcademicDatabase(db: AcademicDatabase, sqlPath: string = SEED_SQL_PATH): void {
  db.exec(readFileSync(sqlPath, "utf-8"));
}

/**
 * Open the academic database read-only.
 * ":memory:" yields a freshly seeded in-memory copy; any other path must already exist.
 */
export function openAcademicDatabase(path: string = ":memory:"): AcademicDatabase {
  if (path === ":memory:") {
    const db = new Database(":memory:");
    seedAcademicDatabase(db);
    db.pragma("query_only = ON");
    return db;
  }

  const db = new Database(path, { readonly: true, fileMustExist: true });
  const missing = missingTables(db);
  if (missing.length > 0) {
    db.close();
    throw new Error(`Academic database ${path} is missing tables: ${missing.join(", ")}`);
  }
  return db;
}

/**
 * Write a seeded database file (the one writable code path, run at setup time)
 */
export function createAcademicDatabaseFile(path: string): void {
  const db = new Database(path);
  try {
    seedAcademicDatabase(db);
  } finally {
    db.close();
  }
}

function missingTables(db: AcademicDatabase): string[] {
  const rows = db.prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'").all();
  const present = new Set(rows.map(row => row.name));
  return REQUIRED_TABLES.filter(table => !present.has(table));
}

export type CourseGrade = {
  course: string;
  grade: string;
};

/**
 * Parameterized SELECT queries over an explicitly passed connection
 */
export class AcademicRepository {
  private readonly db: AcademicDatabase;

  constructor(db: AcademicDatabase) {
    this.db = db;
  }

  studentExists(name: string): boolean {
    const row = this.db.prepare<[string], { id: number }>("SELECT id FROM students WHERE name = ?").get(name);
    return row !== undefined;
  }

  findAdvisor(studentName: string): string | undefined {
    const row = this.db
      .prepare<[string], { advisor: string }>(
        `SELECT l.name AS advisor
         FROM students s
         JOIN lecturers l ON s.advisor_id = l.id
         WHERE s.name = ?`
      )
      .get(studentName);
    return row?.advisor;
  }

  findCourses(studentName: string): CourseGrade[] {
    return this.db
      .prepare<[string], CourseGrade>(
        `SELECT c.name AS course, t.grade AS grade
         FROM students s
         JOIN transcripts t ON s.id = t.student_id
         JOIN courses c ON t.course_id = c.id
         WHERE s.name = ?
         ORDER BY c.name`
      )
      .all(studentName);
  }

  listStudents(): string[] {
    return this.db
      .prepare<[], { name: string }>("SELECT name FROM students ORDER BY name")
      .all()
      .map(row => row.name);
  }
}
