import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "../../errors";
import { log } from "../../logging";
import { SERVER_VERSION, textResult } from "../shared";
import { AcademicRepository, type AcademicDatabase } from "./database";

function notFound(studentName: string): string {
  return `Student '${studentName}' not found in the database`;
}

/**
 * Run a lookup; database failures become a text answer so the agent can report them
 */
function answer(tool: string, lookup: () => string): ReturnType<typeof textResult> {
  try {
    return textResult(lookup());
  } catch (error) {
    log("error", `[academic] ${tool} failed: ${errorMessage(error)}`);
    return textResult(`Error while running ${tool}: ${errorMessage(error)}`);
  }
}

/**
 * Academic lookups over a database connection owned by the caller
 */
export function createAcademicServer(db: AcademicDatabase): McpServer {
  const repo = new AcademicRepository(db);
  const server = new McpServer({ name: "academic", version: SERVER_VERSION });
  const studentName = z.string().describe("Full name of the student (case-sensitive)");

  server.registerTool(
    "get_advisor",
    {
      title: "Academic advisor",
      description: "Find the academic advisor (dosen pembimbing) of a student.",
      inputSchema: { student_name: studentName },
    },
    async ({ student_name }) =>
      answer("get_advisor", () => {
        const advisor = repo.findAdvisor(student_name);
        return advisor ? `Advisor of ${student_name}: ${advisor}` : notFound(student_name);
      }),
  );

  server.registerTool(
    "get_student_courses",
    {
      title: "Student courses",
      description: "List the courses a student has taken, with letter grades.",
      inputSchema: { student_name: studentName },
    },
    async ({ student_name }) =>
      answer("get_student_courses", () => {
        if (!repo.studentExists(student_name)) {
          return notFound(student_name);
        }
        const courses = repo.findCourses(student_name);
        if (courses.length === 0) {
          return `${student_name} has no recorded courses`;
        }
        return `Courses of ${student_name}: ${courses.map(c => `${c.course} (${c.grade})`).join(", ")}`;
      }),
  );

  server.registerTool(
    "list_students",
    {
      title: "Registered students",
      description: "List the names of all registered students.",
    },
    async () =>
      answer("list_students", () => {
        const students = repo.listStudents();
        return students.length > 0 ? `Registered students: ${students.join(", ")}` : "No students in the database";
      }),
  );

  return server;
}
