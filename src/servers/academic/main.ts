import { runServerMain, serveStdio } from "../shared";
import { openAcademicDatabase } from "./database";
import { createAcademicServer } from "./server";

// TOOLRAG_ACADEMIC_DB selects a database file; unset means the seeded in-memory copy
runServerMain("academic", async () => {
  const db = openAcademicDatabase(process.env.TOOLRAG_ACADEMIC_DB || ":memory:");
  await serveStdio("academic", createAcademicServer(db), () => db.close());
});
