import type { InProcessServiceConfig } from "../config";
import type { HostedServer } from "../mcp-client/inprocess";
import { openAcademicDatabase } from "./academic/database";
import { createAcademicServer } from "./academic/server";
import { createUtilityServer } from "./utility/server";

export { createUtilityServer, formatLocalTime, runCalculation } from "./utility/server";
export { createAcademicServer } from "./academic/server";
export {
  AcademicRepository,
  createAcademicDatabaseFile,
  openAcademicDatabase,
  seedAcademicDatabase,
  type AcademicDatabase,
} from "./academic/database";

/**
 * Instantiate a bundled server for the in-process transport.
 * The academic server gets its own connection, closed with the session.
 */
export function createBundledServer(config: InProcessServiceConfig): HostedServer {
  switch (config.server) {
    case "utility":
      return { server: createUtilityServer() };
    case "academic": {
      const db = openAcademicDatabase(config.database ?? ":memory:");
      return { server: createAcademicServer(db), dispose: () => { db.close(); } };
    }
  }
}
