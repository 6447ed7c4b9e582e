import { test, expect, describe, afterEach } from "vitest";
import type { ServiceConfig } from "../../src/config";
import { TransportError } from "../../src/errors";
import { InProcessMCPClient } from "../../src/mcp-client/inprocess";
import { SessionRegistry } from "../../src/mcp-client/registry";
import { resultText } from "../../src/mcp-client/types";
import { createAcademicServer, createUtilityServer, openAcademicDatabase } from "../../src/servers";

/**
 * Real bundled servers behind the in-memory transport: no processes, no network
 */
const SERVICES: ServiceConfig[] = [
  { name: "utility", transport: "inprocess", server: "utility" },
  { name: "academic", transport: "inprocess", server: "academic" },
];

describe("InProcessMCPClient", () => {
  const clients: InProcessMCPClient[] = [];

  afterEach(async () => {
    await Promise.all(clients.splice(0).map(c => c.close()));
  });

  test("lists and calls the utility tools", async () => {
    const client = new InProcessMCPClient("utility", () => ({
      server: createUtilityServer({ now: () => new Date(2024, 0, 5, 7, 8, 9) }),
    }));
    clients.push(client);
    await client.connect();

    const tools = await client.listTools();
    const time = await client.callTool("get_time", {});
    const product = await client.callTool("calculate", { expression: "10 * 5" });

    expect(tools.map(t => t.name)).toEqual(["get_time", "calculate"]);
    expect(client.getCachedTools()).toBe(tools);
    expect(time).toEqual({ content: [{ type: "text", text: "2024-01-05 07:08:09" }], isError: false });
    expect(resultText(product)).toBe("50");
  });

  test("close disposes the hosted server's resources", async () => {
    const db = openAcademicDatabase();
    let disposed = 0;
    const client = new InProcessMCPClient("academic", () => ({
      server: createAcademicServer(db),
      dispose: () => {
        disposed++;
        db.close();
      },
    }));
    await client.connect();

    expect((await client.listTools()).map(t => t.name)).toEqual(["get_advisor", "get_student_courses", "list_students"]);

    await client.close();
    await client.close();

    expect(disposed).toBe(1);
    expect(db.open).toBe(false);
    expect(client.getCachedTools()).toBeNull();
  });
});

describe("SessionRegistry over bundled servers", () => {
  let registry: SessionRegistry | undefined;

  afterEach(async () => {
    await registry?.disconnectAll();
    registry = undefined;
  });

  async function connect(): Promise<SessionRegistry> {
    registry = new SessionRegistry({ connectionConfig: { retryAttempts: 0 } });
    await registry.connectAll(SERVICES);
    return registry;
  }

  test("one flat table across both services", async () => {
    const reg = await connect();

    expect(reg.getToolNames()).toEqual(["get_time", "calculate", "get_advisor", "get_student_courses", "list_students"]);
    expect(reg.getCollisions()).toEqual([]);
    expect(reg.getTool("get_advisor")?.required).toEqual(["student_name"]);
    expect(reg.getTool("get_time")?.required).toEqual([]);
  });

  test("academic lookups", async () => {
    const reg = await connect();

    expect(await reg.invoke("get_advisor", { student_name: "Agus Setiawan" })).toBe(
      "Advisor of Agus Setiawan: Dr. Budi Santoso"
    );
    expect(await reg.invoke("get_student_courses", { student_name: "Rini Wijaya" })).toBe(
      "Courses of Rini Wijaya: Kecerdasan Buatan (A), Pemrograman Web (A)"
    );
    expect(await reg.invoke("list_students", {})).toBe("Registered students: Agus Setiawan, Rini Wijaya");
    expect(await reg.invoke("get_advisor", { student_name: "Budi" })).toBe("Student 'Budi' not found in the database");
  });

  test("calculator failures come back as text", async () => {
    const reg = await connect();

    expect(await reg.invoke("calculate", { expression: "2 * (3 + 4)" })).toBe("14");
    expect(await reg.invoke("calculate", { expression: "1/0" })).toBe("Error: Division by zero");
  });

  test("arguments the server rejects surface as a transport error", async () => {
    const reg = await connect();

    await expect(reg.invoke("get_advisor", {})).rejects.toBeInstanceOf(TransportError);
  });

  test("invokeQualified reaches a tool by service and name", async () => {
    const reg = await connect();

    expect(await reg.invokeQualified("academic", "list_students", {})).toBe(
      "Registered students: Agus Setiawan, Rini Wijaya"
    );
  });
});
