/**
 * Integration tests for MCP tools
 * Tests the full flow of tool execution against a real store
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openStore } from "@strongbox/sdk";
import { createTempStoreRoot, removeDir } from "@strongbox/testkit";
import { createDispatcher, type Dispatcher } from "../../dispatcher.js";
import { StoreService } from "../../service/store-service.js";
import { callTool, listTools, toolDefinitions } from "../../tools.js";
import { OPERATIONS } from "../../schemas.js";

let dataDir: string;
let service: StoreService;
let dispatcher: Dispatcher;

beforeEach(async () => {
  dataDir = await createTempStoreRoot();
  service = new StoreService(await openStore({ dataDir }), { autosave: true });
  dispatcher = createDispatcher(service);
});

afterEach(async () => {
  await service.close();
  await removeDir(dataDir);
});

function textOf(result: Awaited<ReturnType<typeof callTool>>): unknown {
  const item = result?.content[0];
  if (!item || item.type !== "text" || typeof item.text !== "string") {
    throw new Error("expected a text content item");
  }
  return JSON.parse(item.text);
}

describe("Tool definitions", () => {
  it("should define one tool per operation", () => {
    expect(toolDefinitions.map((tool) => tool.name).sort()).toEqual([...OPERATIONS].sort());
  });

  it("should only list read tools in read-only mode", () => {
    expect(listTools(true).map((tool) => tool.name)).toEqual(["find", "find_all", "list_tables", "count"]);
    expect(listTools(false)).toHaveLength(OPERATIONS.length);
  });
});

describe("Tool integration tests", () => {
  it("should insert and find through tool calls", async () => {
    const inserted = await callTool(dispatcher, "insert", { table: "tasks", data: { title: "Test" } });

    expect(inserted?.isError).toBe(false);
    const body = textOf(inserted);
    expect(body).toMatchObject({ ok: true });

    const id = typeof body === "object" && body !== null && "data" in body ? body.data : undefined;
    const idValue = typeof id === "object" && id !== null && "id" in id ? id.id : undefined;

    const found = await callTool(dispatcher, "find", { table: "tasks", id: idValue });
    expect(textOf(found)).toMatchObject({ ok: true, data: { id: idValue, data: { title: "Test" } } });
  });

  it("should flag failures with isError", async () => {
    const result = await callTool(dispatcher, "count", { table: "missing" });

    expect(result?.isError).toBe(true);
    expect(textOf(result)).toEqual({
      ok: false,
      error: { code: "E_TABLE_NOT_FOUND", message: "Table not found: missing" },
    });
  });

  it("should ignore an op smuggled in the arguments", async () => {
    const result = await callTool(dispatcher, "list_tables", { op: "drop_table", table: "x" });

    expect(textOf(result)).toEqual({ ok: true, data: [] });
  });

  it("should return undefined for an unknown tool", async () => {
    expect(await callTool(dispatcher, "get_doc", {})).toBeUndefined();
  });

  it("should persist with autosave", async () => {
    await callTool(dispatcher, "insert", { table: "tasks", data: { title: "Saved" } });

    const reopened = await openStore({ dataDir });
    expect(reopened.count("tasks")).toBe(1);
    await reopened.close();
  });
});
