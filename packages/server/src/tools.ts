/**
 * MCP tool definitions for the store
 * One tool per dispatcher operation; every result carries the JSON response envelope as text
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import type { Dispatcher } from "./dispatcher.js";
import { OPERATIONS, READ_ONLY_OPERATIONS, type Operation } from "./schemas.js";

const tableProperty = {
  type: "string",
  description: "Table name (letters, digits, '_' and '-'; at most 64 characters)",
};

const idProperty = {
  type: "string",
  description: "Record ID",
};

const dataProperty = {
  type: "object",
  description:
    "Record fields as a JSON object. Integers become Int, other numbers Float; {\"$bytes\": \"<base64>\"} becomes Bytes",
};

/**
 * Tool definitions for the MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "insert",
    description: "Insert a new record into a table (the table is created if missing); returns its generated id",
    inputSchema: {
      type: "object",
      properties: { table: tableProperty, data: dataProperty },
      required: ["table", "data"],
    },
  },
  {
    name: "find",
    description: "Retrieve a record by table and ID (data is null when absent)",
    inputSchema: {
      type: "object",
      properties: { table: tableProperty, id: idProperty },
      required: ["table", "id"],
    },
  },
  {
    name: "find_all",
    description: "List the records of a table, optionally keeping only those whose fields equal the given values",
    inputSchema: {
      type: "object",
      properties: {
        table: tableProperty,
        where: {
          type: "object",
          description: "Equality filter: field name -> expected JSON value",
        },
      },
      required: ["table"],
    },
  },
  {
    name: "update",
    description: "Replace all fields of an existing record",
    inputSchema: {
      type: "object",
      properties: { table: tableProperty, id: idProperty, data: dataProperty },
      required: ["table", "id", "data"],
    },
  },
  {
    name: "delete",
    description: "Delete a record (fails if it does not exist)",
    inputSchema: {
      type: "object",
      properties: { table: tableProperty, id: idProperty },
      required: ["table", "id"],
    },
  },
  {
    name: "list_tables",
    description: "List table names, sorted",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "count",
    description: "Count the records in a table",
    inputSchema: {
      type: "object",
      properties: { table: tableProperty },
      required: ["table"],
    },
  },
  {
    name: "create_table",
    description: "Create an empty table (idempotent)",
    inputSchema: {
      type: "object",
      properties: { table: tableProperty },
      required: ["table"],
    },
  },
  {
    name: "drop_table",
    description: "Remove a table and its file (idempotent)",
    inputSchema: {
      type: "object",
      properties: { table: tableProperty },
      required: ["table"],
    },
  },
  {
    name: "save",
    description: "Write every changed table to disk",
    inputSchema: { type: "object", properties: {} },
  },
];

function isOperation(name: string): name is Operation {
  return OPERATIONS.some((op) => op === name);
}

/**
 * Tools visible to clients, honoring read-only mode
 */
export function listTools(readOnly: boolean): Tool[] {
  return readOnly
    ? toolDefinitions.filter((tool) => isOperation(tool.name) && READ_ONLY_OPERATIONS.has(tool.name))
    : toolDefinitions;
}

/**
 * Execute a tool call through the dispatcher
 *
 * Returns undefined for an unknown tool name so the transport can answer
 * with its own "method not found" error.
 */
export async function callTool(
  dispatcher: Dispatcher,
  name: string,
  args: Record<string, unknown> = {}
): Promise<CallToolResult | undefined> {
  if (!isOperation(name)) {
    return undefined;
  }

  const response = await dispatcher.dispatch({ ...args, op: name });

  return {
    content: [{ type: "text", text: JSON.stringify(response) }],
    isError: !response.ok,
  };
}
