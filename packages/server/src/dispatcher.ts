/**
 * Transport-independent request router over one shared store
 *
 * `dispatch` never throws: every failure becomes `{ ok: false, error }`.
 */

import { z } from "zod";
import {
  StrongboxError,
  fieldsFromJson,
  recordToJson,
  valueEquals,
  valueFromJson,
  type RecordPredicate,
  type Value,
} from "@strongbox/sdk";
import { READ_ONLY_OPERATIONS, RequestSchema, type Request, type Response } from "./schemas.js";
import type { StoreService } from "./service/store-service.js";
import { logger } from "./observability/logger.js";
import { recordDispatch } from "./observability/metrics.js";

export const E_INVALID_REQUEST = "E_INVALID_REQUEST";
export const E_READ_ONLY = "E_READ_ONLY";
export const E_INTERNAL = "E_INTERNAL";

export interface DispatcherOptions {
  /** Reject every operation that would change the store */
  readOnly?: boolean;
}

export interface Dispatcher {
  readonly readOnly: boolean;
  dispatch(request: unknown): Promise<Response>;
}

class RequestError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "RequestError";
  }
}

/**
 * Map any failure to a response error body
 */
export function toErrorBody(error: unknown): { code: string; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: E_INVALID_REQUEST,
      message: `Validation error: ${error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join(", ")}`,
    };
  }

  if (error instanceof StrongboxError || error instanceof RequestError) {
    return { code: error.code, message: error.message };
  }

  if (error instanceof Error) {
    return { code: E_INTERNAL, message: error.message };
  }

  return { code: E_INTERNAL, message: String(error) };
}

function equalityFilter(where: Record<string, unknown>): RecordPredicate {
  const expected: Array<[string, Value]> = Object.entries(where).map(([field, json]) => [
    field,
    valueFromJson(json),
  ]);

  return (record) =>
    expected.every(([field, value]) => {
      const actual = record.data.get(field);
      return actual !== undefined && valueEquals(actual, value);
    });
}

async function execute(service: StoreService, request: Request): Promise<Response> {
  switch (request.op) {
    case "insert": {
      const { table } = request;
      const data = fieldsFromJson(request.data);
      const id = await service.write(table, (store) => store.insert(table, data));
      return { ok: true, data: { id }, message: `Inserted ${table}/${id}` };
    }

    case "find": {
      const { table, id } = request;
      const record = await service.read((store) => store.findById(table, id));
      return record
        ? { ok: true, data: recordToJson(record) }
        : { ok: true, data: null, message: `Record ${table}/${id} not found` };
    }

    case "find_all": {
      const { table, where } = request;
      const predicate = where ? equalityFilter(where) : undefined;
      const records = await service.read((store) =>
        predicate ? store.findWhere(table, predicate) : store.findAll(table)
      );
      return { ok: true, data: records.map(recordToJson) };
    }

    case "update": {
      const { table, id } = request;
      const data = fieldsFromJson(request.data);
      await service.write(table, (store) => store.update(table, id, data));
      return { ok: true, message: `Updated ${table}/${id}` };
    }

    case "delete": {
      const { table, id } = request;
      await service.write(table, (store) => store.delete(table, id));
      return { ok: true, message: `Deleted ${table}/${id}` };
    }

    case "list_tables":
      return { ok: true, data: await service.read((store) => store.listTables()) };

    case "count": {
      const { table } = request;
      return { ok: true, data: await service.read((store) => store.count(table)) };
    }

    case "create_table": {
      const { table } = request;
      await service.write(table, (store) => store.createTable(table));
      return { ok: true, message: `Created table ${table}` };
    }

    case "drop_table": {
      const { table } = request;
      await service.write(table, (store) => store.dropTable(table));
      return { ok: true, message: `Dropped table ${table}` };
    }

    case "save":
      await service.save();
      return { ok: true, message: "Saved" };
  }
}

function describeOp(request: unknown): { op: string; table?: string } {
  if (typeof request !== "object" || request === null) return { op: "unknown" };
  const op = "op" in request && typeof request.op === "string" ? request.op : "unknown";
  const table = "table" in request && typeof request.table === "string" ? request.table : undefined;
  return { op, table };
}

export function createDispatcher(service: StoreService, options: DispatcherOptions = {}): Dispatcher {
  const readOnly = options.readOnly ?? false;

  return {
    readOnly,

    async dispatch(raw: unknown): Promise<Response> {
      const startTime = Date.now();
      const { op, table } = describeOp(raw);

      let response: Response;
      try {
        const request = RequestSchema.parse(raw);
        if (readOnly && !READ_ONLY_OPERATIONS.has(request.op)) {
          throw new RequestError(E_READ_ONLY, `Operation '${request.op}' not available in read-only mode`);
        }
        response = await execute(service, request);
      } catch (error) {
        response = { ok: false, error: toErrorBody(error) };
      }

      const duration = Date.now() - startTime;
      if (response.ok) {
        logger.dispatch(op, duration, { ok: true }, table);
        recordDispatch(op, duration, true);
      } else {
        logger.dispatch(op, duration, { ok: false, ...response.error }, table);
        recordDispatch(op, duration, false, response.error.code);
      }

      return response;
    },
  };
}
