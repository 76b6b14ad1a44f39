/**
 * Zod schemas for validating request envelopes
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import { isValidTableName } from "@strongbox/sdk";

export const OPERATIONS = [
  "insert",
  "find",
  "find_all",
  "update",
  "delete",
  "list_tables",
  "count",
  "create_table",
  "drop_table",
  "save",
] as const;

export type Operation = (typeof OPERATIONS)[number];

/**
 * Operations that never change the store; the only ones allowed in read-only mode
 */
export const READ_ONLY_OPERATIONS: ReadonlySet<Operation> = new Set<Operation>([
  "find",
  "find_all",
  "list_tables",
  "count",
]);

// Same rule the store applies, checked up front so the caller gets a field path
const TableNameSchema = z.string().min(1).superRefine((val, ctx) => {
  if (!isValidTableName(val)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        "table must start with a letter or digit, contain only letters, digits, underscores and hyphens, and be at most 64 characters",
    });
  }
});

const IdSchema = z.string().min(1, "id must be non-empty");

// Record payload: any JSON object, converted to typed fields by the dispatcher
export const DataSchema = z.record(z.string(), z.unknown());

// Equality filter for find_all: every listed field must equal the given JSON value
export const WhereSchema = z.record(z.string(), z.unknown());

export const InsertRequestSchema = z.object({
  op: z.literal("insert"),
  table: TableNameSchema,
  data: DataSchema,
});

export const FindRequestSchema = z.object({
  op: z.literal("find"),
  table: TableNameSchema,
  id: IdSchema,
});

export const FindAllRequestSchema = z.object({
  op: z.literal("find_all"),
  table: TableNameSchema,
  where: WhereSchema.optional(),
});

export const UpdateRequestSchema = z.object({
  op: z.literal("update"),
  table: TableNameSchema,
  id: IdSchema,
  data: DataSchema,
});

export const DeleteRequestSchema = z.object({
  op: z.literal("delete"),
  table: TableNameSchema,
  id: IdSchema,
});

export const ListTablesRequestSchema = z.object({
  op: z.literal("list_tables"),
});

export const CountRequestSchema = z.object({
  op: z.literal("count"),
  table: TableNameSchema,
});

export const CreateTableRequestSchema = z.object({
  op: z.literal("create_table"),
  table: TableNameSchema,
});

export const DropTableRequestSchema = z.object({
  op: z.literal("drop_table"),
  table: TableNameSchema,
});

export const SaveRequestSchema = z.object({
  op: z.literal("save"),
});

export const RequestSchema = z.discriminatedUnion("op", [
  InsertRequestSchema,
  FindRequestSchema,
  FindAllRequestSchema,
  UpdateRequestSchema,
  DeleteRequestSchema,
  ListTablesRequestSchema,
  CountRequestSchema,
  CreateTableRequestSchema,
  DropTableRequestSchema,
  SaveRequestSchema,
]);

// Response schemas (for documentation and client-side checks)

export const ErrorBodySchema = z.object({
  code: z.string(),
  message: z.string(),
});

export const ResponseSchema = z.union([
  z.object({
    ok: z.literal(true),
    data: z.unknown().optional(),
    message: z.string().optional(),
  }),
  z.object({
    ok: z.literal(false),
    error: ErrorBodySchema,
  }),
]);

// Export types
export type Request = z.infer<typeof RequestSchema>;
export type InsertRequest = z.infer<typeof InsertRequestSchema>;
export type FindAllRequest = z.infer<typeof FindAllRequestSchema>;
export type ErrorBody = z.infer<typeof ErrorBodySchema>;

export type Response =
  | { ok: true; data?: unknown; message?: string }
  | { ok: false; error: ErrorBody };
