/**
 * Strongbox CLI program
 *
 * Every command opens the store, acts, and closes it; the close flushes
 * dirty tables to disk.
 */

import { Command, CommanderError } from "commander";
import {
  RecordNotFoundError,
  SnapshotCipher,
  TableNotFoundError,
  createSampleStore,
  formatKey,
  recordToJson,
  type Environment,
  type Fields,
} from "@strongbox/sdk";
import { parseKeyOption, parseRecordData } from "./lib/arg.js";
import { resolveStoreConfig, type GlobalOptions } from "./lib/env.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { highlightError, printJson, printLines } from "./lib/render.js";
import { configureSdkLogging, resetSdkLogging, runWithStore } from "./lib/store.js";
import { withTiming } from "./lib/telemetry.js";

export const CLI_VERSION = "0.1.0";

interface DataOptions {
  data: Fields;
}

export function createProgram(env: Environment = process.env): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(highlightError(str)),
    })
    .exitOverride();

  program
    .name("strongbox")
    .description("Strongbox - embedded document store with encrypted table snapshots")
    .version(CLI_VERSION)
    .option("--data-dir <path>", "Data directory (default: $STRONGBOX_DATA_DIR or ./data)")
    .option("--key <hex>", "Encryption key, 64 hex characters (default: $STRONGBOX_KEY)", parseKeyOption)
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program.hook("preAction", () => {
    configureSdkLogging(program.opts<GlobalOptions>().verbose === true);
  });

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const say = (message: string): void => {
    if (!globals().quiet) {
      console.log(message);
    }
  };

  program
    .command("insert <table>")
    .description("Insert a record and print its id")
    .requiredOption("--data <json>", "Record data as a JSON object", parseRecordData)
    .action(async (table: string, options: DataOptions) => {
      await withTiming(
        "cli.insert",
        async () => {
          const id = await runWithStore(globals(), env, (store) => store.insert(table, options.data));
          console.log(id);
        },
        env
      );
    });

  program
    .command("find <table>")
    .description("Print one record by id, or every record in a table")
    .option("--id <id>", "Record id")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (table: string, options: { id?: string; raw?: boolean }) => {
      await withTiming(
        "cli.find",
        async () => {
          const { id } = options;
          const output = await runWithStore(globals(), env, (store) => {
            if (id === undefined) {
              return store
                .findAll(table)
                .map(recordToJson)
                .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
            }
            const record = store.findById(table, id);
            if (!record) {
              throw new RecordNotFoundError(table, id);
            }
            return recordToJson(record);
          });
          printJson(output, { raw: options.raw });
        },
        env
      );
    });

  program
    .command("update <table> <id>")
    .description("Replace a record's data")
    .requiredOption("--data <json>", "New record data as a JSON object", parseRecordData)
    .action(async (table: string, id: string, options: DataOptions) => {
      await withTiming(
        "cli.update",
        async () => {
          await runWithStore(globals(), env, (store) => store.update(table, id, options.data));
          say(`Updated ${table}/${id}`);
        },
        env
      );
    });

  program
    .command("delete <table> <id>")
    .description("Delete a record")
    .action(async (table: string, id: string) => {
      await withTiming(
        "cli.delete",
        async () => {
          await runWithStore(globals(), env, (store) => store.delete(table, id));
          say(`Deleted ${table}/${id}`);
        },
        env
      );
    });

  program
    .command("tables")
    .description("List table names")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      await withTiming(
        "cli.tables",
        async () => {
          const names = await runWithStore(globals(), env, (store) => store.listTables());
          if (options.json) {
            printJson(names);
          } else {
            printLines(names);
          }
        },
        env
      );
    });

  program
    .command("count <table>")
    .description("Print the number of records in a table")
    .action(async (table: string) => {
      await withTiming(
        "cli.count",
        async () => {
          const count = await runWithStore(globals(), env, (store) => store.count(table));
          console.log(String(count));
        },
        env
      );
    });

  program
    .command("drop <table>")
    .description("Drop a table and delete its file")
    .option("--force", "Confirm the drop")
    .action(async (table: string, options: { force?: boolean }) => {
      await withTiming(
        "cli.drop",
        async () => {
          if (!options.force) {
            throw new CliError(`Use --force to drop table ${table}`);
          }
          await runWithStore(globals(), env, async (store) => {
            if (!store.hasTable(table)) {
              throw new TableNotFoundError(table);
            }
            await store.dropTable(table);
          });
          say(`Dropped table ${table}`);
        },
        env
      );
    });

  program
    .command("keygen")
    .description("Generate a random encryption key")
    .action(() => {
      console.log(formatKey(SnapshotCipher.generateKey()));
    });

  program
    .command("demo")
    .description("Create sample users and products tables")
    .action(async () => {
      await withTiming(
        "cli.demo",
        async () => {
          const config = resolveStoreConfig(globals(), env);
          const store = await createSampleStore(config);
          await store.close();
          say(`Created sample data in ${config.dataDir}`);
        },
        env
      );
    });

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix)
 * @returns The process exit code
 */
export async function run(argv: readonly string[], env: Environment = process.env): Promise<number> {
  const program = createProgram(env);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed usage errors, help and version
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = program.opts<GlobalOptions>().verbose === true;
    console.error(`Error: ${formatCliError(err, verbose)}`);
    return mapSdkErrorToExitCode(err);
  } finally {
    resetSdkLogging();
  }
}
