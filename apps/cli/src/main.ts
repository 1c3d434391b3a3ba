#!/usr/bin/env tsx
import path from "node:path";
import { Command } from "commander";
import type { LogRecord, RenderedTreeNode, SelectionPrefix, TreeKind } from "@knxlens/contracts";
import {
  applyEnvOverrides,
  DEFAULT_CONFIG_PATH,
  discoverLogFiles,
  errorMessage,
  isKnxLensError,
  isLogLevel,
  loadConfig,
  LogSession,
  type LogSessionEvent,
  mergeConfig,
  NamedFilterStore,
  type PartialAppConfigInput,
  pathTail,
  resolveNamedFilterPath,
  saveConfig,
  setLogLevel,
  TREE_KINDS,
} from "@knxlens/core";
import { runServer } from "@knxlens/server";

const PREFIX_MARKS: Record<SelectionPrefix, string> = { none: "[ ]", partial: "[-]", all: "[*]" };

interface GlobalOptions {
  config: string;
  logFile?: string;
  logLevel?: string;
}

function printTable(rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ");
    console.log(line.trimEnd());
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function recordRow(record: LogRecord): string[] {
  return [record.timestamp, record.sourceKey, record.sourceName, record.destKey, record.destName, record.payload];
}

const RECORD_HEADER = ["timestamp", "source", "source_name", "destination", "destination_name", "payload"];

function printRecords(records: readonly LogRecord[], opts: { jsonl?: boolean; header?: boolean } = {}): void {
  if (opts.jsonl) {
    for (const record of records) console.log(JSON.stringify(record));
    return;
  }
  if (records.length === 0) return;
  const rows = records.map(recordRow);
  if (opts.header === false) {
    for (const row of rows) console.log(row.join("   "));
    return;
  }
  printTable([RECORD_HEADER, ...rows]);
}

function renderTreeLines(node: RenderedTreeNode, opts: { ids?: boolean }, depth = 0, out: string[] = []): string[] {
  const annotation = node.annotation ? `  = ${node.annotation}` : "";
  const id = opts.ids ? `  {${node.id}}` : "";
  out.push(`${"  ".repeat(depth)}${PREFIX_MARKS[node.prefix]} ${node.label}${annotation}${id}`);
  for (const child of node.children) renderTreeLines(child, opts, depth + 1, out);
  return out;
}

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  const lastKey = parts.pop();
  if (!lastKey) return;

  let cursor = target;
  for (const key of parts) {
    const next = cursor[key];
    const child: Record<string, unknown> = isPlainRecord(next) ? next : {};
    cursor[key] = child;
    cursor = child;
  }
  cursor[lastKey] = value;
}

function isTreeKind(value: string): value is TreeKind {
  return TREE_KINDS.some((kind) => kind === value);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();
program.name("knx-lens").description("Browse, filter and follow KNX bus logs");
program.option("--config <path>", "Config path", process.env.KNXLENS_CONFIG ?? DEFAULT_CONFIG_PATH);
program.option("--log-file <path>", "Log file or .zip archive (overrides config)");
program.option("--log-level <level>", "debug, info, warn, error or silent");
program.hook("preAction", () => {
  const level = globalOptions().logLevel;
  if (level === undefined) return;
  if (!isLogLevel(level)) throw new Error(`invalid log level: ${level}`);
  setLogLevel(level);
});
program.addHelpText(
  "after",
  `
Examples:
  $ knx-lens view --limit 50
  $ knx-lens view --address 1/2/3 --filter Lights --follow
  $ knx-lens tree addresses --search kitchen
  $ knx-lens filters add Lights 1/1/1 "licht.*ein"
  $ knx-lens logs ./logs
  $ knx-lens serve --port 8788
`,
);

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

async function openSession(): Promise<LogSession> {
  const { config: configPath, logFile } = globalOptions();
  const config = applyEnvOverrides(await loadConfig(configPath));
  return LogSession.fromConfig(config, { configPath, sourcePath: logFile });
}

interface ViewOptions {
  limit?: string;
  address: string[];
  filter: string[];
  regex?: string;
  from?: string;
  to?: string;
  follow?: boolean;
  jsonl?: boolean;
}

async function applyViewFilters(session: LogSession, opts: ViewOptions): Promise<void> {
  if (opts.from || opts.to) {
    await session.setTimeFilter(opts.from ?? "", opts.to ?? "");
  }
  if (opts.address.length > 0) session.selectKeys(opts.address);
  for (const name of opts.filter) session.toggleNamedFilter(name);
  if (opts.regex) session.setGlobalRegex(opts.regex);
}

program
  .command("view")
  .description("Print the rows that pass the current filters")
  .option("--limit <n>", "Show at most the last N rows")
  .option("--address <ga>", "Select a group address (repeatable)", collect, [])
  .option("--filter <name>", "Activate a named filter (repeatable)", collect, [])
  .option("--regex <pattern>", "Global case-insensitive pattern")
  .option("--from <time>", "Earliest time of day (HH:MM[:SS])")
  .option("--to <time>", "Latest time of day (HH:MM[:SS])")
  .option("--follow", "Keep tailing the log")
  .option("--jsonl", "Emit one record JSON per line")
  .action(async (opts: ViewOptions) => {
    const session = await openSession();
    if (opts.follow) {
      await session.start();
    } else {
      await session.open();
    }
    await applyViewFilters(session, opts);

    const projection = session.getRows();
    const limit = Math.max(0, Number(opts.limit) || 0);
    const rows = limit > 0 ? projection.rows.slice(-limit) : projection.rows;
    printRecords(rows, { jsonl: opts.jsonl });
    const warning = session.takeWarning();
    if (warning) console.error(`warning: ${warning}`);

    if (!opts.follow) return;
    session.on("stream", ({ envelope }: LogSessionEvent) => {
      if (envelope.type === "session_error") {
        console.error(`error: ${String(envelope.payload.message ?? "")}`);
        return;
      }
      if (envelope.type === "session_reloaded") {
        console.error("log reloaded");
        return;
      }
      if (envelope.type !== "records_appended") return;
      const appended = Array.isArray(envelope.payload.rows) ? envelope.payload.rows : [];
      const typed = appended.filter((row): row is LogRecord => isPlainRecord(row) && typeof row.destKey === "string");
      printRecords(typed, { jsonl: opts.jsonl, header: false });
    });
    process.on("SIGINT", () => {
      session.stop();
    });
  });

program
  .command("tree <kind>")
  .description(`Render a selection tree (${[...TREE_KINDS, "named"].join(", ")})`)
  .option("--search <text>", "Keep only nodes whose label contains the text")
  .option("--select <id>", "Toggle a node before rendering (repeatable)", collect, [])
  .option("--ids", "Show node ids")
  .option("--json", "JSON output")
  .action(async (kind: string, opts: { search?: string; select: string[]; ids?: boolean; json?: boolean }) => {
    if (kind !== "named" && !isTreeKind(kind)) {
      throw new Error(`unknown tree: ${kind} (expected ${[...TREE_KINDS, "named"].join(", ")})`);
    }
    const session = await openSession();
    await session.open().catch((error: unknown) => {
      if (!isKnxLensError(error)) throw error;
      console.error(`warning: ${error.message}`);
    });

    let tree: RenderedTreeNode;
    if (kind === "named") {
      for (const name of opts.select) session.toggleNamedFilter(name);
      tree = session.getNamedFilterTree();
    } else {
      for (const id of opts.select) session.toggleNode(kind, id, opts.search);
      tree = session.getTree(kind, opts.search);
    }
    if (opts.json) {
      console.log(JSON.stringify(tree, null, 2));
      return;
    }
    for (const line of renderTreeLines(tree, { ids: opts.ids })) console.log(line);
  });

async function filterStore(): Promise<NamedFilterStore> {
  const { config: configPath } = globalOptions();
  const config = applyEnvOverrides(await loadConfig(configPath));
  const store = new NamedFilterStore(resolveNamedFilterPath(config, configPath));
  await store.load();
  return store;
}

const filters = program.command("filters").description("Named filters");

filters
  .command("list")
  .option("--json", "JSON output")
  .action(async (opts: { json?: boolean }) => {
    const store = await filterStore();
    const list = store.list();
    if (opts.json) {
      console.log(JSON.stringify(list, null, 2));
      return;
    }
    if (list.length === 0) {
      console.log("no named filters");
      return;
    }
    printTable([["name", "rules"], ...list.map((entry) => [entry.name, String(entry.rules.length)])]);
  });

filters.command("show <name>").action(async (name: string) => {
  const store = await filterStore();
  const entry = store.get(name);
  if (!entry) throw new Error(`unknown named filter: ${name}`);
  for (const rule of entry.rules) console.log(rule);
});

filters
  .command("add <name> <rules...>")
  .description("Create a filter or append rules to it")
  .action(async (name: string, rules: string[]) => {
    const store = await filterStore();
    for (const rule of rules) await store.addRule(name, rule);
    console.log(`updated ${name}`);
  });

filters
  .command("remove <name> [rule]")
  .description("Delete a filter, or one rule of it")
  .action(async (name: string, rule?: string) => {
    const store = await filterStore();
    if (rule) {
      await store.removeRule(name, rule);
    } else {
      await store.remove(name);
    }
    console.log(`updated ${name}`);
  });

filters.command("rename <from> <to>").action(async (from: string, to: string) => {
  const store = await filterStore();
  await store.rename(from, to);
  console.log(`renamed ${from} -> ${to}`);
});

program
  .command("logs [dir]")
  .description("List log files and archives, newest first")
  .option("--json", "JSON output")
  .action(async (dir: string | undefined, opts: { json?: boolean }) => {
    const { config: configPath } = globalOptions();
    const config = applyEnvOverrides(await loadConfig(configPath));
    const files = await discoverLogFiles(dir ?? config.log.path);
    if (opts.json) {
      console.log(JSON.stringify(files, null, 2));
      return;
    }
    if (files.length === 0) {
      console.log(`no log files in ${path.resolve(dir ?? config.log.path)}`);
      return;
    }
    printTable([
      ["name", "size", "modified"],
      ...files.map((file) => [pathTail(file.path), String(file.sizeBytes), new Date(file.mtimeMs).toISOString()]),
    ]);
  });

const configCmd = program.command("config").description("Configuration");

configCmd.command("get").action(async () => {
  const config = await loadConfig(globalOptions().config);
  console.log(JSON.stringify(config, null, 2));
});

configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
  const configPath = globalOptions().config;
  const config = await loadConfig(configPath);
  const mutable = structuredClone(config) as unknown as Record<string, unknown>;
  setPath(mutable, key, parseValue(value));
  const merged = mergeConfig(mutable as PartialAppConfigInput);
  await saveConfig(merged, configPath);
  console.log(`updated ${key}`);
});

program
  .command("serve")
  .description("Serve the JSON/SSE API")
  .option("--host <host>", "Server host", process.env.KNXLENS_HOST ?? "127.0.0.1")
  .option("--port <port>", "Server port", process.env.KNXLENS_PORT ?? "8788")
  .action(async (opts: { host: string; port: string }) => {
    const port = Number(opts.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new Error(`invalid port: ${opts.port}`);
    }
    const { config: configPath, logFile } = globalOptions();
    await runServer({ host: opts.host, port, configPath, logFile });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
