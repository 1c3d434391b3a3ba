import { execFileSync } from "node:child_process";
import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { mergeConfig, saveConfig } from "@knxlens/core";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../..");
const tsxBin = path.resolve(repoRoot, "node_modules/.bin/tsx");
const cliMain = path.resolve(repoRoot, "apps/cli/src/main.ts");

const PROJECT = {
  devices: { "1.1.5": { name: "Sensor A", channels: {}, communication_object_ids: [] } },
  group_addresses: {
    "1/1/1": { name: "Light kitchen" },
    "1/2/3": { name: "Temp" },
    "1/2/4": { name: "Humidity" },
  },
};

async function buildFixture(): Promise<{ root: string; configPath: string }> {
  const root = await mkdtemp(path.join(os.tmpdir(), "knx-lens-cli-"));
  const logFile = path.join(root, "bus.log");
  const projectFile = path.join(root, "project.json");
  await writeFile(
    logFile,
    [
      "2024-05-01 10:00:01 | 1.1.5 | device | 1/2/3 | address | 21.0",
      "2024-05-01 10:00:02 | 1.1.5 | device | 1/2/4 | address | 40",
      "2024-05-01 10:00:03 | 1.1.6 | device | 1/1/1 | address | 1",
    ]
      .map((line) => `${line}\n`)
      .join(""),
    "utf8",
  );
  await writeFile(projectFile, JSON.stringify(PROJECT), "utf8");

  const config = mergeConfig({ project: { path: projectFile }, log: { file: logFile, path: root } });
  const configPath = path.join(root, "config.toml");
  await saveConfig(config, configPath);
  return { root, configPath };
}

function runCli(args: string[]): string {
  return execFileSync(tsxBin, [cliMain, ...args], {
    cwd: repoRoot,
    encoding: "utf8",
    env: { ...process.env },
    stdio: ["ignore", "pipe", "pipe"],
  }).trim();
}

function parseJsonl(output: string): Array<Record<string, unknown>> {
  return output
    .split("\n")
    .filter(Boolean)
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("cli", () => {
  it("prints enriched rows as jsonl and as a table", async () => {
    const fixture = await buildFixture();

    const records = parseJsonl(runCli(["--config", fixture.configPath, "view", "--jsonl"]));
    expect(records.map((record) => record.destName)).toEqual(["Temp", "Humidity", "Light kitchen"]);
    expect(records[0]).toMatchObject({ sourceName: "Sensor A", payload: "21.0" });

    const selected = parseJsonl(runCli(["--config", fixture.configPath, "view", "--address", "1/2/3", "--jsonl"]));
    expect(selected.map((record) => record.payload)).toEqual(["21.0"]);

    const limited = parseJsonl(runCli(["--config", fixture.configPath, "view", "--limit", "1", "--jsonl"]));
    expect(limited.map((record) => record.payload)).toEqual(["1"]);

    const table = runCli(["--config", fixture.configPath, "view", "--regex", "humid"]).split("\n");
    expect(table[0]?.split(" | ").map((cell) => cell.trim())).toEqual([
      "timestamp",
      "source",
      "source_name",
      "destination",
      "destination_name",
      "payload",
    ]);
    expect(table).toHaveLength(3);
    expect(table[2]).toContain("Humidity");
  }, 30_000);

  it("renders a searched tree with selection marks and payloads", async () => {
    const fixture = await buildFixture();
    const plain = runCli(["--config", fixture.configPath, "tree", "addresses", "--search", "humid"]);
    expect(plain.split("\n")).toEqual([
      "[ ] Group addresses",
      "  [ ] (1) Main group 1",
      "    [ ] (1/2) Middle group 1/2",
      "      [ ] (1/2/4) Humidity  = 40",
    ]);

    const selected = runCli([
      "--config",
      fixture.configPath,
      "tree",
      "addresses",
      "--search",
      "humid",
      "--select",
      "ga_1/2/4",
    ]);
    expect(selected.split("\n")[0]).toBe("[*] Group addresses");
    expect(selected.split("\n")[3]).toBe("      [*] (1/2/4) Humidity  = 40");

    expect(() => runCli(["--config", fixture.configPath, "tree", "rooms"])).toThrow();
  }, 30_000);

  it("edits named filters and applies them to the view", async () => {
    const fixture = await buildFixture();
    expect(runCli(["--config", fixture.configPath, "filters", "add", "Lights", "1/1/1", "kitchen"])).toBe(
      "updated Lights",
    );
    expect(JSON.parse(runCli(["--config", fixture.configPath, "filters", "list", "--json"]))).toEqual([
      { name: "Lights", rules: ["1/1/1", "kitchen"] },
    ]);
    expect(runCli(["--config", fixture.configPath, "filters", "show", "Lights"])).toBe("1/1/1\nkitchen");

    const filtered = parseJsonl(runCli(["--config", fixture.configPath, "view", "--filter", "Lights", "--jsonl"]));
    expect(filtered.map((record) => record.destKey)).toEqual(["1/1/1"]);

    expect(runCli(["--config", fixture.configPath, "filters", "rename", "Lights", "Kitchen"])).toBe(
      "renamed Lights -> Kitchen",
    );
    runCli(["--config", fixture.configPath, "filters", "remove", "Kitchen", "kitchen"]);
    expect(runCli(["--config", fixture.configPath, "filters", "show", "Kitchen"])).toBe("1/1/1");
    runCli(["--config", fixture.configPath, "filters", "remove", "Kitchen"]);
    expect(runCli(["--config", fixture.configPath, "filters", "list"])).toBe("no named filters");
  }, 30_000);

  it("lists log files and updates config values", async () => {
    const fixture = await buildFixture();
    const files = JSON.parse(runCli(["--config", fixture.configPath, "logs", fixture.root, "--json"])) as Array<{
      name: string;
    }>;
    expect(files.map((file) => file.name)).toEqual(["bus.log"]);

    expect(runCli(["--config", fixture.configPath, "config", "set", "log.maxLogLines", "5"])).toBe(
      "updated log.maxLogLines",
    );
    const config = JSON.parse(runCli(["--config", fixture.configPath, "config", "get"])) as {
      log: { maxLogLines: number; file: string };
    };
    expect(config.log.maxLogLines).toBe(5);
    expect(config.log.file).toBe(path.join(fixture.root, "bus.log"));
  }, 30_000);
});
