import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import TOML, { type JsonMap } from "@iarna/toml";
import type { NamedFilterRules } from "@knxlens/contracts";
import { FilterStoreError } from "./errors.js";
import { compileCaseInsensitive } from "./filterEvaluator.js";
import { createLogger } from "./logger.js";
import { asArray, asString, compareNatural, errorMessage, EXACT_GROUP_ADDRESS_PATTERN } from "./utils.js";

const log = createLogger("named-filters");

const FILE_HEADER = "# knx-lens named filters: name = [group addresses or case-insensitive patterns]\n";

export type ClassifiedRule = { type: "key"; key: string } | { type: "regex"; regex: RegExp } | { type: "invalid" };

export function classifyRule(rule: string): ClassifiedRule {
  const trimmed = rule.trim();
  if (EXACT_GROUP_ADDRESS_PATTERN.test(trimmed)) return { type: "key", key: trimmed };
  const regex = trimmed ? compileCaseInsensitive(trimmed) : null;
  return regex ? { type: "regex", regex } : { type: "invalid" };
}

export function compileNamedFilter(name: string, rules: readonly string[]): NamedFilterRules {
  const compiled: NamedFilterRules = { keys: new Set(), regexes: [] };
  for (const rule of rules) {
    const classified = classifyRule(rule);
    if (classified.type === "key") {
      compiled.keys.add(classified.key);
    } else if (classified.type === "regex") {
      compiled.regexes.push(classified.regex);
    } else {
      log.warn(`dropping invalid rule '${rule}' in filter '${name}'`);
    }
  }
  return compiled;
}

export interface NamedFilterDefinition {
  name: string;
  rules: string[];
}

/**
 * File-backed `name -> rules` map. Every mutation writes the whole file and reloads it.
 */
export class NamedFilterStore {
  private definitions = new Map<string, string[]>();
  private compiled = new Map<string, NamedFilterRules>();

  constructor(readonly filePath: string) {}

  list(): NamedFilterDefinition[] {
    return Array.from(this.definitions.entries())
      .sort((a, b) => compareNatural(a[0], b[0]))
      .map(([name, rules]) => ({ name, rules: rules.slice() }));
  }

  get(name: string): NamedFilterDefinition | undefined {
    const rules = this.definitions.get(name);
    return rules ? { name, rules: rules.slice() } : undefined;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  rules(): ReadonlyMap<string, NamedFilterRules> {
    return this.compiled;
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch {
      log.info(`creating empty named filter file ${this.filePath}`);
      this.definitions = new Map();
      await this.write();
      this.recompile();
      return;
    }
    let parsed: JsonMap;
    try {
      parsed = TOML.parse(raw);
    } catch (error) {
      throw new FilterStoreError(`cannot read named filters from ${this.filePath}: ${errorMessage(error)}`, error);
    }
    const next = new Map<string, string[]>();
    for (const [name, value] of Object.entries(parsed)) {
      if (!Array.isArray(value)) {
        log.warn(`ignoring named filter '${name}': expected a list of rules`);
        continue;
      }
      next.set(
        name,
        asArray(value)
          .map((item) => asString(item).trim())
          .filter(Boolean),
      );
    }
    this.definitions = next;
    this.recompile();
  }

  private recompile(): void {
    const compiled = new Map<string, NamedFilterRules>();
    for (const [name, rules] of this.definitions) {
      compiled.set(name, compileNamedFilter(name, rules));
    }
    this.compiled = compiled;
  }

  private async write(): Promise<void> {
    const doc: JsonMap = {};
    for (const { name, rules } of this.list()) {
      doc[name] = rules;
    }
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, FILE_HEADER + TOML.stringify(doc), "utf8");
    } catch (error) {
      throw new FilterStoreError(`cannot write named filters to ${this.filePath}: ${errorMessage(error)}`, error);
    }
  }

  private async commit(next: Map<string, string[]>): Promise<void> {
    this.definitions = next;
    await this.write();
    await this.load();
  }

  async upsert(name: string, rules: readonly string[]): Promise<void> {
    const trimmedName = name.trim();
    if (!trimmedName) throw new FilterStoreError("named filter needs a name");
    const next = new Map(this.definitions);
    next.set(
      trimmedName,
      rules.map((rule) => rule.trim()).filter(Boolean),
    );
    await this.commit(next);
  }

  async addRule(name: string, rule: string): Promise<void> {
    const rules = this.definitions.get(name) ?? [];
    const trimmed = rule.trim();
    if (rules.includes(trimmed)) return;
    await this.upsert(name, [...rules, trimmed]);
  }

  async removeRule(name: string, rule: string): Promise<void> {
    const rules = this.definitions.get(name);
    if (!rules) throw new FilterStoreError(`unknown named filter: ${name}`);
    await this.upsert(
      name,
      rules.filter((item) => item !== rule.trim()),
    );
  }

  async remove(name: string): Promise<void> {
    if (!this.definitions.has(name)) throw new FilterStoreError(`unknown named filter: ${name}`);
    const next = new Map(this.definitions);
    next.delete(name);
    await this.commit(next);
  }

  async rename(from: string, to: string): Promise<void> {
    const rules = this.definitions.get(from);
    if (!rules) throw new FilterStoreError(`unknown named filter: ${from}`);
    const target = to.trim();
    if (!target) throw new FilterStoreError("named filter needs a name");
    if (target !== from && this.definitions.has(target)) {
      throw new FilterStoreError(`named filter already exists: ${target}`);
    }
    const next = new Map<string, string[]>();
    for (const [name, value] of this.definitions) {
      next.set(name === from ? target : name, value);
    }
    await this.commit(next);
  }
}
