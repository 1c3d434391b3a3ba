import { EventEmitter } from "node:events";
import path from "node:path";
import type {
  AppConfig,
  LogFormat,
  LogRecord,
  ProjectCatalog,
  ProjectionResult,
  RenderedTreeNode,
  SessionState,
  SessionStatus,
  StreamEnvelope,
  TailDecision,
  TimeFilter,
  TreeKind,
} from "@knxlens/contracts";
import { createCatalogLookup, emptyCatalog, loadProjectCatalog, type CatalogLookup } from "./catalog.js";
import { resolveLogFilePath, resolveNamedFilterPath } from "./config.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { DisplayProjector } from "./displayProjector.js";
import { enrichLine } from "./enricher.js";
import {
  FilterStoreError,
  FormatUndeterminedError,
  InvalidTimeError,
  isKnxLensError,
  KnxLensError,
} from "./errors.js";
import { buildCriteria, compileGlobalRegex, type FilterCriteria } from "./filterEvaluator.js";
import { LogCache } from "./logCache.js";
import { createLogger } from "./logger.js";
import { NamedFilterStore, type NamedFilterDefinition } from "./namedFilters.js";
import { LineParserRegistry, splitLines } from "./parsers/index.js";
import { PayloadHistoryStore } from "./payloadHistory.js";
import { SelectionModel, type ToggleOutcome } from "./selection.js";
import { decodeText, isTailablePath, readLogSource, statSource, type FileSnapshot } from "./source.js";
import { TailTracker } from "./tailTracker.js";
import { createTimeFilter, formatTimeOfDay, parseTimeOfDay } from "./timeFilter.js";
import { buildTree, renderNamedFilterTree, TreeView } from "./tree/index.js";
import { errorMessage, expandHome } from "./utils.js";

const log = createLogger("session");

const COALESCED_TICK_DELAY_MS = 25;

export const TREE_KINDS: readonly TreeKind[] = ["building", "devices", "addresses"];

export interface LogSessionOptions {
  sourcePath: string;
  catalog?: ProjectCatalog;
  namedFilters?: NamedFilterStore | null;
  maxLogLines?: number;
  maxCacheSize?: number;
  pollIntervalMs?: number;
  idleTimeoutMs?: number;
  timeFilter?: TimeFilter | null;
  now?: () => number;
}

export interface LogSessionEvent {
  envelope: StreamEnvelope;
}

export interface FromConfigOptions {
  configPath?: string;
  sourcePath?: string;
}

interface ReloadOptions {
  sourcePath?: string;
  fallbackFormat?: LogFormat | null;
}

interface LoadedSource {
  records: LogRecord[];
  history: PayloadHistoryStore;
  tracker: TailTracker;
  format: LogFormat;
  tailable: boolean;
  skipped: number;
}

/**
 * One open log plus everything derived from it: cache, payload history, trees, selection and
 * the poll loop that tails the file. Front ends subscribe to `"stream"` envelopes.
 */
export class LogSession extends EventEmitter {
  private readonly registry = new LineParserRegistry();
  private readonly lookup: CatalogLookup;
  private readonly trees: Record<TreeKind, TreeView>;
  private readonly filteredTrees = new Map<TreeKind, { text: string; view: TreeView }>();
  private readonly projector: DisplayProjector;
  private readonly namedFilters: NamedFilterStore | null;
  private readonly pollIntervalMs: number;
  private readonly idleTimeoutMs: number;
  private readonly now: () => number;
  readonly selection = new SelectionModel();
  private cache: LogCache;
  private history = new PayloadHistoryStore();
  private tracker = new TailTracker();
  private sourcePath: string;
  private state: SessionState = "closed";
  private format: LogFormat | null = null;
  private globalRegex: RegExp | null = null;
  private globalPattern = "";
  private timeFilter: TimeFilter | null;
  private lastError = "";
  private lastActivityMs: number;
  private tailingPaused = false;
  private timer: NodeJS.Timeout | null = null;
  private started = false;
  private tickInFlight = false;
  private tickPending = false;
  private streamVersion = 0;

  constructor(options: LogSessionOptions) {
    super();
    const catalog = options.catalog ?? emptyCatalog();
    this.sourcePath = path.resolve(expandHome(options.sourcePath));
    this.lookup = createCatalogLookup(catalog);
    this.trees = {
      building: new TreeView(buildTree("building", catalog)),
      devices: new TreeView(buildTree("devices", catalog)),
      addresses: new TreeView(buildTree("addresses", catalog)),
    };
    this.cache = new LogCache(options.maxCacheSize ?? DEFAULT_CONFIG.log.maxCacheSize);
    this.projector = new DisplayProjector(options.maxLogLines ?? DEFAULT_CONFIG.log.maxLogLines);
    this.namedFilters = options.namedFilters ?? null;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_CONFIG.log.pollIntervalMs;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_CONFIG.log.idleTimeoutMs;
    this.timeFilter = options.timeFilter ?? null;
    this.now = options.now ?? Date.now;
    this.lastActivityMs = this.now();
    if (this.namedFilters) {
      this.selection.setNamedFilters(this.namedFilters.rules());
    }
  }

  static async fromConfig(config: AppConfig, options: FromConfigOptions = {}): Promise<LogSession> {
    let catalog = emptyCatalog();
    let catalogError: KnxLensError | null = null;
    if (config.project.path) {
      try {
        catalog = await loadProjectCatalog(path.resolve(expandHome(config.project.path)));
      } catch (error) {
        if (!isKnxLensError(error)) throw error;
        log.warn(error.message);
        catalogError = error;
      }
    }
    const namedFilters = new NamedFilterStore(resolveNamedFilterPath(config, options.configPath));
    await namedFilters.load();

    const session = new LogSession({
      sourcePath: options.sourcePath ?? resolveLogFilePath(config),
      catalog,
      namedFilters,
      maxLogLines: config.log.maxLogLines,
      maxCacheSize: config.log.maxCacheSize,
      pollIntervalMs: config.log.pollIntervalMs,
      idleTimeoutMs: config.log.idleTimeoutMs,
      timeFilter: createTimeFilter(config.log.timeFilterStart, config.log.timeFilterEnd),
    });
    if (catalogError) session.reportError(catalogError);
    return session;
  }

  getStatus(): SessionStatus {
    return {
      state: this.state,
      sourcePath: this.sourcePath,
      format: this.format,
      cachedRecords: this.cache.size,
      lastError: this.lastError,
      tailingPaused: this.tailingPaused,
    };
  }

  getSourcePath(): string {
    return this.sourcePath;
  }

  getRecords(): readonly LogRecord[] {
    return this.cache.records();
  }

  getHistory(): PayloadHistoryStore {
    return this.history;
  }

  getGlobalPattern(): string {
    return this.globalPattern;
  }

  getTimeFilter(): { start: string; end: string } {
    return {
      start: this.timeFilter?.start ? formatTimeOfDay(this.timeFilter.start) : "",
      end: this.timeFilter?.end ? formatTimeOfDay(this.timeFilter.end) : "",
    };
  }

  /** Phase two of startup: load the log, then start polling it. */
  async start(): Promise<void> {
    this.started = true;
    try {
      await this.open();
    } catch (error) {
      if (!isKnxLensError(error)) throw error;
      log.warn(`initial load failed: ${error.message}`);
    }
    this.scheduleNextTick();
  }

  stop(): void {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Points the session at another file and loads it. The current log stays if the load fails. */
  async openFile(sourcePath: string): Promise<void> {
    await this.runFullLoad("session_loaded", { sourcePath: path.resolve(expandHome(sourcePath)) });
  }

  async open(): Promise<void> {
    await this.runFullLoad("session_loaded");
  }

  /** Manual reload; also the way out of `tailing_disabled`. */
  async reload(): Promise<void> {
    this.touch();
    await this.runFullLoad("session_reloaded");
  }

  private async runFullLoad(
    eventType: "session_loaded" | "session_reloaded",
    options: ReloadOptions = {},
  ): Promise<void> {
    const target = options.sourcePath ?? this.sourcePath;
    const previous = this.state;
    if (previous !== "closed") this.setState("reloading");
    let loaded: LoadedSource;
    try {
      loaded = await this.loadSource(target, options.fallbackFormat ?? null);
    } catch (error) {
      const missing =
        isKnxLensError(error) && error.category === "source_not_found" && target === this.sourcePath;
      this.setState(previous === "closed" ? "closed" : missing ? "tailing_disabled" : previous);
      this.reportError(error);
      throw error;
    }
    this.commitLoad(target, loaded);
    this.emitStream(eventType, {
      status: this.getStatus(),
      skipped: loaded.skipped,
    });
  }

  private async loadSource(sourcePath: string, fallbackFormat: LogFormat | null): Promise<LoadedSource> {
    const source = await readLogSource(sourcePath);
    const tracker = new TailTracker();
    const tailable = !source.isArchive && source.snapshot !== null && isTailablePath(sourcePath);
    const complete = tailable && source.snapshot ? tracker.begin(source.content, source.snapshot) : source.content;

    // A rotated file may hold nothing readable yet; its lines still come in the old format.
    const format = this.registry.detectFormat(splitLines(decodeText(source.content))) ?? fallbackFormat;
    if (!format) throw new FormatUndeterminedError(sourcePath);

    const history = new PayloadHistoryStore();
    const { records, skipped } = this.ingest(splitLines(decodeText(complete)), format, history);
    log.info(`loaded ${records.length} records from ${sourcePath} (${skipped} skipped)`);
    return { records, history, tracker, format, tailable, skipped };
  }

  private commitLoad(sourcePath: string, loaded: LoadedSource): void {
    this.sourcePath = sourcePath;
    this.cache.replace(loaded.records);
    this.history = loaded.history;
    this.tracker = loaded.tracker;
    this.format = loaded.format;
    this.lastError = "";
    this.projector.rearm();
    this.setState("loaded");
    this.setState(loaded.tailable ? "tailing" : "static");
  }

  private ingest(
    lines: readonly string[],
    format: LogFormat,
    history: PayloadHistoryStore,
  ): { records: LogRecord[]; skipped: number } {
    const parsed = this.registry.parseLines(lines, format, this.timeFilter);
    const records = parsed.lines.map((line) => {
      if (line.payload !== null) {
        history.append(line.destKey, { timestamp: line.timestamp, payload: line.payload });
      }
      return enrichLine(line, this.lookup);
    });
    return { records, skipped: parsed.skipped };
  }

  /** One tail check. Overlapping calls are coalesced into a follow-up tick. */
  async poll(): Promise<TailDecision | null> {
    if (this.tickInFlight) {
      this.tickPending = true;
      return null;
    }
    this.tickInFlight = true;
    try {
      return await this.tick();
    } finally {
      this.tickInFlight = false;
      const pending = this.tickPending;
      this.tickPending = false;
      if (this.started) {
        this.scheduleNextTick(pending ? COALESCED_TICK_DELAY_MS : this.pollIntervalMs);
      }
    }
  }

  private isIdle(): boolean {
    return this.now() - this.lastActivityMs >= this.idleTimeoutMs;
  }

  private async tick(): Promise<TailDecision | null> {
    if (this.state !== "tailing" || !this.format) return null;
    if (this.isIdle()) {
      if (!this.tailingPaused) {
        this.tailingPaused = true;
        log.info("no activity; tailing paused");
        this.emitStream("state_changed", { status: this.getStatus() });
      }
      return null;
    }

    let snapshot: FileSnapshot;
    try {
      snapshot = await statSource(this.sourcePath);
    } catch (error) {
      this.disableTailing(error);
      return null;
    }

    const decision = this.tracker.check(snapshot);
    if (decision === "unchanged") return decision;
    if (decision === "truncated") {
      log.info(`${this.sourcePath} shrank; reloading`);
      try {
        await this.runFullLoad("session_reloaded", { fallbackFormat: this.format });
      } catch (error) {
        log.warn(`reload after truncation failed: ${errorMessage(error)}`);
      }
      return decision;
    }

    let appended: Buffer;
    try {
      appended = await this.tracker.readAppended(this.sourcePath, snapshot);
    } catch (error) {
      this.disableTailing(error);
      return null;
    }
    this.appendText(decodeText(appended), this.format);
    return decision;
  }

  private appendText(text: string, format: LogFormat): void {
    const { records, skipped } = this.ingest(splitLines(text), format, this.history);
    if (records.length === 0) return;
    const { evicted } = this.cache.append(records);
    const projection = this.projector.projectAppend(records, this.criteria());
    this.emitStream("records_appended", {
      appended: records.length,
      evicted,
      skipped,
      rows: projection.rows,
      reprojectNeeded: projection.reprojectNeeded,
      cachedRecords: this.cache.size,
    });
  }

  private disableTailing(error: unknown): void {
    log.warn(`tailing stopped for ${this.sourcePath}: ${errorMessage(error)}`);
    this.setState("tailing_disabled");
    this.reportError(error);
  }

  /** Any user interaction; resumes tailing paused by the idle timeout. */
  touch(): void {
    this.lastActivityMs = this.now();
    if (!this.tailingPaused) return;
    this.tailingPaused = false;
    log.info("activity; tailing resumed");
    this.emitStream("state_changed", { status: this.getStatus() });
    if (this.started) this.scheduleNextTick(0);
  }

  reportError(error: unknown): void {
    this.lastError = errorMessage(error);
    this.emitStream("session_error", {
      category: isKnxLensError(error) ? error.category : "internal",
      message: this.lastError,
    });
  }

  private setState(state: SessionState): void {
    if (this.state === state) return;
    this.state = state;
    this.emitStream("state_changed", { status: this.getStatus() });
  }

  private scheduleNextTick(delayMs = this.pollIntervalMs): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.poll().catch((error: unknown) => log.error(`poll failed: ${errorMessage(error)}`));
    }, Math.max(0, delayMs));
  }


  private emitStream(type: StreamEnvelope["type"], payload: Record<string, unknown>): void {
    this.streamVersion += 1;
    const envelope: StreamEnvelope = {
      id: String(this.streamVersion),
      type,
      version: this.streamVersion,
      payload,
    };
    this.emit("stream", { envelope } satisfies LogSessionEvent);
  }

  private criteria(): FilterCriteria {
    return buildCriteria(this.selection, this.globalRegex);
  }

  private filtersChanged(): void {
    this.projector.rearm();
    this.emitStream("filters_changed", {
      selectedKeys: Array.from(this.selection.selectedKeys),
      activeNamedFilters: Array.from(this.selection.activeNamedFilters),
      globalPattern: this.globalPattern,
    });
  }

  getRows(): ProjectionResult {
    return this.projector.project(this.cache.records(), this.criteria());
  }

  takeWarning(): string | null {
    return this.projector.takeWarning();
  }

  private viewFor(kind: TreeKind, search = ""): TreeView {
    const text = search.trim();
    if (!text) return this.trees[kind];
    const cached = this.filteredTrees.get(kind);
    if (cached && cached.text === text) return cached.view;
    const view = this.trees[kind].filter(text);
    this.filteredTrees.set(kind, { text, view });
    return view;
  }

  getTree(kind: TreeKind, search?: string): RenderedTreeNode {
    return this.viewFor(kind, search).render(this.selection, this.history);
  }

  /** Toggles a node of the tree as currently shown, i.e. with the same search applied. */
  toggleNode(kind: TreeKind, nodeId: string, search?: string): ToggleOutcome {
    this.touch();
    const outcome = this.viewFor(kind, search).toggle(nodeId, this.selection);
    if (outcome !== "noop") this.filtersChanged();
    return outcome;
  }

  /** Adds destination keys to the selection directly, bypassing the trees. */
  selectKeys(keys: Iterable<string>): void {
    this.touch();
    this.selection.select(keys);
    this.filtersChanged();
  }

  clearSelection(): void {
    this.touch();
    this.selection.clear();
    this.filtersChanged();
  }

  /** Throws InvalidPatternError and keeps the previous regex when `pattern` does not compile. */
  setGlobalRegex(pattern: string): void {
    this.touch();
    this.globalRegex = compileGlobalRegex(pattern);
    this.globalPattern = this.globalRegex ? pattern : "";
    this.filtersChanged();
  }

  /** Changing the time window rebuilds the cache from the file. */
  async setTimeFilter(start: string, end: string): Promise<void> {
    for (const value of [start, end]) {
      if (value.trim() && !parseTimeOfDay(value)) throw new InvalidTimeError(value);
    }
    this.timeFilter = createTimeFilter(start, end);
    this.filtersChanged();
    if (this.state !== "closed") await this.reload();
  }

  listNamedFilters(): NamedFilterDefinition[] {
    return this.namedFilters?.list() ?? [];
  }

  getNamedFilterTree(): RenderedTreeNode {
    return renderNamedFilterTree(this.listNamedFilters(), this.selection, this.history);
  }

  toggleNamedFilter(name: string): boolean {
    this.touch();
    if (!this.selection.namedFilters.has(name)) {
      throw new FilterStoreError(`unknown named filter: ${name}`);
    }
    const active = this.selection.toggleNamedFilter(name);
    this.filtersChanged();
    return active;
  }

  private requireStore(): NamedFilterStore {
    if (!this.namedFilters) throw new FilterStoreError("no named filter store configured");
    return this.namedFilters;
  }

  private afterStoreChange(): void {
    this.selection.setNamedFilters(this.requireStore().rules());
    this.filtersChanged();
  }

  async saveNamedFilter(name: string, rules: readonly string[]): Promise<void> {
    this.touch();
    await this.requireStore().upsert(name, rules);
    this.afterStoreChange();
  }

  async addNamedFilterRule(name: string, rule: string): Promise<void> {
    this.touch();
    await this.requireStore().addRule(name, rule);
    this.afterStoreChange();
  }

  async removeNamedFilterRule(name: string, rule: string): Promise<void> {
    this.touch();
    await this.requireStore().removeRule(name, rule);
    this.afterStoreChange();
  }

  async deleteNamedFilter(name: string): Promise<void> {
    this.touch();
    await this.requireStore().remove(name);
    this.afterStoreChange();
  }

  async renameNamedFilter(from: string, to: string): Promise<void> {
    this.touch();
    const wasActive = this.selection.activeNamedFilters.has(from);
    await this.requireStore().rename(from, to);
    this.afterStoreChange();
    if (wasActive) this.selection.toggleNamedFilter(to.trim());
  }
}
