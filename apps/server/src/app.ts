import path from "node:path";
import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import type { TreeKind } from "@knxlens/contracts";
import {
  applyEnvOverrides,
  DEFAULT_CONFIG_PATH,
  discoverLogFiles,
  errorMessage,
  isKnxLensError,
  loadConfig,
  LogSession,
  type LogSessionEvent,
  namedFilterNameFromId,
  TREE_KINDS,
} from "@knxlens/core";

const HEARTBEAT_MS = 15_000;

export interface CreateServerOptions {
  session: LogSession;
}

interface ToggleBody {
  kind?: string;
  id?: string;
  search?: string;
}

interface NamedFilterBody {
  name?: string;
  rules?: unknown;
}

interface RegexBody {
  pattern?: string;
}

interface TimeFilterBody {
  start?: string;
  end?: string;
}

interface OpenBody {
  path?: string;
}

/** Forwards session envelopes as SSE frames. Listening is not activity: tailing may still pause. */
export function subscribeToStream(session: LogSession, write: (chunk: string) => void): () => void {
  const onStream = ({ envelope }: LogSessionEvent) => {
    write(`event: ${envelope.type}\ndata: ${JSON.stringify(envelope)}\n\n`);
  };
  session.on("stream", onStream);
  return () => {
    session.off("stream", onStream);
  };
}

function isTreeKind(value: string | undefined): value is TreeKind {
  return TREE_KINDS.some((kind) => kind === value);
}

export function statusForError(error: unknown): number {
  if (!isKnxLensError(error)) return 500;
  switch (error.category) {
    case "source_not_found":
    case "archive_missing_member":
    case "catalog_load":
      return 404;
    case "invalid_pattern":
    case "invalid_time":
    case "filter_store":
      return 400;
    case "format_undetermined":
      return 422;
  }
}

function sendError(reply: FastifyReply, error: unknown): { error: string; category: string } {
  reply.code(statusForError(error));
  return { error: errorMessage(error), category: isKnxLensError(error) ? error.category : "internal" };
}

function asRuleList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  return value.filter((item): item is string => typeof item === "string");
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  const session = options.session;
  const selectedKeys = () => Array.from(session.selection.selectedKeys).sort();

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/status", async () => ({ status: session.getStatus() }));

  server.get("/api/rows", async () => {
    const projection = session.getRows();
    return { ...projection, warning: session.takeWarning() };
  });

  server.get<{ Params: { kind: string }; Querystring: { search?: string } }>(
    "/api/trees/:kind",
    async (request, reply) => {
      const { kind } = request.params;
      if (kind === "named") {
        return { tree: session.getNamedFilterTree() };
      }
      if (!isTreeKind(kind)) {
        reply.code(404);
        return { error: `unknown tree: ${kind}` };
      }
      return { tree: session.getTree(kind, request.query.search) };
    },
  );

  server.post<{ Body: ToggleBody | undefined }>("/api/selection/toggle", async (request, reply) => {
    const { kind, id, search } = request.body ?? {};
    const filterName = kind === "named" && id ? namedFilterNameFromId(id) : null;
    if (filterName !== null) {
      try {
        const active = session.toggleNamedFilter(filterName);
        return { outcome: active ? "selected" : "deselected", selectedKeys: selectedKeys() };
      } catch (error) {
        return sendError(reply, error);
      }
    }
    if (!isTreeKind(kind) || !id) {
      reply.code(400);
      return { error: "expected { kind, id }" };
    }
    const outcome = session.toggleNode(kind, id, search);
    return { outcome, selectedKeys: selectedKeys() };
  });

  server.post("/api/selection/clear", async () => {
    session.clearSelection();
    return { ok: true };
  });

  server.get("/api/named-filters", async () => ({
    filters: session.listNamedFilters(),
    active: Array.from(session.selection.activeNamedFilters),
  }));

  server.post<{ Body: NamedFilterBody | undefined }>("/api/named-filters", async (request, reply) => {
    const name = request.body?.name?.trim() ?? "";
    const rules = asRuleList(request.body?.rules);
    if (!name || !rules) {
      reply.code(400);
      return { error: "expected { name, rules: string[] }" };
    }
    try {
      await session.saveNamedFilter(name, rules);
      return { filters: session.listNamedFilters() };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.delete<{ Params: { name: string } }>("/api/named-filters/:name", async (request, reply) => {
    try {
      await session.deleteNamedFilter(request.params.name);
      return { filters: session.listNamedFilters() };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.post<{ Params: { name: string } }>("/api/named-filters/:name/toggle", async (request, reply) => {
    try {
      return { active: session.toggleNamedFilter(request.params.name) };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.post<{ Body: RegexBody | undefined }>("/api/regex", async (request, reply) => {
    try {
      session.setGlobalRegex(request.body?.pattern ?? "");
      return { pattern: session.getGlobalPattern() };
    } catch (error) {
      return { ...sendError(reply, error), pattern: session.getGlobalPattern() };
    }
  });

  server.post<{ Body: TimeFilterBody | undefined }>("/api/time-filter", async (request, reply) => {
    try {
      await session.setTimeFilter(request.body?.start ?? "", request.body?.end ?? "");
      return { timeFilter: session.getTimeFilter(), status: session.getStatus() };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.post("/api/reload", async (_request, reply) => {
    try {
      await session.reload();
      return { status: session.getStatus() };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.get("/api/logs", async () => ({
    files: await discoverLogFiles(path.dirname(session.getSourcePath())),
  }));

  server.post<{ Body: OpenBody | undefined }>("/api/open", async (request, reply) => {
    const target = request.body?.path?.trim();
    if (!target) {
      reply.code(400);
      return { error: "expected { path }" };
    }
    try {
      await session.openFile(target);
      return { status: session.getStatus() };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.get("/api/stream", async (request, reply) => {
    reply.raw.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    reply.raw.setHeader("Cache-Control", "no-cache, no-transform");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.setHeader("X-Accel-Buffering", "no");

    reply.raw.write(
      `event: snapshot\ndata: ${JSON.stringify({
        id: "0",
        type: "snapshot",
        version: 0,
        payload: { status: session.getStatus() },
      })}\n\n`,
    );

    const unsubscribe = subscribeToStream(session, (chunk) => reply.raw.write(chunk));

    const heartbeat = setInterval(() => {
      reply.raw.write(`event: heartbeat\ndata: ${JSON.stringify({ ts: Date.now() })}\n\n`);
    }, HEARTBEAT_MS);

    request.raw.on("close", () => {
      clearInterval(heartbeat);
      unsubscribe();
      reply.raw.end();
    });
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
  logFile?: string;
}

export async function runServer(options: RunServerOptions = {}): Promise<FastifyInstance> {
  const host = options.host ?? process.env.KNXLENS_HOST ?? "127.0.0.1";
  const port = options.port ?? Number(process.env.KNXLENS_PORT ?? "8788");
  const configPath = options.configPath ?? process.env.KNXLENS_CONFIG ?? DEFAULT_CONFIG_PATH;

  const config = applyEnvOverrides(await loadConfig(configPath));
  const session = await LogSession.fromConfig(config, { configPath, sourcePath: options.logFile });
  await session.start();

  const server = await createServer({ session });
  await server.listen({ host, port });

  process.on("SIGINT", () => {
    session.stop();
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(errorMessage(error));
        process.exit(1);
      });
  });

  console.log(`knx-lens server: http://${host}:${port}`);
  return server;
}
