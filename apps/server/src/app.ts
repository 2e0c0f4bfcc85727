import Fastify, { type FastifyInstance } from "fastify";
import type { SessionNode, SessionSummary } from "@sessionpane/contracts";
import {
  DEFAULT_CONFIG_PATH,
  createManager,
  getLogger,
  initLogger,
  loadConfig,
  projectLogDirectory,
  SessionTail,
  toSessionSummary,
  type SessionManager,
  type SessionTailEvent,
} from "@sessionpane/core";

const HEARTBEAT_INTERVAL_MS = 15_000;

export interface CreateServerOptions {
  tail: SessionTail;
  heartbeatMs?: number;
}

export interface TreeNodeView {
  sessionId: string;
  session: SessionSummary;
  expanded: boolean;
  children: TreeNodeView[];
}

function toTreeView(nodes: readonly SessionNode[]): TreeNodeView[] {
  return nodes.map((node) => ({
    sessionId: node.sessionId,
    session: toSessionSummary(node.session),
    expanded: node.expanded,
    children: toTreeView(node.children),
  }));
}

function slotsView(manager: SessionManager): { count: number; slots: Array<SessionSummary | null> } {
  return {
    count: manager.slotCount(),
    slots: manager.slotOccupants().map((session) => (session ? toSessionSummary(session) : null)),
  };
}

function isTruthyFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  const tail = options.tail;
  const manager = tail.manager;
  const heartbeatMs = options.heartbeatMs ?? HEARTBEAT_INTERVAL_MS;
  let previousTree: SessionNode[] = [];

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/sessions", async () =>
    manager.shared(() => ({ sessions: manager.allSessions().map(toSessionSummary) })),
  );

  server.get("/api/session/:id", async (request, reply) => {
    const params = request.params as { id: string };
    const session = await manager.shared(() => manager.get(params.id));
    if (!session) {
      reply.code(404);
      return { error: `unknown session: ${params.id}` };
    }
    return {
      session: toSessionSummary(session),
      excluded: manager.isExcluded(session.id),
      messages: session.messages,
    };
  });

  server.get("/api/slots", async () => manager.shared(() => slotsView(manager)));

  server.post("/api/slots", async (request, reply) => {
    const body = (request.body ?? {}) as { count?: unknown };
    if (typeof body.count !== "number") {
      reply.code(400);
      return { error: "count must be a number" };
    }
    await tail.resizeSlots(body.count);
    return manager.shared(() => slotsView(manager));
  });

  server.get("/api/tree", async (request) => {
    const query = request.query as { preserve?: string };
    return manager.shared(() => {
      const tree = isTruthyFlag(query.preserve) ? manager.buildPreservingOrder(previousTree) : manager.buildSorted();
      previousTree = tree;
      return { tree: toTreeView(tree) };
    });
  });

  server.get("/api/stream", async (request, reply) => {
    reply.raw.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    reply.raw.setHeader("Cache-Control", "no-cache, no-transform");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.setHeader("X-Accel-Buffering", "no");

    const snapshot = await manager.shared(() => ({
      sessions: manager.allSessions().map(toSessionSummary),
      ...slotsView(manager),
    }));
    reply.raw.write(
      `event: snapshot\ndata: ${JSON.stringify({ id: "0", type: "snapshot", version: tail.version, payload: snapshot })}\n\n`,
    );

    const onStream = ({ envelope }: SessionTailEvent) => {
      reply.raw.write(`event: ${envelope.type}\ndata: ${JSON.stringify(envelope)}\n\n`);
    };

    const heartbeat = setInterval(() => {
      reply.raw.write(`event: heartbeat\ndata: ${JSON.stringify({ ts: Date.now() })}\n\n`);
    }, heartbeatMs);

    tail.on("stream", onStream);

    request.raw.on("close", () => {
      clearInterval(heartbeat);
      tail.off("stream", onStream);
      reply.raw.end();
    });
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
  /** Log directory to tail; defaults to the directory of `project`. */
  root?: string;
  project?: string;
}

export async function runServer(options: RunServerOptions = {}): Promise<void> {
  const host = options.host ?? process.env.SESSIONPANE_HOST ?? "127.0.0.1";
  const port = options.port ?? Number(process.env.SESSIONPANE_PORT ?? "8790");
  const configPath = options.configPath ?? process.env.SESSIONPANE_CONFIG ?? DEFAULT_CONFIG_PATH;

  const config = await loadConfig(configPath);
  initLogger(config.log.level, config.log.format);
  const root = options.root ?? projectLogDirectory(options.project ?? process.cwd(), config.watch.claudeHome);

  const tail = new SessionTail({ root, manager: createManager(config), debounceMs: config.watch.debounceMs });
  await tail.start();

  const server = await createServer({ tail });
  await server.listen({ host, port });

  process.on("SIGINT", () => {
    void Promise.all([tail.stop(), server.close()]).finally(() => process.exit(0));
  });

  getLogger().info(`sessionpane server: http://${host}:${port} (watching ${root})`);
}
