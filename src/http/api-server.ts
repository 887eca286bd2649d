import http from "node:http";
import { z } from "zod";

import { errorMessage, logger } from "../lib/logger.js";
import type { CredentialService } from "../services/credential-service.js";
import type { EventLedgerService } from "../services/event-ledger-service.js";
import type { RateLimitService } from "../services/rate-limit-service.js";
import { codeBodySchema, logEntrySchema, usageEventSchema, validate } from "./schemas.js";

export const API_VERSION = "0.1.0";

const MAX_BODY_BYTES = 64 * 1024;
const HOUR = 60 * 60;
const MINUTE = 60;

export interface ApiServerOptions {
  port: number;
  allowedOrigins: "*" | string[];
  trustProxy: boolean;
}

interface RouteLimit {
  max: number;
  windowSeconds: number;
}

interface RequestContext {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  body: unknown;
}

interface Route {
  method: "GET" | "POST";
  path: string;
  limit?: RouteLimit;
  handle(ctx: RequestContext): Promise<void>;
}

type BearerHeader = { kind: "missing" } | { kind: "malformed" } | { kind: "token"; token: string };

const logBodySchema = z.object({ log: z.record(z.unknown()) });
const eventBodySchema = z.object({ event: z.record(z.unknown()) });

class BodyTooLargeError extends Error {}

export class ApiServer {
  private server: http.Server | null = null;
  private readonly routes: Route[];

  constructor(
    private readonly credentials: CredentialService,
    private readonly ledger: EventLedgerService,
    private readonly rateLimiter: RateLimitService,
    private readonly options: ApiServerOptions
  ) {
    this.routes = [
      {
        method: "POST",
        path: "/generate-code",
        limit: { max: 5, windowSeconds: HOUR },
        handle: (ctx) => this.handleGenerateCode(ctx)
      },
      {
        method: "POST",
        path: "/login",
        limit: { max: 10, windowSeconds: MINUTE },
        handle: (ctx) => this.handleLogin(ctx)
      },
      {
        method: "POST",
        path: "/generate-token",
        limit: { max: 10, windowSeconds: MINUTE },
        handle: (ctx) => this.handleGenerateToken(ctx)
      },
      {
        method: "POST",
        path: "/logs",
        limit: { max: 100, windowSeconds: MINUTE },
        handle: (ctx) => this.handleSaveLog(ctx)
      },
      {
        method: "GET",
        path: "/logs",
        limit: { max: 100, windowSeconds: MINUTE },
        handle: (ctx) => this.withToken(ctx, (code) => this.handleGetLogs(ctx, code))
      },
      {
        method: "POST",
        path: "/events",
        limit: { max: 100, windowSeconds: MINUTE },
        handle: (ctx) => this.withToken(ctx, (code) => this.handleSaveEvent(ctx, code))
      },
      {
        method: "GET",
        path: "/events",
        limit: { max: 100, windowSeconds: MINUTE },
        handle: (ctx) => this.withToken(ctx, (code) => this.handleGetEvents(ctx, code))
      },
      {
        method: "GET",
        path: "/code",
        limit: { max: 10, windowSeconds: MINUTE },
        handle: (ctx) => this.withToken(ctx, async (code) => this.respondJson(ctx.res, 200, { code }))
      },
      {
        method: "GET",
        path: "/health",
        handle: async (ctx) => this.respondJson(ctx.res, 200, { status: "ok", version: API_VERSION })
      }
    ];
  }

  async start(): Promise<number> {
    const server = http.createServer((req, res) => {
      void this.handle(req, res);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    const port = typeof address === "object" && address !== null ? address.port : this.options.port;
    logger.info("API server listening", { port });
    return port;
  }

  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.server?.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });

    this.server = null;
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    try {
      this.applyCors(req, res);

      if (req.method === "OPTIONS") {
        res.statusCode = 204;
        res.end();
        return;
      }

      const host = req.headers.host ?? "localhost";
      const url = new URL(req.url ?? "/", `http://${host}`);
      const route = this.routes.find(
        (candidate) => candidate.path === url.pathname && candidate.method === req.method
      );

      if (!route) {
        const known = this.routes.some((candidate) => candidate.path === url.pathname);
        this.respondJson(res, known ? 405 : 404, { error: known ? "Method not allowed" : "Not found" });
        return;
      }

      if (route.limit && !(await this.withinLimit(req, res, route, route.limit))) {
        return;
      }

      const body = req.method === "POST" ? await readJsonBody(req) : {};
      await route.handle({ req, res, body });
    } catch (error) {
      if (error instanceof BodyTooLargeError) {
        this.respondJson(res, 413, { error: "Request body too large" });
        return;
      }

      logger.error("API request failed", {
        method: req.method,
        path: req.url,
        error: errorMessage(error)
      });
      if (!res.headersSent) {
        this.respondJson(res, 500, { error: "Internal server error" });
      }
    }
  }

  private async handleGenerateCode({ res }: RequestContext): Promise<void> {
    const code = await this.credentials.issueCode();
    this.respondJson(res, 200, { code });
  }

  private async handleLogin({ res, body }: RequestContext): Promise<void> {
    const code = readCode(body);
    if (!code) {
      this.respondJson(res, 400, { error: "Code is required" });
      return;
    }

    const result = await this.credentials.authenticateByCode(code);
    if (!result.ok) {
      this.respondJson(res, 400, { error: "Invalid code" });
      return;
    }

    this.respondJson(res, 200, { status: "ok" });
  }

  private async handleGenerateToken({ res, body }: RequestContext): Promise<void> {
    const code = readCode(body);
    if (!code) {
      this.respondJson(res, 400, { error: "Code is required" });
      return;
    }

    const result = await this.credentials.issueToken(code);
    if (!result.ok) {
      this.respondJson(res, 400, { error: "Invalid code" });
      return;
    }

    this.respondJson(res, 200, { token: result.token });
  }

  private async handleSaveLog({ req, res, body }: RequestContext): Promise<void> {
    const payload = logBodySchema.safeParse(body);
    if (!payload.success) {
      this.respondJson(res, 400, { error: "'log' (object) is required" });
      return;
    }

    const log = validate(logEntrySchema, payload.data.log, "log");
    if (!log.ok) {
      this.respondJson(res, 400, { error: log.error });
      return;
    }

    // A well-formed bearer token takes precedence over a code in the body.
    const bearer = parseBearer(req.headers.authorization);
    let code: string;
    if (bearer.kind === "token") {
      const resolved = await this.credentials.resolveToken(bearer.token);
      if (!resolved.ok) {
        this.respondJson(res, 401, { error: "Invalid token" });
        return;
      }
      code = resolved.code;
    } else {
      const bodyCode = readCode(body);
      if (!bodyCode) {
        this.respondJson(res, 400, {
          error: "Either 'code' in body or 'Authorization' header is required"
        });
        return;
      }
      if (!(await this.credentials.codeExists(bodyCode))) {
        this.respondJson(res, 400, { error: "Unknown code" });
        return;
      }
      code = bodyCode;
    }

    await this.ledger.appendLog(code, log.value);
    this.respondJson(res, 200, { status: "saved" });
  }

  private async handleGetLogs({ res }: RequestContext, code: string): Promise<void> {
    const logs = await this.ledger.listLogsWithMetadata(code);
    this.respondJson(res, 200, { logs });
  }

  private async handleSaveEvent({ res, body }: RequestContext, code: string): Promise<void> {
    const payload = eventBodySchema.safeParse(body);
    if (!payload.success) {
      this.respondJson(res, 400, { error: "'event' (object) is required" });
      return;
    }

    const event = validate(usageEventSchema, payload.data.event, "event");
    if (!event.ok) {
      this.respondJson(res, 400, { error: event.error });
      return;
    }

    const outcome = await this.ledger.appendEvent(code, event.value);
    this.respondJson(res, 200, { status: outcome === "inserted" ? "saved" : "duplicate" });
  }

  private async handleGetEvents({ res }: RequestContext, code: string): Promise<void> {
    const events = await this.ledger.listEvents(code);
    this.respondJson(res, 200, { events });
  }

  private async withToken(ctx: RequestContext, next: (code: string) => Promise<void>): Promise<void> {
    const bearer = parseBearer(ctx.req.headers.authorization);
    if (bearer.kind === "missing") {
      this.respondJson(ctx.res, 401, { error: "Authorization header required" });
      return;
    }
    if (bearer.kind === "malformed") {
      this.respondJson(ctx.res, 401, { error: "Invalid authorization format. Use: Bearer <token>" });
      return;
    }

    const resolved = await this.credentials.resolveToken(bearer.token);
    if (!resolved.ok) {
      this.respondJson(ctx.res, 401, { error: "Invalid token" });
      return;
    }

    await next(resolved.code);
  }

  private async withinLimit(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    route: Route,
    limit: RouteLimit
  ): Promise<boolean> {
    const key = `ratelimit:${route.method}:${route.path}:${this.clientAddress(req)}`;
    const decision = await this.rateLimiter.check(key, limit.max, limit.windowSeconds);
    if (decision.allowed) {
      return true;
    }

    res.setHeader("Retry-After", String(decision.retryAfterSeconds));
    this.respondJson(res, 429, {
      error: "Rate limit exceeded",
      message: `${limit.max} per ${limit.windowSeconds} seconds`
    });
    return false;
  }

  private clientAddress(req: http.IncomingMessage): string {
    if (this.options.trustProxy) {
      const forwarded = req.headers["x-forwarded-for"];
      const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(",")[0]?.trim();
      if (first) {
        return first;
      }
    }
    return req.socket.remoteAddress ?? "unknown";
  }

  private applyCors(req: http.IncomingMessage, res: http.ServerResponse): void {
    const { allowedOrigins } = this.options;
    if (allowedOrigins === "*") {
      res.setHeader("Access-Control-Allow-Origin", "*");
    } else {
      const origin = req.headers.origin;
      if (origin && allowedOrigins.includes(origin)) {
        res.setHeader("Access-Control-Allow-Origin", origin);
        res.setHeader("Access-Control-Allow-Credentials", "true");
        res.setHeader("Vary", "Origin");
      }
    }
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  }

  private respondJson(res: http.ServerResponse, statusCode: number, body: unknown): void {
    res.statusCode = statusCode;
    res.setHeader("Content-Type", "application/json; charset=utf-8");
    res.end(JSON.stringify(body));
  }
}

export function parseBearer(header: string | undefined): BearerHeader {
  const trimmed = header?.trim() ?? "";
  if (!trimmed) {
    return { kind: "missing" };
  }

  const parts = trimmed.split(/\s+/);
  const [scheme, token] = parts;
  if (parts.length !== 2 || scheme !== "Bearer" || !token) {
    return { kind: "malformed" };
  }
  return { kind: "token", token };
}

function readCode(body: unknown): string | null {
  const parsed = codeBodySchema.safeParse(body);
  return parsed.success ? parsed.data.code ?? null : null;
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new BodyTooLargeError("Request body too large");
    }
    chunks.push(buffer);
  }

  if (chunks.length === 0) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString("utf8"));
    return parsed;
  } catch {
    return {};
  }
}
