import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { z } from "zod";
import { PLATFORMS } from "@mention-pulse/collector";
import type { buildHealthPayload, buildPlatformStatus } from "./health.js";
import { logRecoverableError } from "./error_utils.js";
import { logger } from "./logger.js";
import { registry } from "./metrics.js";
import { error, ok, waiting } from "./responses.js";
import { generateSummary } from "./summary_generator.js";
import { CATEGORIES, type AggregateCountView, type Granularity, type KeywordSet } from "./types.js";

const timestamp = z
  .string()
  .trim()
  .min(1)
  .refine((value) => Number.isFinite(Date.parse(value)), { message: "must be an ISO-8601 timestamp" })
  .transform((value) => new Date(Date.parse(value)).toISOString());

const CountQuerySchema = z
  .object({
    source: z.enum(PLATFORMS).optional(),
    category: z.enum(CATEGORIES).optional(),
    keyword: z.string().trim().min(1).optional(),
    from: timestamp.optional(),
    to: timestamp.optional(),
  })
  .refine((query) => query.from === undefined || query.to === undefined || query.from < query.to, {
    message: "from must be earlier than to",
    path: ["from"],
  });

const SummaryQuerySchema = z.object({
  source: z.enum(PLATFORMS).optional(),
});

const VideosQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

function describeIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "query"}: ${issue.message}`).join("; ");
}

export interface HttpServerDeps {
  view: AggregateCountView;
  keywordSet: KeywordSet;
  granularity: Granularity;
  getHealth: () => ReturnType<typeof buildHealthPayload>;
  getPlatformStatus: () => ReturnType<typeof buildPlatformStatus>;
}

export async function buildHttpServer(deps: HttpServerDeps): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  await server.register(cors, { origin: true, credentials: true });
  await server.register(helmet, { global: true });

  server.setErrorHandler((err, request, reply) => {
    logRecoverableError(logger, err, { location: "http", metadata: { url: request.url } }, "Unhandled HTTP error");
    void reply.code(500).send(error("Internal server error"));
  });

  server.get("/health", async () => deps.getHealth());

  server.get("/api/status", async () => ok(deps.getPlatformStatus()));

  server.get("/api/keywords", async () =>
    ok({ version: deps.keywordSet.version, categories: deps.keywordSet.categories }),
  );

  server.get("/api/counts", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = CountQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send(error(describeIssues(parsed.error.issues)));
    }
    const entries = deps.view.counts(parsed.data);
    if (entries.length === 0) {
      return waiting("No mention counts available yet for this filter");
    }
    return { status: "ok" as const, granularity: deps.granularity, data: entries };
  });

  server.get("/api/totals", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = CountQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send(error(describeIssues(parsed.error.issues)));
    }
    const totals = deps.view.totals(parsed.data);
    if (totals.length === 0) {
      return waiting("No mention totals available yet for this filter");
    }
    return ok(totals);
  });

  server.get("/api/summary", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = SummaryQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send(error(describeIssues(parsed.error.issues)));
    }
    const summary = generateSummary(deps.view, parsed.data.source);
    if (summary.totalItems === 0) {
      return waiting("No items aggregated yet");
    }
    return ok(summary);
  });

  server.get("/api/videos", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = VideosQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send(error(describeIssues(parsed.error.issues)));
    }
    const videos = deps.view.topVideos(parsed.data.limit);
    if (videos.length === 0) {
      return waiting("No videos aggregated yet");
    }
    return ok(videos);
  });

  return server;
}

export function buildMetricsServer(): FastifyInstance {
  const server = Fastify({ logger: false });

  server.get("/metrics", async (_request: FastifyRequest, reply: FastifyReply) => {
    const body = await registry.metrics();
    reply.header("Content-Type", registry.contentType);
    return reply.send(body);
  });

  return server;
}
