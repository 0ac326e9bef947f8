import Fastify, { FastifyInstance, FastifyReply } from "fastify";
import sensible from "@fastify/sensible";
import { z } from "zod";
import { CurationError, ErrorKind, isCurationError } from "./errors";
import { metricsRegistry } from "./metrics";
import type { CurationService, ServiceResult } from "./services/curationService";
import type { RecordKey, Stage, Status } from "./types/records";

export interface ServerOptions {
  service: CurationService;
  apiKey: string;
  /** Fastify request logging; tests turn it off. */
  logger?: boolean;
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidInput: 400,
  NotFound: 404,
  DuplicatePending: 409,
  Conflict: 409,
  InvalidState: 409,
  LineageUnresolved: 422,
  IOFailure: 500,
  RemoteUnavailable: 502,
  AuthRejected: 502,
  RemoteConflict: 502,
};

export function statusForKind(kind: ErrorKind) {
  return STATUS_BY_KIND[kind];
}

const stageSchema = z.enum(["raw", "cleaned", "chunked"]);
const documentStageSchema = z.enum(["raw", "cleaned"]);
const statusSchema = z.enum(["pending", "approved"]);
const metadataSchema = z.record(z.unknown());

const rawSubmitSchema = z.object({
  filename: z.string().min(1),
  content: z.string(),
  language: z.string().min(1),
  source: z.string().min(1),
  category: z.string().nullable().optional(),
  metadata: metadataSchema.optional(),
});

const cleanedSubmitSchema = z.object({
  filename: z.string().min(1),
  content: z.string(),
  source_filename: z.string().min(1),
  language: z.string().min(1).optional(),
  source: z.string().min(1).optional(),
  category: z.string().nullable().optional(),
  metadata: metadataSchema.optional(),
});

const chunkSubmitSchema = z.object({
  source_filename: z.string().min(1),
  language: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
  chunks: z
    .array(
      z.object({
        text: z.string(),
        overlap: z.number().int().nonnegative().nullable().optional(),
      }),
    )
    .min(1),
});

const keySchema = z.object({
  stage: stageSchema,
  filename: z.string().min(1),
  chunk_index: z.coerce.number().int().nonnegative().optional(),
});

const listQuerySchema = z.object({ stage: stageSchema.optional() });

const itemQuerySchema = keySchema.extend({ status: statusSchema.default("pending") });

const updateSchema = keySchema.extend({
  content: z.string().optional(),
  metadata: metadataSchema.optional(),
});

const rejectSchema = keySchema.extend({ reason: z.string().min(1) });

const approveAllSchema = z.object({
  stage: stageSchema,
  filename: z.string().min(1).optional(),
});

const pushSchema = z.object({
  stage: stageSchema.optional(),
  filename: z.string().min(1).optional(),
});

const deleteSchema = z.object({
  filename: z.string().min(1),
  type: z.enum(["raw", "cleaned", "chunks", "all"]).default("all"),
});

const publishedUrlSchema = z.object({
  stage: documentStageSchema,
  filename: z.string().min(1),
  expires: z.coerce.number().int().positive().optional(),
});

const remoteFilesSchema = z.object({ stage: stageSchema });

const remoteContentSchema = z.object({
  stage: documentStageSchema,
  filename: z.string().min(1),
});

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new CurationError("InvalidInput", message);
  }
  return parsed.data;
}

function toKey(input: z.infer<typeof keySchema>): RecordKey {
  if (input.stage !== "chunked") {
    return { stage: input.stage, filename: input.filename };
  }
  if (input.chunk_index === undefined) {
    throw new CurationError("InvalidInput", "chunk_index is required for chunked items", { field: "chunk_index" });
  }
  return { stage: "chunked", filename: input.filename, chunkIndex: input.chunk_index };
}

function actorOf(headers: Record<string, string | string[] | undefined>) {
  const actor = headers["x-actor"];
  return typeof actor === "string" && actor.trim() ? actor.trim() : "admin";
}

function respond(reply: FastifyReply, result: ServiceResult<unknown>, successCode = 200) {
  reply.code(result.success ? successCode : statusForKind(result.error.kind));
  return result;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const { service } = options;
  const app = Fastify({
    logger: options.logger === false ? false : { level: process.env.LOG_LEVEL ?? "info" },
  });
  await app.register(sensible);

  app.addHook("onRequest", async (request) => {
    if (!request.url.startsWith("/api/")) {
      return;
    }
    const header = request.headers["x-api-key"];
    if (header !== options.apiKey) {
      throw app.httpErrors.unauthorized("Invalid or missing API key");
    }
  });

  app.setErrorHandler((error, request, reply) => {
    if (isCurationError(error)) {
      reply.code(statusForKind(error.kind)).send({
        success: false,
        error: { kind: error.kind, message: error.message, details: error.details },
      });
      return;
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }
    reply.code(statusCode).send({
      success: false,
      error: {
        kind: statusCode === 401 ? "Unauthorized" : statusCode < 500 ? "InvalidInput" : "IOFailure",
        message: statusCode < 500 ? error.message : "Internal error",
      },
    });
  });

  app.get("/healthz", async () => ({ status: "ok" }));
  app.get("/metrics", async (_, reply) => {
    reply.header("content-type", metricsRegistry.contentType);
    return metricsRegistry.metrics();
  });

  app.post("/api/raw/submit", async (request, reply) => {
    const body = parse(rawSubmitSchema, request.body);
    const result = await service.submit({
      stage: "raw",
      filename: body.filename,
      content: body.content,
      language: body.language,
      source: body.source,
      category: body.category,
      metadata: body.metadata,
      submittedBy: actorOf(request.headers),
    });
    return respond(reply, result, 201);
  });

  app.post("/api/cleaning/submit", async (request, reply) => {
    const body = parse(cleanedSubmitSchema, request.body);
    const result = await service.submit({
      stage: "cleaned",
      filename: body.filename,
      content: body.content,
      sourceFilename: body.source_filename,
      language: body.language,
      source: body.source,
      category: body.category,
      metadata: body.metadata,
      submittedBy: actorOf(request.headers),
    });
    return respond(reply, result, 201);
  });

  app.post("/api/chunking/submit", async (request, reply) => {
    const body = parse(chunkSubmitSchema, request.body);
    const result = await service.submit({
      stage: "chunked",
      sourceFilename: body.source_filename,
      chunks: body.chunks,
      language: body.language,
      category: body.category,
      submittedBy: actorOf(request.headers),
    });
    return respond(reply, result, 201);
  });

  const listRoute = (status: Status) => async (stage: Stage | undefined) => {
    if (stage === "chunked") {
      return service.listChunkGroups(status);
    }
    if (stage) {
      return service.list(stage, status);
    }
    const [raw, cleaned, chunked] = await Promise.all([
      service.list("raw", status),
      service.list("cleaned", status),
      service.listChunkGroups(status),
    ]);
    if (!raw.success) return raw;
    if (!cleaned.success) return cleaned;
    if (!chunked.success) return chunked;
    return { success: true as const, data: { raw: raw.data, cleaned: cleaned.data, chunked: chunked.data } };
  };

  app.get("/api/admin/pending", async (request, reply) => {
    const query = parse(listQuerySchema, request.query);
    return respond(reply, await listRoute("pending")(query.stage));
  });

  app.get("/api/admin/approved", async (request, reply) => {
    const query = parse(listQuerySchema, request.query);
    return respond(reply, await listRoute("approved")(query.stage));
  });

  app.get("/api/admin/item", async (request, reply) => {
    const query = parse(itemQuerySchema, request.query);
    return respond(reply, await service.get(query.status, toKey(query)));
  });

  app.post("/api/admin/update", async (request, reply) => {
    const body = parse(updateSchema, request.body);
    const result = await service.update(
      toKey(body),
      { content: body.content, metadata: body.metadata },
      actorOf(request.headers),
    );
    return respond(reply, result);
  });

  app.post("/api/admin/approve", async (request, reply) => {
    const body = parse(keySchema, request.body);
    return respond(reply, await service.approve(toKey(body), actorOf(request.headers)));
  });

  app.post("/api/admin/reject", async (request, reply) => {
    const body = parse(rejectSchema, request.body);
    return respond(reply, await service.reject(toKey(body), body.reason, actorOf(request.headers)));
  });

  app.post("/api/admin/approve-all", async (request, reply) => {
    const body = parse(approveAllSchema, request.body);
    return respond(reply, await service.approveAll(body.stage, body.filename, actorOf(request.headers)));
  });

  app.get("/api/admin/stats", async (_request, reply) => respond(reply, await service.stats()));

  app.get("/api/admin/lineage/dangling", async (_request, reply) => respond(reply, await service.danglingLineage()));

  app.get("/api/admin/approved-files", async (_request, reply) => respond(reply, await service.approvedFiles()));

  app.post("/api/admin/push", async (request, reply) => {
    const body = parse(pushSchema, request.body);
    return respond(reply, await service.syncAll(body));
  });

  app.delete("/api/admin/delete-approved", async (request, reply) => {
    const body = parse(deleteSchema, request.body ?? request.query);
    return respond(reply, await service.deleteApproved(body.filename, body.type, actorOf(request.headers)));
  });

  app.get("/api/admin/published-url", async (request, reply) => {
    const query = parse(publishedUrlSchema, request.query);
    return respond(reply, await service.publishedUrl(query.stage, query.filename, query.expires));
  });

  app.get("/api/admin/remote-files", async (request, reply) => {
    const query = parse(remoteFilesSchema, request.query);
    return respond(reply, await service.remoteFiles(query.stage));
  });

  app.get("/api/admin/remote-content", async (request, reply) => {
    const query = parse(remoteContentSchema, request.query);
    return respond(reply, await service.remoteContent(query.stage, query.filename));
  });

  return app;
}
