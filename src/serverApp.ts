import fastify, { FastifyInstance } from "fastify";
import { config } from "./config";
import {
  approvalDecisionSchema,
  pendingApprovalsQuerySchema,
  idParamsSchema,
  startRunSchema
} from "./schemas/pipelineSchemas";
import { ApprovalAlreadyDecidedError, ApprovalNotFoundError } from "./services/approvalQueue";
import type { RunStore } from "./services/runStore";
import type { ApprovalRequest, RunInput } from "./types";

export interface PipelineRunnerLike {
  launch(input: RunInput): string;
  decideInBackground(requestId: string, approved: boolean, note?: string): ApprovalRequest;
  pendingApprovals(runId?: string): ApprovalRequest[];
}

export interface ServerDeps {
  runs: RunStore;
  runner: PipelineRunnerLike;
  logger?: boolean;
}

export const buildApp = (deps: ServerDeps): FastifyInstance => {
  const app = fastify({ logger: deps.logger ?? true });

  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/tools/overview", async () => ({
    ok: true,
    service: "spec-pipeline",
    port: config.port,
    model: config.model,
    openaiBaseUrl: config.openaiBaseUrl,
    baseDir: config.baseDir,
    techStack: config.techStack,
    now: new Date().toISOString()
  }));

  app.get("/api/runs", async () => ({ runs: deps.runs.all() }));

  app.get("/api/runs/:id", async (request, reply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: params.error.flatten() });
    }

    const { id } = params.data;
    const run = deps.runs.get(id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }
    return { run, events: deps.runs.getEvents(id) };
  });

  app.get("/api/runs/:id/events", async (request, reply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: params.error.flatten() });
    }

    const { id } = params.data;
    if (!deps.runs.get(id)) {
      return reply.code(404).send({ error: "Run not found" });
    }

    reply.raw.setHeader("Content-Type", "text/event-stream");
    reply.raw.setHeader("Cache-Control", "no-cache");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.flushHeaders?.();

    const send = (data: unknown): void => {
      reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    for (const event of deps.runs.getEvents(id)) {
      send(event);
    }

    const unsubscribe = deps.runs.subscribe(id, (event) => send(event));

    request.raw.on("close", () => {
      unsubscribe();
      reply.raw.end();
    });
  });

  app.post("/api/runs", async (request, reply) => {
    const parsed = startRunSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const runId = deps.runner.launch(parsed.data);
    return reply.code(202).send({ runId });
  });

  app.get("/api/approvals", async (request, reply) => {
    const parsed = pendingApprovalsQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    return { approvals: deps.runner.pendingApprovals(parsed.data.runId) };
  });

  app.post("/api/approvals/:id/decision", async (request, reply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: params.error.flatten() });
    }

    const parsed = approvalDecisionSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    try {
      const approval = deps.runner.decideInBackground(
        params.data.id,
        parsed.data.decision === "approve",
        parsed.data.note
      );
      return reply.code(202).send({ approval });
    } catch (error: unknown) {
      if (error instanceof ApprovalNotFoundError) {
        return reply.code(404).send({ error: "Approval not found" });
      }
      if (error instanceof ApprovalAlreadyDecidedError) {
        return reply.code(409).send({ error: error.message, approval: error.request });
      }
      throw error;
    }
  });

  return app;
};
