import { z } from "zod";

export const startRunSchema = z.object({
  baseDir: z.string().trim().min(1).max(500),
  techStack: z.string().trim().min(1).max(200).optional(),
  includeResearch: z.boolean().optional(),
  includeDataModel: z.boolean().optional()
});

export const idParamsSchema = z.object({
  id: z.string().min(1)
});

export const pendingApprovalsQuerySchema = z.object({
  runId: z.string().min(1).optional()
});

export const approvalDecisionSchema = z.object({
  decision: z.enum(["approve", "reject"]),
  note: z.string().max(500).optional()
});
