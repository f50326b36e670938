import type { PhaseName, PipelineEvent } from "../types";

export type PhaseStream<T> = AsyncGenerator<PipelineEvent, T, undefined>;

export const progress = (
  phase: PhaseName,
  message: string,
  data?: Record<string, unknown>
): PipelineEvent => ({ type: "progress", phase, message, ...(data ? { data } : {}) });

export const warning = (
  phase: PhaseName,
  message: string,
  data?: Record<string, unknown>
): PipelineEvent => ({ type: "progress", phase, message, level: "warn", ...(data ? { data } : {}) });
