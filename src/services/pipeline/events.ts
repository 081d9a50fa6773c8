// ─────────────────────────────────────────────────────────────────────────────
// Pipeline diagnostics: opt-in event hook shared by every stage
// ─────────────────────────────────────────────────────────────────────────────

export type PipelineStage = 'load' | 'validate' | 'classify' | 'summarize' | 'export';

/** Known event types */
export type PipelineEventType =
  | 'audit.load.completed'
  | 'audit.validate.row_checked'
  | 'audit.validate.completed'
  | 'audit.classify.row_classified'
  | 'audit.classify.completed'
  | 'audit.summarize.completed'
  | 'audit.export.completed'
  | 'audit.stage.failed';

export interface PipelineEvent {
  event_type: PipelineEventType;
  stage: PipelineStage;
  payload: Record<string, unknown>;
  created_at: string;
}

export type PipelineEventHandler = (event: PipelineEvent) => void;

/** Options accepted by every stage. Stages stay silent without `onEvent`. */
export interface StageOptions {
  onEvent?: PipelineEventHandler;
}

export function emit(
  options: StageOptions,
  stage: PipelineStage,
  eventType: PipelineEventType,
  payload: Record<string, unknown>,
): void {
  if (!options.onEvent) return;
  options.onEvent({
    event_type: eventType,
    stage,
    payload,
    created_at: new Date().toISOString(),
  });
}

/** Handler that writes each event as one console line. */
export const consoleEventLogger: PipelineEventHandler = (event) => {
  console.debug(`[${event.event_type}] ${JSON.stringify(event.payload)}`);
};
