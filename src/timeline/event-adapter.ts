/**
 * Timeline Event Adapter
 *
 * Replays structured agent events (one JSON object per line) through a
 * TimelineController. Stream chunks are mapped onto the controller's raw
 * content types; tool calls and tool outputs take the structured tool path.
 */

import { z } from 'zod';
import { ParseError, toError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { TimelineController } from './timeline-controller.js';

// =============================================================================
// EVENT SCHEMAS
// =============================================================================

export const TimelineEventSchema = z.object({
  event_type: z.string(),
  agent_id: z.string().nullish(),
  timestamp: z.string().nullish(),
  data: z.record(z.unknown()).default({}),
});

export type TimelineEvent = z.infer<typeof TimelineEventSchema>;

const ToolStartData = z.object({
  tool_id: z.string(),
  tool_name: z.string().default('unknown'),
  args: z.unknown().optional(),
});

const ToolCompleteData = z.object({
  tool_id: z.string(),
  tool_name: z.string().optional(),
  result: z.string().default(''),
  elapsed_seconds: z.number().nonnegative().optional(),
  is_error: z.boolean().default(false),
});

const ContentData = z.object({ content: z.string().default('') });

const StatusData = z.object({
  message: z.string().default(''),
  level: z.string().optional(),
});

const RoundStartData = z.object({
  round_number: z.number().int().positive().default(1),
  context_reset: z.boolean().default(false),
});

const ToolCallSchema = z.object({
  id: z.string(),
  function: z.object({
    name: z.string().default('unknown'),
    arguments: z.union([z.string(), z.record(z.unknown())]).default('{}'),
  }),
});

const StreamChunkData = z.object({
  chunk: z.object({
    type: z.string().default('unknown'),
    content: z.string().nullish(),
    status: z.string().nullish(),
    tool_call_id: z.string().nullish(),
    display: z.boolean().default(true),
    tool_calls: z.array(ToolCallSchema).default([]),
  }),
});

// =============================================================================
// CHUNK TYPE MAPPING
// =============================================================================

const CHUNK_RAW_TYPES: ReadonlyMap<string, string> = new Map([
  ['mcp_status', 'tool'],
  ['custom_tool_status', 'tool'],
  ['tool', 'tool'],
  ['reasoning', 'thinking'],
  ['reasoning_done', 'thinking'],
  ['reasoning_summary', 'thinking'],
  ['reasoning_summary_done', 'thinking'],
  ['thinking', 'thinking'],
  ['content', 'content'],
  ['text', 'content'],
  ['status', 'status'],
  ['backend_status', 'status'],
  ['system_status', 'status'],
  ['error', 'status'],
  ['presentation', 'presentation'],
  ['final_answer', 'presentation'],
  ['restart', 'restart'],
]);

/**
 * Controller raw type for a stream chunk type, or null when the chunk is
 * not displayed.
 */
export function mapChunkType(chunkType: string): string | null {
  return CHUNK_RAW_TYPES.get(chunkType) ?? null;
}

// =============================================================================
// ADAPTER
// =============================================================================

export interface EventAdapterStats {
  processed: number;
  skipped: number;
  invalid: number;
}

export interface TimelineEventAdapterOptions {
  controller: TimelineController;
  /** Only replay events from this agent */
  agentId?: string;
  logger?: StructuredLogger;
}

export class TimelineEventAdapter {
  private readonly controller: TimelineController;
  private readonly agentId?: string;
  private readonly logger: StructuredLogger;
  private readonly stats: EventAdapterStats = { processed: 0, skipped: 0, invalid: 0 };

  constructor(options: TimelineEventAdapterOptions) {
    this.controller = options.controller;
    this.agentId = options.agentId;
    this.logger = options.logger ?? createComponentLogger('event-adapter');
  }

  /**
   * Parse and replay one JSON line. Blank lines are ignored; malformed
   * lines are logged and counted.
   */
  processLine(line: string, lineNumber?: number): void {
    if (!line.trim()) {
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      this.reject(new ParseError('event line is not valid JSON', { line: lineNumber }, toError(err)));
      return;
    }

    const parsed = TimelineEventSchema.safeParse(raw);
    if (!parsed.success) {
      this.reject(new ParseError('event line does not match the event schema', {
        line: lineNumber,
        issues: parsed.error.issues.map((issue) => issue.message),
      }));
      return;
    }

    this.processEvent(parsed.data);
  }

  processEvent(event: TimelineEvent): void {
    if (this.agentId !== undefined && event.agent_id && event.agent_id !== this.agentId) {
      this.stats.skipped++;
      return;
    }

    const invalidBefore = this.stats.invalid;
    if (this.dispatch(event)) {
      this.stats.processed++;
    } else if (this.stats.invalid === invalidBefore) {
      this.stats.skipped++;
    }
  }

  /**
   * Emit any text still held in the controller's line buffer.
   */
  flush(): void {
    this.controller.flush();
  }

  getStats(): EventAdapterStats {
    return { ...this.stats };
  }

  // ─── Dispatch ───

  private dispatch(event: TimelineEvent): boolean {
    const timestamp = parseTimestamp(event.timestamp);

    switch (event.event_type) {
      case 'tool_start': {
        const data = this.parseData(ToolStartData, event);
        if (!data) return false;
        this.controller.processToolStart({
          toolId: data.tool_id,
          toolName: data.tool_name,
          ...(data.args !== undefined && { args: data.args }),
          ...(timestamp && { startTime: timestamp }),
        });
        return true;
      }

      case 'tool_complete': {
        const data = this.parseData(ToolCompleteData, event);
        if (!data) return false;
        this.controller.processToolComplete({
          toolId: data.tool_id,
          ...(data.tool_name !== undefined && { toolName: data.tool_name }),
          result: data.result,
          isError: data.is_error,
          ...(data.elapsed_seconds !== undefined && { elapsedSeconds: data.elapsed_seconds }),
          ...(timestamp && { endTime: timestamp }),
        });
        return true;
      }

      case 'thinking':
      case 'text':
      case 'final_answer': {
        const data = this.parseData(ContentData, event);
        if (!data || !data.content) return false;
        const rawType = event.event_type === 'thinking' ? 'thinking' : event.event_type === 'text' ? 'content' : 'presentation';
        this.controller.process(data.content, rawType);
        return true;
      }

      case 'status': {
        const data = this.parseData(StatusData, event);
        if (!data || !data.message) return false;
        this.controller.process(data.message, 'status');
        return true;
      }

      case 'round_start': {
        const data = this.parseData(RoundStartData, event);
        if (!data) return false;
        this.controller.flush();
        this.controller.startNewRound(data.round_number, data.context_reset);
        return true;
      }

      case 'stream_chunk':
        return this.dispatchChunk(event, timestamp);

      default:
        this.logger.trace('Ignoring event type', { eventType: event.event_type });
        return false;
    }
  }

  private dispatchChunk(event: TimelineEvent, timestamp: Date | undefined): boolean {
    const data = this.parseData(StreamChunkData, event);
    if (!data) return false;

    const chunk = data.chunk;
    if (!chunk.display) {
      return false;
    }

    if (chunk.type === 'tool_calls') {
      for (const call of chunk.tool_calls) {
        this.controller.processToolStart({
          toolId: call.id,
          toolName: call.function.name,
          args: call.function.arguments,
          ...(timestamp && { startTime: timestamp }),
        });
      }
      return chunk.tool_calls.length > 0;
    }

    if (chunk.status === 'function_call_output') {
      if (!chunk.tool_call_id) return false;
      this.controller.processToolComplete({
        toolId: chunk.tool_call_id,
        result: chunk.content ?? '',
        ...(timestamp && { endTime: timestamp }),
      });
      return true;
    }

    const rawType = mapChunkType(chunk.type);
    if (rawType === null || !chunk.content) {
      return false;
    }

    this.controller.process(chunk.content, rawType, chunk.tool_call_id ?? undefined);
    return true;
  }

  private parseData<T extends z.ZodTypeAny>(schema: T, event: TimelineEvent): z.infer<T> | null {
    const result = schema.safeParse(event.data);
    if (result.success) {
      return result.data;
    }
    this.reject(
      new ParseError(`invalid ${event.event_type} event data`, {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    );
    return null;
  }

  private reject(error: ParseError): void {
    this.stats.invalid++;
    this.logger.warn('Skipping event', { error: error.toLogString() });
  }
}

function parseTimestamp(value: string | null | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
