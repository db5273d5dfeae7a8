/**
 * Content Handlers
 *
 * Per-category processing applied after normalization. Each handler takes
 * a NormalizedContent and returns its display payload, or null to drop
 * the chunk. None of them throw.
 */

import type { NormalizedContent, ToolDisplayData } from './types.js';
import {
  cleanToolArguments,
  cleanToolResult,
  formatToolDisplayName,
  getToolCategory,
  isMcpTool,
} from './tool-registry.js';

export interface ContentHandler<T> {
  process(normalized: NormalizedContent): T | null;
}

// =============================================================================
// THINKING
// =============================================================================

const THINKING_FILTERS: readonly RegExp[] = [
  /^\s*[{}]\s*$/,
  /^\s*[[\]]\s*$/,
  /^\s*"[^"]*"\s*:\s*$/,
  /^\s*,\s*$/,
];

const LONE_BULLETS = new Set(['•', '-', '*', '·']);

export class ThinkingContentHandler implements ContentHandler<string> {
  process(normalized: NormalizedContent): string | null {
    if (!normalized.shouldDisplay) {
      return null;
    }

    const content = normalized.cleanedContent;
    if (THINKING_FILTERS.some((pattern) => pattern.test(content))) {
      return null;
    }
    if (LONE_BULLETS.has(content.trim())) {
      return null;
    }

    return content;
  }
}

// =============================================================================
// STATUS
// =============================================================================

export type StatusType =
  | 'connected'
  | 'disconnected'
  | 'working'
  | 'streaming'
  | 'completed'
  | 'error'
  | 'waiting';

export interface StatusInfo {
  type: StatusType;
  icon: string;
  color: string;
  label: string;
}

const STATUS_TYPES: Record<StatusType, Omit<StatusInfo, 'type'>> = {
  connected: { icon: '●', color: 'green', label: 'Connected' },
  disconnected: { icon: '○', color: 'red', label: 'Disconnected' },
  working: { icon: '⟳', color: 'yellow', label: 'Working' },
  streaming: { icon: '▶', color: 'cyan', label: 'Streaming' },
  completed: { icon: '✓', color: 'green', label: 'Complete' },
  error: { icon: '✗', color: 'red', label: 'Error' },
  waiting: { icon: '○', color: 'dim', label: 'Waiting' },
};

/** Checked in order; the first keyword found decides the status. */
const STATUS_KEYWORDS: ReadonlyArray<[StatusType, readonly string[]]> = [
  ['completed', ['completed', 'complete']],
  ['working', ['working']],
  ['streaming', ['streaming']],
  ['error', ['error', 'failed']],
  ['disconnected', ['disconnected']],
  ['connected', ['connected']],
  ['waiting', ['waiting']],
];

export class StatusContentHandler implements ContentHandler<StatusInfo> {
  process(normalized: NormalizedContent): StatusInfo | null {
    const lower = normalized.cleanedContent.toLowerCase();

    for (const [type, keywords] of STATUS_KEYWORDS) {
      if (keywords.some((keyword) => lower.includes(keyword))) {
        return { type, ...STATUS_TYPES[type] };
      }
    }

    return null;
  }
}

// =============================================================================
// PRESENTATION
// =============================================================================

export class PresentationContentHandler implements ContentHandler<string> {
  process(normalized: NormalizedContent): string | null {
    if (!normalized.shouldDisplay) {
      return null;
    }
    // Internal preamble, never part of the answer
    if (normalized.cleanedContent.includes('Providing answer:')) {
      return null;
    }
    return normalized.cleanedContent;
  }
}

// =============================================================================
// TOOLS
// =============================================================================

export interface ToolStartEvent {
  toolId: string;
  toolName: string;
  /** Raw argument string or argument object */
  args?: unknown;
  startTime?: Date;
}

export interface ToolCompleteEvent {
  toolId: string;
  toolName?: string;
  result?: string;
  isError?: boolean;
  elapsedSeconds?: number;
  endTime?: Date;
}

export interface ToolContentHandlerOptions {
  /** Clock, injectable for tests */
  now?: () => Date;
}

const ASYNC_ID_PATTERN = /"(?:shell_id|async_id)"\s*:\s*"([^"]+)"/;
const BACKGROUND_STATUS_PATTERN = /"status"\s*:\s*"background"/;

function stringifyArgs(args: unknown): string {
  if (typeof args === 'string') {
    return args;
  }
  return JSON.stringify(args ?? {}) ?? '{}';
}

/**
 * Builds ToolDisplayData records from tool content. Running calls are kept
 * by id until they complete or fail, so args and results land on the right
 * record.
 */
export class ToolContentHandler implements ContentHandler<ToolDisplayData> {
  private readonly running = new Map<string, ToolDisplayData>();
  private readonly now: () => Date;
  private counter = 0;

  constructor(options: ToolContentHandlerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  process(normalized: NormalizedContent): ToolDisplayData | null {
    if (!normalized.shouldDisplay) {
      return null;
    }

    const meta = normalized.toolMetadata;
    const toolName = meta && meta.toolName !== 'system' ? meta.toolName : undefined;

    switch (normalized.contentType) {
      case 'tool_start': {
        const toolId = normalized.toolCallId ?? `tool_${++this.counter}`;
        const existing = this.running.get(toolId);
        if (existing) {
          return existing;
        }
        const record = this.createRecord(toolId, toolName ?? 'unknown', this.now());
        this.running.set(toolId, record);
        return record;
      }

      case 'tool_args': {
        const record = this.findRunning(normalized.toolCallId, toolName);
        if (!record) {
          return null;
        }
        record.argsFull = meta?.args ?? normalized.cleanedContent;
        record.argsSummary = cleanToolArguments(record.argsFull);
        return record;
      }

      case 'tool_complete': {
        const record = this.findRunning(normalized.toolCallId, toolName);
        if (!record) {
          return null;
        }
        this.finish(record, meta?.result ?? normalized.cleanedContent, false, this.now());
        return record;
      }

      case 'tool_failed': {
        const record = this.findRunning(normalized.toolCallId, toolName);
        if (!record) {
          return null;
        }
        this.finish(record, normalized.cleanedContent, true, this.now());
        return record;
      }

      default:
        return null;
    }
  }

  /**
   * Record for a structured tool start event.
   */
  startTool(event: ToolStartEvent): ToolDisplayData {
    const record = this.createRecord(event.toolId, event.toolName, event.startTime ?? this.now());
    if (event.args !== undefined) {
      record.argsFull = stringifyArgs(event.args);
      record.argsSummary = cleanToolArguments(record.argsFull);
    }
    this.running.set(event.toolId, record);
    return record;
  }

  /**
   * Record for a structured tool completion. A completion without a known
   * start gets a minimal record of its own.
   */
  completeTool(event: ToolCompleteEvent): ToolDisplayData {
    const endTime = event.endTime ?? this.now();
    const record =
      this.running.get(event.toolId) ?? this.createRecord(event.toolId, event.toolName ?? 'unknown', endTime);

    this.finish(record, event.result ?? '', event.isError ?? false, endTime);
    if (event.elapsedSeconds !== undefined) {
      record.elapsedSeconds = event.elapsedSeconds;
    }
    return record;
  }

  getPendingCount(): number {
    return this.running.size;
  }

  reset(): void {
    this.running.clear();
  }

  private createRecord(toolId: string, toolName: string, startTime: Date): ToolDisplayData {
    const category = getToolCategory(toolName);
    return {
      toolId,
      toolName,
      displayName: formatToolDisplayName(toolName),
      toolType: isMcpTool(toolName) ? 'mcp' : 'custom',
      category: category.category,
      icon: category.icon,
      color: category.color,
      status: 'running',
      startTime,
    };
  }

  private finish(record: ToolDisplayData, text: string, isError: boolean, endTime: Date): void {
    record.endTime = endTime;
    record.elapsedSeconds = Math.max(0, (endTime.getTime() - record.startTime.getTime()) / 1000);

    if (isError) {
      record.status = 'error';
      record.error = text;
    } else {
      const asyncId = ASYNC_ID_PATTERN.exec(text)?.[1];
      const background = asyncId !== undefined || BACKGROUND_STATUS_PATTERN.test(text);
      record.status = background ? 'background' : 'success';
      if (asyncId !== undefined) {
        record.asyncId = asyncId;
      }
      record.resultFull = text;
      record.resultSummary = cleanToolResult(text);
    }

    this.running.delete(record.toolId);
  }

  /**
   * The call an args/result line belongs to: by id, else the latest running
   * call with the same name. Lines that name no tool go to the latest call.
   */
  private findRunning(toolCallId: string | undefined, toolName: string | undefined): ToolDisplayData | undefined {
    if (toolCallId !== undefined) {
      return this.running.get(toolCallId);
    }

    const records = [...this.running.values()].reverse();
    if (toolName !== undefined) {
      return records.find((record) => record.toolName === toolName);
    }
    return records[0];
  }
}
