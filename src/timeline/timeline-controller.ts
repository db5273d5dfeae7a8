/**
 * Timeline Controller
 *
 * Routes one agent's content stream into its timeline. Every chunk is
 * normalized, classified and sent to exactly one place: the tool pipeline,
 * the status, presentation, injection or reminder lines, the round
 * transition handler, or the line-buffered text lanes. Each emitted unit
 * carries the round in effect when it is emitted.
 *
 * Chunks must arrive in the order the agent produced them. Nothing thrown
 * inside the pipeline reaches the caller; failures are logged and the
 * chunk is dropped.
 */

import { ContentNormalizer } from '../content/content-normalizer.js';
import {
  PresentationContentHandler,
  StatusContentHandler,
  ThinkingContentHandler,
  ToolContentHandler,
  type ToolCompleteEvent,
  type ToolStartEvent,
} from '../content/content-handlers.js';
import type { NormalizedContent, ToolDisplayData } from '../content/types.js';
import { ToolBatchTracker } from '../batching/tool-batch-tracker.js';
import { DEFAULT_CONFIG, type TimelineConfig } from '../config/schema.js';
import { ParseError, SinkError, toError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { processLineBuffer } from './line-buffer.js';
import { TaskPlanTracker, type TaskPlanHost } from './task-plan.js';
import type { RibbonSink, TextClass, TimelineSink } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export type TextLane = Extract<TextClass, 'thinking-inline' | 'content-inline'>;

export interface TimelineControllerOptions {
  agentId: string;
  /** May return undefined until a timeline is mounted */
  getTimeline?: () => TimelineSink | undefined;
  getRibbon?: () => RibbonSink | undefined;
  config?: TimelineConfig;
  /**
   * Tools for which this returns true are always rendered standalone.
   * Combined with `batching.skipTools` from config.
   */
  shouldSkipBatching?: (tool: ToolDisplayData) => boolean;
  /** Called after a tool reaches a terminal status */
  onToolComplete?: (tool: ToolDisplayData) => void;
  /** Receives task plans when `planning.enabled` */
  taskPlanHost?: TaskPlanHost;
  logger?: StructuredLogger;
  /** Clock for tool timings */
  now?: () => Date;
}

const TEXT_STYLE = 'dim italic';
const STATUS_STYLE = 'dim cyan';
const PRESENTATION_STYLE = 'bold #4ec9b0';
const NOTICE_STYLE = 'bold';

const ATTEMPT_PATTERN = /attempt:\s*([^\s,;)]+)/;

// =============================================================================
// CONTROLLER
// =============================================================================

export class TimelineController {
  readonly agentId: string;

  private readonly getTimeline: () => TimelineSink | undefined;
  private readonly getRibbon: () => RibbonSink | undefined;
  private readonly config: TimelineConfig;
  private readonly skipPredicate?: (tool: ToolDisplayData) => boolean;
  private readonly onToolComplete?: (tool: ToolDisplayData) => void;
  private readonly logger: StructuredLogger;

  private readonly normalizer: ContentNormalizer;
  private readonly thinkingHandler = new ThinkingContentHandler();
  private readonly statusHandler = new StatusContentHandler();
  private readonly presentationHandler = new PresentationContentHandler();
  private readonly toolHandler: ToolContentHandler;
  private readonly batchTracker = new ToolBatchTracker();
  private readonly taskPlan?: TaskPlanTracker;

  // ─── Round state ───
  private currentRound = 1;
  private viewedRound = 1;
  private lineBuffer = '';
  private lastTextClass: TextLane | null = null;
  private lastTextRawType = 'content';
  private readonly contextByRound = new Map<number, string[]>();

  constructor(options: TimelineControllerOptions) {
    this.agentId = options.agentId;
    this.getTimeline = options.getTimeline ?? (() => undefined);
    this.getRibbon = options.getRibbon ?? (() => undefined);
    this.config = options.config ?? DEFAULT_CONFIG;
    this.skipPredicate = options.shouldSkipBatching;
    this.onToolComplete = options.onToolComplete;
    this.logger = options.logger ?? createComponentLogger('timeline');

    this.normalizer = new ContentNormalizer({
      primaryJsonPrefixThreshold: this.config.normalizer.primaryJsonPrefixThreshold,
    });
    this.toolHandler = new ToolContentHandler({ now: options.now });

    if (this.config.planning.enabled) {
      this.taskPlan = new TaskPlanTracker({
        agentId: this.agentId,
        host: options.taskPlanHost,
        getRibbon: this.getRibbon,
        logger: this.logger,
      });
    }
  }

  // ===========================================================================
  // ENTRY POINTS
  // ===========================================================================

  /**
   * Route one raw chunk.
   */
  process(content: string, rawType: string, toolCallId?: string): void {
    try {
      this.route(content, rawType, toolCallId);
    } catch (err) {
      this.logger.error('Dropping chunk after internal failure', {
        rawType,
        error: toError(err).message,
      });
    }
  }

  /**
   * Structured tool start (tool name and arguments already known).
   */
  processToolStart(event: ToolStartEvent): void {
    try {
      this.flushLineBuffer();
      const tool = this.toolHandler.startTool(event);
      this.applyTool(tool, this.withTimelineQuery((t) => t.getTool(tool.toolId)) === undefined);
    } catch (err) {
      this.logger.error('Dropping tool start after internal failure', { error: toError(err).message });
    }
  }

  processToolComplete(event: ToolCompleteEvent): void {
    try {
      this.applyTool(this.toolHandler.completeTool(event), false);
    } catch (err) {
      this.logger.error('Dropping tool completion after internal failure', { error: toError(err).message });
    }
  }

  /**
   * Emit whatever partial line is still buffered.
   */
  flush(): void {
    this.flushLineBuffer();
  }

  // ===========================================================================
  // ROUNDS
  // ===========================================================================

  /**
   * Begin `roundNumber`. Tool and batch state are cleared; context sources
   * are kept.
   */
  startNewRound(roundNumber: number, contextReset = false): void {
    this.currentRound = roundNumber;
    this.viewedRound = roundNumber;

    this.withTimeline('switchToRound', (t) => t.switchToRound(roundNumber));
    this.withTimeline('clearToolsTracking', (t) => t.clearToolsTracking());

    if (roundNumber > 1) {
      const subtitle = contextReset ? 'Restart • Context cleared' : 'Restart';
      this.withTimeline('addSeparator', (t) => t.addSeparator(`Round ${roundNumber}`, roundNumber, subtitle));
    }

    this.batchTracker.reset();
    this.toolHandler.reset();
    this.lineBuffer = '';
    this.lastTextClass = null;

    this.withRibbon('setRound', (r) => r.setRound(this.agentId, roundNumber, contextReset));
    this.logger.debug('Round started', { agentId: this.agentId, round: roundNumber, contextReset });
  }

  getCurrentRound(): number {
    return this.currentRound;
  }

  getViewedRound(): number {
    return this.viewedRound;
  }

  setViewedRound(roundNumber: number): void {
    this.viewedRound = roundNumber;
  }

  // ─── Context sources ───

  addContextSources(labels: readonly string[]): void {
    const existing = this.contextByRound.get(this.currentRound) ?? [];
    for (const label of labels) {
      if (!existing.includes(label)) {
        existing.push(label);
      }
    }
    this.contextByRound.set(this.currentRound, existing);
  }

  getContextSources(roundNumber: number = this.currentRound): string[] {
    return [...(this.contextByRound.get(roundNumber) ?? [])];
  }

  getContextByRound(): Map<number, string[]> {
    return new Map([...this.contextByRound].map(([round, labels]) => [round, [...labels]]));
  }

  // ─── Inspection ───

  getLineBuffer(): string {
    return this.lineBuffer;
  }

  getPendingToolCount(): number {
    return this.toolHandler.getPendingCount();
  }

  getBatchTracker(): ToolBatchTracker {
    return this.batchTracker;
  }

  getTaskPlan(): TaskPlanTracker | undefined {
    return this.taskPlan;
  }

  /**
   * Back to round 1 with empty buffers. Context sources survive.
   */
  reset(): void {
    this.currentRound = 1;
    this.viewedRound = 1;
    this.lineBuffer = '';
    this.lastTextClass = null;
    this.batchTracker.reset();
    this.toolHandler.reset();
    this.taskPlan?.clear();
  }

  // ===========================================================================
  // ROUTING
  // ===========================================================================

  private route(content: string, rawType: string, toolCallId?: string): void {
    const normalized = this.normalizer.normalize(content, rawType, toolCallId);
    const type = normalized.contentType;

    if (type.startsWith('tool_')) {
      this.handleTool(normalized);
    } else if (type === 'status') {
      this.handleStatus(normalized);
    } else if (type === 'presentation') {
      this.handlePresentation(normalized);
    } else if (rawType === 'restart') {
      this.handleRestart(content);
    } else if (type === 'injection' || type === 'reminder') {
      this.handleNotice(normalized);
    } else if (type === 'thinking' || type === 'text' || type === 'content') {
      this.handleText(content, rawType, normalized);
    } else if (normalized.shouldDisplay) {
      this.handleText(content, 'thinking', normalized);
    } else {
      this.logger.trace('Chunk filtered', { rawType, reason: normalized.filterReason });
    }
  }

  private markContentArrived(): void {
    this.batchTracker.markContentArrived();
    this.batchTracker.finalizeCurrentBatch();
  }

  // ─── Tools ───

  private handleTool(normalized: NormalizedContent): void {
    if (normalized.contentType === 'tool_start') {
      this.flushLineBuffer();
    }

    const tool = this.toolHandler.process(normalized);
    if (!tool) {
      return;
    }

    const isNewCall =
      normalized.contentType === 'tool_start' &&
      this.withTimelineQuery((t) => t.getTool(tool.toolId)) === undefined;
    this.applyTool(tool, isNewCall);
  }

  private shouldSkipBatching(tool: ToolDisplayData): boolean {
    if (!this.config.batching.enabled) {
      return true;
    }
    const name = tool.toolName.toLowerCase();
    if (this.config.batching.skipTools.some((pattern) => name.includes(pattern.toLowerCase()))) {
      return true;
    }
    return this.skipPredicate?.(tool) ?? false;
  }

  private applyTool(tool: ToolDisplayData, isNewCall: boolean): void {
    const round = this.currentRound;
    const skip = this.shouldSkipBatching(tool);

    if (tool.status === 'running' && !isNewCall) {
      this.updateToolCard(tool);
      return;
    }

    if (tool.status === 'running') {
      if (skip) {
        this.batchTracker.finalizeCurrentBatch();
        this.withTimeline('addTool', (t) => t.addTool(tool, round));
        return;
      }

      const decision = this.batchTracker.processTool(tool);
      this.logger.debug('Tool placed', { toolId: tool.toolId, action: decision.action, batchId: decision.batchId });

      const { batchId, serverName, pendingToolId } = decision;
      if (decision.action === 'convert_to_batch' && batchId && serverName && pendingToolId) {
        this.withTimeline('convertToolToBatch', (t) =>
          t.convertToolToBatch(pendingToolId, tool, batchId, serverName, round),
        );
      } else if (decision.action === 'add_to_batch' && batchId) {
        this.withTimeline('addToolToBatch', (t) => t.addToolToBatch(batchId, tool));
      } else {
        this.withTimeline('addTool', (t) => t.addTool(tool, round));
      }
      return;
    }

    if (skip) {
      this.updateToolCard(tool);
    } else {
      const decision = this.batchTracker.processTool(tool);
      if (decision.action === 'update_batch') {
        this.withTimeline('updateToolInBatch', (t) => t.updateToolInBatch(tool.toolId, tool));
      } else {
        this.withTimeline('updateTool', (t) => t.updateTool(tool.toolId, tool));
      }
    }

    this.runCompletionHooks(tool);
  }

  private updateToolCard(tool: ToolDisplayData): void {
    const inBatch =
      this.batchTracker.isBatched(tool.toolId) ||
      this.withTimelineQuery((t) => t.getToolBatch(tool.toolId)) !== undefined;

    if (inBatch) {
      this.withTimeline('updateToolInBatch', (t) => t.updateToolInBatch(tool.toolId, tool));
    } else {
      this.withTimeline('updateTool', (t) => t.updateTool(tool.toolId, tool));
    }
  }

  private runCompletionHooks(tool: ToolDisplayData): void {
    try {
      this.taskPlan?.handleToolComplete(tool);
    } catch (err) {
      this.logger.warn('Task plan update failed', { toolId: tool.toolId, error: toError(err).message });
    }

    try {
      this.onToolComplete?.(tool);
    } catch (err) {
      this.logger.warn('Tool completion hook failed', { toolId: tool.toolId, error: toError(err).message });
    }
  }

  // ─── Status / presentation / notices ───

  private handleStatus(normalized: NormalizedContent): void {
    if (!normalized.shouldDisplay) {
      this.logger.trace('Status filtered', { reason: normalized.filterReason });
      return;
    }

    this.markContentArrived();
    const round = this.currentRound;
    this.withTimeline('addText', (t) => t.addText(`● ${normalized.cleanedContent}`, STATUS_STYLE, 'status', round));

    const info = this.statusHandler.process(normalized);
    if (info) {
      this.withRibbon('setStatus', (r) => r.setStatus(this.agentId, info));
    }
  }

  private handlePresentation(normalized: NormalizedContent): void {
    const text = this.presentationHandler.process(normalized);
    if (text === null) {
      return;
    }

    this.markContentArrived();
    const round = this.currentRound;
    this.withTimeline('addText', (t) => t.addText(text, PRESENTATION_STYLE, 'response', round));
  }

  private handleNotice(normalized: NormalizedContent): void {
    if (!normalized.shouldDisplay) {
      return;
    }

    this.markContentArrived();

    const limit = this.config.display.previewLength;
    const content = normalized.cleanedContent;
    const preview = (content.length > limit ? content.slice(0, limit) + '...' : content).replace(/\n/g, ' ');

    const isInjection = normalized.contentType === 'injection';
    const text = isInjection ? `📥 Context Update: ${preview}` : `💡 Reminder: ${preview}`;
    const textClass: TextClass = isInjection ? 'injection' : 'reminder';
    const round = this.currentRound;

    this.withTimeline('addText', (t) => t.addText(text, NOTICE_STYLE, textClass, round));
  }

  // ─── Restart ───

  private handleRestart(content: string): void {
    // Buffered text belongs to the round that is ending
    this.flushLineBuffer();

    const attempt = this.parseAttempt(content);
    const lower = content.toLowerCase();
    const contextReset = lower.includes('context') || lower.includes('reset');

    this.startNewRound(attempt, contextReset);
  }

  private parseAttempt(content: string): number {
    const match = ATTEMPT_PATTERN.exec(content);
    if (!match) {
      return 1;
    }

    const token = match[1];
    const attempt = /^\d+$/.test(token) ? Number.parseInt(token, 10) : Number.NaN;
    if (!Number.isSafeInteger(attempt) || attempt < 1) {
      const error = new ParseError('invalid restart attempt number', { token });
      this.logger.debug('Defaulting restart attempt to 1', { error: error.toLogString() });
      return 1;
    }
    return attempt;
  }

  // ─── Text lanes ───

  private handleText(content: string, rawType: string, normalized: NormalizedContent): void {
    if (normalized.filterReason === 'workspace_json' || normalized.filterReason === 'workspace_noise') {
      this.logger.trace('Text chunk filtered', { reason: normalized.filterReason });
      return;
    }

    const lane: TextLane = normalized.contentType === 'thinking' ? 'thinking-inline' : 'content-inline';
    if (this.lastTextClass !== null && this.lastTextClass !== lane) {
      this.flushLineBuffer();
    }
    this.lastTextClass = lane;
    this.lastTextRawType = rawType;

    this.lineBuffer = processLineBuffer(this.lineBuffer, content, (line) => this.emitLine(line, lane, rawType));
  }

  private flushLineBuffer(): void {
    if (!this.lineBuffer.trim()) {
      this.lineBuffer = '';
      return;
    }

    const pending = this.lineBuffer.trimEnd();
    this.lineBuffer = '';
    this.emitLine(pending, this.lastTextClass ?? 'content-inline', this.lastTextRawType);
  }

  private emitLine(line: string, lane: TextLane, rawType: string): void {
    const text = this.thinkingHandler.process(this.normalizer.normalize(line, rawType));
    if (!text) {
      return;
    }

    this.markContentArrived();
    const round = this.currentRound;
    this.withTimeline('addText', (t) => t.addText(text, TEXT_STYLE, lane, round));
  }

  // ===========================================================================
  // SINK ACCESS
  // ===========================================================================

  private withTimeline(operation: string, apply: (timeline: TimelineSink) => void): void {
    try {
      const timeline = this.getTimeline();
      if (timeline) {
        apply(timeline);
      }
    } catch (err) {
      this.logger.warn('Timeline update failed', { error: new SinkError(operation, toError(err)).toLogString() });
    }
  }

  private withTimelineQuery<T>(query: (timeline: TimelineSink) => T | undefined): T | undefined {
    try {
      const timeline = this.getTimeline();
      return timeline ? query(timeline) : undefined;
    } catch (err) {
      this.logger.warn('Timeline query failed', { error: new SinkError('query', toError(err)).toLogString() });
      return undefined;
    }
  }

  private withRibbon(operation: string, apply: (ribbon: RibbonSink) => void): void {
    try {
      const ribbon = this.getRibbon();
      if (ribbon) {
        apply(ribbon);
      }
    } catch (err) {
      this.logger.warn('Ribbon update failed', { error: new SinkError(operation, toError(err)).toLogString() });
    }
  }
}
