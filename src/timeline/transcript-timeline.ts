/**
 * Transcript Timeline
 *
 * A TimelineSink that records the timeline as plain text, one line per
 * visible change. Tool updates that leave the status unchanged are not
 * recorded.
 *
 * Line formats:
 *   [2] thinking-inline: checking the config
 *   [2] separator: Round 2 (Restart)
 *   [1] tool convert_to_batch id=t2 name=fs/write status=running batch=batch_1 server=fs pending=t1
 */

import type { ToolDisplayData } from '../content/types.js';
import type { TextClass, TimelineSink } from './types.js';

interface TrackedTool {
  round: number;
  status: ToolDisplayData['status'];
  batchId?: string;
}

export interface TranscriptTimelineOptions {
  /** Called with each line as it is recorded */
  write?: (line: string) => void;
}

export class TranscriptTimeline implements TimelineSink {
  private readonly lines: string[] = [];
  private readonly tools = new Map<string, TrackedTool>();
  private readonly toolData = new Map<string, ToolDisplayData>();
  private readonly batchRounds = new Map<string, number>();
  private readonly write?: (line: string) => void;
  private currentRound = 1;

  constructor(options: TranscriptTimelineOptions = {}) {
    this.write = options.write;
  }

  // ─── Standalone tools ───

  addTool(tool: ToolDisplayData, roundNumber: number): void {
    this.track(tool, roundNumber);
    this.recordTool(roundNumber, 'add', tool);
  }

  updateTool(toolId: string, tool: ToolDisplayData): void {
    this.applyUpdate(toolId, tool, 'update');
  }

  // ─── Batches ───

  convertToolToBatch(
    pendingToolId: string,
    tool: ToolDisplayData,
    batchId: string,
    serverName: string,
    roundNumber: number,
  ): void {
    this.batchRounds.set(batchId, roundNumber);
    const pending = this.tools.get(pendingToolId);
    if (pending) {
      pending.batchId = batchId;
    }
    this.track(tool, roundNumber, batchId);
    this.recordTool(roundNumber, 'convert_to_batch', tool, `batch=${batchId} server=${serverName} pending=${pendingToolId}`);
  }

  addToolToBatch(batchId: string, tool: ToolDisplayData): void {
    const round = this.batchRounds.get(batchId) ?? this.currentRound;
    this.track(tool, round, batchId);
    this.recordTool(round, 'add_to_batch', tool, `batch=${batchId}`);
  }

  updateToolInBatch(toolId: string, tool: ToolDisplayData): void {
    this.applyUpdate(toolId, tool, 'update_batch');
  }

  // ─── Text ───

  addText(text: string, _style: string, textClass: TextClass, roundNumber: number): void {
    this.record(`[${roundNumber}] ${textClass}: ${text}`);
  }

  addSeparator(label: string, roundNumber: number, subtitle: string): void {
    this.record(`[${roundNumber}] separator: ${label}${subtitle ? ` (${subtitle})` : ''}`);
  }

  // ─── Rounds ───

  switchToRound(roundNumber: number): void {
    this.currentRound = roundNumber;
  }

  clearToolsTracking(): void {
    this.tools.clear();
    this.toolData.clear();
    this.batchRounds.clear();
  }

  // ─── Queries ───

  getTool(toolId: string): ToolDisplayData | undefined {
    return this.toolData.get(toolId);
  }

  getToolBatch(toolId: string): string | undefined {
    return this.tools.get(toolId)?.batchId;
  }

  getLines(): string[] {
    return [...this.lines];
  }

  getCurrentRound(): number {
    return this.currentRound;
  }

  // ─── Internals ───

  private track(tool: ToolDisplayData, round: number, batchId?: string): void {
    this.tools.set(tool.toolId, { round, status: tool.status, ...(batchId !== undefined && { batchId }) });
    this.toolData.set(tool.toolId, tool);
  }

  private applyUpdate(toolId: string, tool: ToolDisplayData, action: string): void {
    const tracked = this.tools.get(toolId);
    this.toolData.set(toolId, tool);

    if (tracked && tracked.status === tool.status) {
      return;
    }

    const round = tracked?.round ?? this.currentRound;
    const batchId = tracked?.batchId;
    this.tools.set(toolId, { round, status: tool.status, ...(batchId !== undefined && { batchId }) });
    this.recordTool(round, action, tool, batchId !== undefined ? `batch=${batchId}` : undefined);
  }

  private recordTool(round: number, action: string, tool: ToolDisplayData, extra?: string): void {
    const base = `[${round}] tool ${action} id=${tool.toolId} name=${tool.displayName} status=${tool.status}`;
    this.record(extra ? `${base} ${extra}` : base);
  }

  private record(line: string): void {
    this.lines.push(line);
    this.write?.(line);
  }
}
