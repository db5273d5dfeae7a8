/**
 * Timeline Sink Interfaces
 *
 * The display side of the controller. A host implements these and hands
 * them to the controller through accessor functions, which may return
 * undefined while nothing is mounted.
 */

import type { StatusInfo } from '../content/content-handlers.js';
import type { ToolDisplayData } from '../content/types.js';

export type TextClass =
  | 'thinking-inline'
  | 'content-inline'
  | 'status'
  | 'response'
  | 'injection'
  | 'reminder';

export interface TimelineSink {
  // ─── Standalone tools ───
  addTool(tool: ToolDisplayData, roundNumber: number): void;
  updateTool(toolId: string, tool: ToolDisplayData): void;

  // ─── Batches ───
  convertToolToBatch(
    pendingToolId: string,
    tool: ToolDisplayData,
    batchId: string,
    serverName: string,
    roundNumber: number,
  ): void;
  addToolToBatch(batchId: string, tool: ToolDisplayData): void;
  updateToolInBatch(toolId: string, tool: ToolDisplayData): void;

  // ─── Text ───
  addText(text: string, style: string, textClass: TextClass, roundNumber: number): void;
  addSeparator(label: string, roundNumber: number, subtitle: string): void;

  // ─── Rounds ───
  switchToRound(roundNumber: number): void;
  clearToolsTracking(): void;

  // ─── Queries ───
  getTool(toolId: string): ToolDisplayData | undefined;
  /** Batch id holding this tool, if any */
  getToolBatch(toolId: string): string | undefined;
}

/**
 * Compact per-agent status display.
 */
export interface RibbonSink {
  setRound(agentId: string, roundNumber: number, contextReset: boolean): void;
  setStatus(agentId: string, status: StatusInfo): void;
  setTasks?(agentId: string, completed: number, total: number): void;
}
