/**
 * Tool Batch Tracker
 *
 * Groups consecutive MCP tool calls from the same server into batches.
 * Batching starts only with the second consecutive call; a single call
 * stays standalone. Any non-tool content between two calls ends the run,
 * so a batch never spans content that arrived between its members.
 */

import type { ToolDisplayData } from '../content/types.js';
import { getMcpServerName } from '../content/tool-registry.js';

// =============================================================================
// TYPES
// =============================================================================

export type BatchAction =
  | 'standalone'
  | 'pending'
  | 'convert_to_batch'
  | 'add_to_batch'
  | 'update_standalone'
  | 'update_batch';

export interface BatchDecision {
  action: BatchAction;
  serverName: string | null;
  batchId: string | null;
  /** Set on `convert_to_batch`: the standalone call being folded into the batch */
  pendingToolId: string | null;
}

export type BatchState =
  | { kind: 'idle' }
  | { kind: 'pending'; server: string; toolId: string }
  | { kind: 'batching'; server: string; batchId: string };

type ToolRef = Pick<ToolDisplayData, 'toolId' | 'toolName' | 'status'>;

const IDLE: BatchState = { kind: 'idle' };

// =============================================================================
// TRACKER
// =============================================================================

export class ToolBatchTracker {
  private state: BatchState = IDLE;
  private readonly batchedToolIds = new Set<string>();
  private contentSinceLastTool = false;
  /** Not reset between rounds, so batch ids stay unique for the session */
  private batchCounter = 0;

  /**
   * Non-tool content arrived; the next running call starts a fresh run.
   */
  markContentArrived(): void {
    this.contentSinceLastTool = true;
  }

  processTool(tool: ToolRef): BatchDecision {
    if (this.contentSinceLastTool && tool.status === 'running') {
      this.state = IDLE;
      this.contentSinceLastTool = false;
    }

    const serverName = getMcpServerName(tool.toolName);

    if (serverName === null) {
      this.state = IDLE;
      return decision('standalone', null, null, null);
    }

    if (tool.status !== 'running') {
      if (this.batchedToolIds.has(tool.toolId)) {
        return decision('update_batch', serverName, this.currentBatchId, null);
      }
      return decision('update_standalone', serverName, null, null);
    }

    const state = this.state;

    if (state.kind === 'batching' && state.server === serverName) {
      this.batchedToolIds.add(tool.toolId);
      return decision('add_to_batch', serverName, state.batchId, null);
    }

    if (state.kind === 'pending' && state.server === serverName) {
      const batchId = `batch_${++this.batchCounter}`;
      this.batchedToolIds.add(state.toolId);
      this.batchedToolIds.add(tool.toolId);
      this.state = { kind: 'batching', server: serverName, batchId };
      return decision('convert_to_batch', serverName, batchId, state.toolId);
    }

    this.state = { kind: 'pending', server: serverName, toolId: tool.toolId };
    return decision('pending', serverName, null, null);
  }

  /**
   * Close the current pending call or batch. Returns the closed batch id.
   */
  finalizeCurrentBatch(): string | null {
    const batchId = this.currentBatchId;
    this.state = IDLE;
    return batchId;
  }

  /**
   * Clear all state for a new round. Batch numbering continues.
   */
  reset(): void {
    this.state = IDLE;
    this.batchedToolIds.clear();
    this.contentSinceLastTool = false;
  }

  isBatched(toolId: string): boolean {
    return this.batchedToolIds.has(toolId);
  }

  getState(): BatchState {
    return this.state;
  }

  get currentBatchId(): string | null {
    return this.state.kind === 'batching' ? this.state.batchId : null;
  }

  get currentServer(): string | null {
    return this.state.kind === 'idle' ? null : this.state.server;
  }

  get pendingToolId(): string | null {
    return this.state.kind === 'pending' ? this.state.toolId : null;
  }
}

function decision(
  action: BatchAction,
  serverName: string | null,
  batchId: string | null,
  pendingToolId: string | null,
): BatchDecision {
  return { action, serverName, batchId, pendingToolId };
}
