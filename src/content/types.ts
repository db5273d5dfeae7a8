/**
 * Content Types
 *
 * Value objects shared by the normalizer, the content handlers, the batch
 * tracker and the timeline controller.
 */

// =============================================================================
// NORMALIZED CONTENT
// =============================================================================

/**
 * Semantic content types recognized by the pipeline.
 */
export type ContentType =
  | 'tool_start'
  | 'tool_args'
  | 'tool_complete'
  | 'tool_failed'
  | 'tool_info'
  | 'thinking'
  | 'content'
  | 'status'
  | 'presentation'
  | 'injection'
  | 'reminder'
  | 'text'
  | 'coordination';

/**
 * Why the normalizer decided not to display a chunk.
 */
export type FilterReason =
  | 'empty'
  | 'json_noise'
  | 'workspace_json'
  | 'workspace_noise'
  | 'mcp_noise';

export type ToolEventKind = 'start' | 'args' | 'complete' | 'failed' | 'info';

/**
 * Tool facts recovered from the text of a tool status line.
 */
export interface ToolMetadata {
  toolName: string;
  toolType: 'mcp' | 'custom' | 'unknown';
  event: ToolEventKind;
  /** Raw argument text following the tool name */
  args?: string;
  /** Raw result text following the tool name */
  result?: string;
  /** For "Registered N tools" / "Connected to N servers" lines */
  toolCount?: number;
}

export interface NormalizedContent {
  readonly contentType: ContentType;
  readonly cleanedContent: string;
  readonly original: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly toolMetadata?: ToolMetadata;
  readonly shouldDisplay: boolean;
  /** Voting/consensus text; independent of `shouldDisplay` */
  readonly isCoordination: boolean;
  readonly toolCallId?: string;
  /** Set whenever `shouldDisplay` is false */
  readonly filterReason?: FilterReason;
}

// =============================================================================
// TOOL DISPLAY DATA
// =============================================================================

export type ToolStatus = 'running' | 'success' | 'error' | 'background';

/**
 * One tool-call lifecycle, keyed by `toolId`. Mutated in place as args and
 * results arrive; removal belongs to the timeline sink.
 */
export interface ToolDisplayData {
  toolId: string;
  toolName: string;
  displayName: string;
  toolType: string;
  category: string;
  icon: string;
  color: string;
  status: ToolStatus;
  startTime: Date;
  endTime?: Date;
  elapsedSeconds?: number;
  /** Truncated for card display */
  argsSummary?: string;
  argsFull?: string;
  resultSummary?: string;
  resultFull?: string;
  error?: string;
  /** Out-of-band operation id (e.g. a background shell session) */
  asyncId?: string;
}
