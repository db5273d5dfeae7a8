/**
 * agent-timeline
 *
 * Content classification, tool batching and round tracking for multi-agent
 * timelines.
 */

// Content
export * from './content/types.js';
export {
  ContentNormalizer,
  normalizeContent,
  stripPrefixes,
  stripInjectionMarkers,
  isJsonNoise,
  isCoordinationContent,
  isWorkspaceToolJson,
  isWorkspaceStateNoise,
  isMcpConnectionNoise,
  extractEmbeddedJson,
  matchBraces,
  cleanContent,
  detectContentType,
  detectToolEvent,
  DEFAULT_PRIMARY_JSON_PREFIX_THRESHOLD,
  type ContentNormalizerOptions,
  type EmbeddedJson,
} from './content/content-normalizer.js';
export {
  ThinkingContentHandler,
  StatusContentHandler,
  PresentationContentHandler,
  ToolContentHandler,
  type ContentHandler,
  type StatusInfo,
  type StatusType,
  type ToolStartEvent,
  type ToolCompleteEvent,
} from './content/content-handlers.js';
export {
  getToolCategory,
  getToolCategoryTable,
  getMcpServerName,
  getMcpToolName,
  isMcpTool,
  formatToolDisplayName,
  cleanToolArguments,
  cleanToolResult,
  summarizeArgs,
  summarizeResult,
  type ToolCategoryInfo,
} from './content/tool-registry.js';

// Batching
export {
  ToolBatchTracker,
  type BatchAction,
  type BatchDecision,
  type BatchState,
} from './batching/tool-batch-tracker.js';

// Timeline
export type { TimelineSink, RibbonSink, TextClass } from './timeline/types.js';
export { processLineBuffer } from './timeline/line-buffer.js';
export {
  TimelineController,
  type TimelineControllerOptions,
  type TextLane,
} from './timeline/timeline-controller.js';
export { TranscriptTimeline, type TranscriptTimelineOptions } from './timeline/transcript-timeline.js';
export {
  TimelineEventAdapter,
  TimelineEventSchema,
  mapChunkType,
  type TimelineEvent,
  type EventAdapterStats,
} from './timeline/event-adapter.js';
export {
  TaskPlanTracker,
  isPlanningTool,
  getPlanningOperation,
  extractTaskPlanUpdate,
  countCompletedTasks,
  type TaskItem,
  type TaskPlanHost,
  type TaskPlanUpdate,
  type PlanningOperation,
} from './timeline/task-plan.js';

// Ambient
export * from './config/index.js';
export * from './errors/index.js';
export {
  StructuredLogger,
  ConsoleSink,
  MemorySink,
  FileSink,
  configureLogger,
  createComponentLogger,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './utilities/logger.js';
