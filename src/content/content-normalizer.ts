/**
 * Content Normalizer
 *
 * Single entry point for classifying raw agent output before it reaches
 * the timeline. Strips backend prefixes and emoji, detects the semantic
 * content type, flags coordination text, and decides whether the chunk
 * should be displayed at all.
 *
 * Only JSON fragments, workspace tool JSON, workspace bookkeeping lines
 * and MCP connection chatter are dropped. Reasoning stays visible.
 */

import type {
  ContentType,
  FilterReason,
  NormalizedContent,
  ToolEventKind,
  ToolMetadata,
} from './types.js';

// =============================================================================
// PATTERNS
// =============================================================================

const EMOJI_CLASS = '\\u{1F300}-\\u{1F9FF}\\u2600-\\u26FF\\u2700-\\u27BF\\uFE0F';
const MARKER_EMOJI = '📊📁🔧✅❌⏳📥💡🎤🧠📋🔄⚡🌐💻🗄️📦🔌🤖';

/**
 * Leading-noise patterns. Specific patterns come before the generic emoji
 * run; the list is applied until nothing changes, so interleaved emoji and
 * bracket prefixes are all removed.
 */
const STRIP_PATTERNS: readonly RegExp[] = [
  new RegExp(`^[${MARKER_EMOJI}]\\s*[${MARKER_EMOJI}]\\s*`, 'u'),
  /^\[MCP\]\s*/,
  /^\[Custom Tools?\]\s*/,
  /^\[INJECTION\]\s*/,
  /^\[REMINDER\]\s*/,
  /^MCP:\s*/,
  /^Custom Tool:\s*/,
  new RegExp(`^[${EMOJI_CLASS}]+\\s*`, 'u'),
];

const INJECTION_MARKERS = /\[(?:INJECTION|REMINDER)\]\s*/g;

const TOOL_ARGS_PATTERN = /Arguments for Calling ([^\s:]+):\s*([\s\S]+)/i;
const TOOL_RESULTS_PATTERN = /Results for Calling ([^\s:]+):\s*([\s\S]*)/i;

const TOOL_START_PATTERNS: readonly RegExp[] = [
  /Calling (?:tool )?['"]?([^\s'".]+)['"]?/i,
  /Tool call: (\w+)/i,
  /Executing (\w+)/i,
  /Starting tool[:\s]+(\w+)/i,
];

const TOOL_COMPLETE_PATTERNS: readonly RegExp[] = [
  /Tool ['"]?(\w+)['"]? (?:completed|finished|succeeded)/i,
  /(\w+) completed/i,
  /Result from (\w+)/i,
];

const TOOL_FAILED_PATTERNS: readonly RegExp[] = [
  /Tool ['"]?(\w+)['"]? failed/i,
  /Error (?:in|from) (\w+)/i,
  /(\w+) failed/i,
];

const TOOL_INFO_PATTERNS: readonly RegExp[] = [
  /Registered (\d+) tools?/i,
  /Connected to (\d+) (?:MCP )?servers?/i,
  /Tools initialized/i,
];

/** Fragments that never carry meaning on their own */
const JSON_NOISE_PATTERNS: readonly RegExp[] = [
  /^\s*\{\s*\}\s*$/,
  /^\s*\[\s*\]\s*$/,
  /^\s*[{}]\s*$/,
  /^\s*[[\]]\s*$/,
  /^\s*,\s*$/,
  /^\s*"\s*$/,
  /^\s*```\s*$/,
  /^\s*```json\s*$/,
];

const COORDINATION_PATTERNS: readonly RegExp[] = [
  /Voting for \[/i,
  /Vote for \[/i,
  /I will vote for/i,
  /I'll vote for/i,
  /Agent \d+ provides/i,
  /agents? (?:have|has) (?:all )?correctly/i,
  /existing answers/i,
  /current answers/i,
  /restarting due to new answers/i,
];

/** Keys that mark a JSON body as a workspace coordination action */
const WORKSPACE_ACTION_PATTERNS: readonly RegExp[] = [
  /"action_type"\s*:/,
  /"answer_data"\s*:/,
  /"vote_data"\s*:/,
  /"action"\s*:\s*"(?:vote|new_answer|stop)"/,
];

/** Workspace bookkeeping lines; a chunk is noise only if every line matches */
const WORKSPACE_STATE_PATTERNS: readonly RegExp[] = [
  /^(?:CWD|Current working directory|Working directory)\s*:/i,
  /^File (?:created|modified|deleted|updated)\s*:/i,
  /^(?:Created|Modified|Deleted) file\b/i,
  /(?:duplicate answer|identical to (?:an? |your )?(?:existing|previous) answer)/i,
  /^Status changed to \S+/i,
];

const MCP_CONNECTION_PATTERNS: readonly RegExp[] = [
  /\bConnected to \d+ (?:MCP )?servers?\b/i,
  /\bRegistered \d+ tools?\b/i,
  /\b\d+ (?:MCP )?tools? (?:available|loaded|registered)\b/i,
  /\bMCP servers? (?:connected|initialized|ready)\b/i,
  /\bTools initialized\b/i,
  /\btask[ _]plan(?:ning)?\b.*\b(?:created|updated|initialized|loaded|registered)\b/i,
  /\bplanning (?:mcp|tools?)\b/i,
];

const THINKING_RAW_TYPES = new Set([
  'thinking',
  'reasoning',
  'reasoning_done',
  'reasoning_summary',
  'reasoning_summary_done',
]);

/** Default for the "primarily JSON" heuristic; see `primaryJsonPrefixThreshold`. */
export const DEFAULT_PRIMARY_JSON_PREFIX_THRESHOLD = 20;

// =============================================================================
// PURE HELPERS
// =============================================================================

export function stripPrefixes(content: string): string {
  let result = content.trim();
  for (;;) {
    const before = result;
    for (const pattern of STRIP_PATTERNS) {
      result = result.replace(pattern, '');
    }
    result = result.trimStart();
    if (result === before) {
      break;
    }
  }
  return result.trim();
}

/**
 * Remove `[INJECTION]` / `[REMINDER]` markers wherever they appear.
 */
export function stripInjectionMarkers(content: string): string {
  return content.replace(INJECTION_MARKERS, '');
}

export function isJsonNoise(content: string): boolean {
  const stripped = content.trim();
  if (stripped.length < 2) {
    return true;
  }
  return JSON_NOISE_PATTERNS.some((pattern) => pattern.test(stripped));
}

export function isCoordinationContent(content: string): boolean {
  return COORDINATION_PATTERNS.some((pattern) => pattern.test(content));
}

/**
 * Slice of `text` from the `{` at `start` to its matching `}`, honouring
 * JSON strings. An object that never closes runs to the end of the text.
 */
export function matchBraces(text: string, start: number): string {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return text.slice(start);
}

export interface EmbeddedJson {
  json: string;
  /** Text before the JSON object (or before its code fence) */
  textBefore: string;
}

const CODE_FENCE = /```(?:json)?[ \t]*\n?([\s\S]*?)(?:```|$)/;

/**
 * Locate a JSON object in bare, fenced, fenced-after-prose, or unfenced
 * embedded form (anchored on `"action_type"`).
 */
export function extractEmbeddedJson(content: string): EmbeddedJson | null {
  const trimmed = content.trim();

  if (trimmed.startsWith('{')) {
    return { json: matchBraces(trimmed, 0), textBefore: '' };
  }

  const fence = CODE_FENCE.exec(trimmed);
  if (fence) {
    const body = fence[1].trim();
    const braceAt = body.indexOf('{');
    if (braceAt >= 0) {
      return { json: matchBraces(body, braceAt), textBefore: trimmed.slice(0, fence.index) };
    }
  }

  const anchor = trimmed.indexOf('"action_type"');
  if (anchor >= 0) {
    const start = trimmed.lastIndexOf('{', anchor);
    if (start >= 0) {
      return { json: matchBraces(trimmed, start), textBefore: trimmed.slice(0, start) };
    }
  }

  return null;
}

/**
 * True when the content is primarily a workspace action JSON object: the
 * JSON matches a workspace signature and the prose before it is shorter
 * than `prefixThreshold` characters.
 */
export function isWorkspaceToolJson(
  content: string,
  prefixThreshold = DEFAULT_PRIMARY_JSON_PREFIX_THRESHOLD,
): boolean {
  const embedded = extractEmbeddedJson(content);
  if (!embedded) {
    return false;
  }
  if (!WORKSPACE_ACTION_PATTERNS.some((pattern) => pattern.test(embedded.json))) {
    return false;
  }
  return embedded.textBefore.trim().length < prefixThreshold;
}

export function isWorkspaceStateNoise(content: string): boolean {
  const lines = content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length === 0) {
    return false;
  }
  return lines.every((line) => WORKSPACE_STATE_PATTERNS.some((pattern) => pattern.test(line)));
}

export function isMcpConnectionNoise(content: string): boolean {
  return MCP_CONNECTION_PATTERNS.some((pattern) => pattern.test(content));
}

/**
 * Light cleaning: drop leading blank lines and JSON-noise lines, collapse
 * runs of blank lines.
 */
export function cleanContent(content: string): string {
  const kept: string[] = [];

  for (const line of content.split('\n')) {
    const stripped = line.trim();
    if (!stripped) {
      if (kept.length > 0) {
        kept.push('');
      }
      continue;
    }
    if (isJsonNoise(stripped)) {
      continue;
    }
    kept.push(line);
  }

  return kept.join('\n').replace(/\n{3,}/g, '\n\n').trim();
}

function firstCapture(patterns: readonly RegExp[], content: string): RegExpExecArray | null {
  for (const pattern of patterns) {
    const match = pattern.exec(content);
    if (match) {
      return match;
    }
  }
  return null;
}

/**
 * Recover tool name, arguments or results from a tool status line.
 */
export function detectToolEvent(content: string): ToolMetadata | undefined {
  const toolType: ToolMetadata['toolType'] = content.toLowerCase().includes('mcp__') ? 'mcp' : 'custom';

  const args = TOOL_ARGS_PATTERN.exec(content);
  if (args) {
    return { toolName: args[1], toolType, event: 'args', args: args[2].trim() };
  }

  const results = TOOL_RESULTS_PATTERN.exec(content);
  if (results) {
    return { toolName: results[1], toolType, event: 'complete', result: results[2].trim() };
  }

  const checks: Array<[readonly RegExp[], ToolEventKind]> = [
    [TOOL_START_PATTERNS, 'start'],
    [TOOL_COMPLETE_PATTERNS, 'complete'],
    [TOOL_FAILED_PATTERNS, 'failed'],
  ];
  for (const [patterns, event] of checks) {
    const match = firstCapture(patterns, content);
    if (match) {
      return { toolName: match[1] ?? 'unknown', toolType, event };
    }
  }

  const info = firstCapture(TOOL_INFO_PATTERNS, content);
  if (info) {
    const count = info[1] !== undefined ? Number.parseInt(info[1], 10) : undefined;
    return {
      toolName: 'system',
      toolType: 'unknown',
      event: 'info',
      ...(count !== undefined && { toolCount: count }),
    };
  }

  return undefined;
}

/**
 * Classify a chunk. The caller's raw type wins; tool chunks are refined by
 * keywords; untyped chunks fall back to injection/reminder markers, then `text`.
 */
export function detectContentType(content: string, rawType: string): ContentType {
  const lower = content.toLowerCase();

  if (rawType === 'tool') {
    if (lower.includes('arguments for')) return 'tool_args';
    if (lower.includes('results for')) return 'tool_complete';
    if (lower.includes('calling') || lower.includes('executing')) return 'tool_start';
    if (lower.includes('completed') || lower.includes('finished')) return 'tool_complete';
    if (lower.includes('failed') || lower.includes('error')) return 'tool_failed';
    return 'tool_info';
  }

  if (rawType === 'status') return 'status';
  if (rawType === 'presentation') return 'presentation';
  if (THINKING_RAW_TYPES.has(rawType)) return 'thinking';
  if (rawType === 'content') return 'content';

  if (content.includes('[INJECTION]') || rawType.includes('injection')) return 'injection';
  if (content.includes('[REMINDER]') || rawType.includes('reminder')) return 'reminder';

  return 'text';
}

// =============================================================================
// CONTENT NORMALIZER
// =============================================================================

export interface ContentNormalizerOptions {
  /**
   * Prose shorter than this before a workspace JSON object makes the chunk
   * "primarily JSON". Tunable heuristic.
   */
  primaryJsonPrefixThreshold?: number;
}

export class ContentNormalizer {
  private readonly prefixThreshold: number;

  constructor(options: ContentNormalizerOptions = {}) {
    this.prefixThreshold = options.primaryJsonPrefixThreshold ?? DEFAULT_PRIMARY_JSON_PREFIX_THRESHOLD;
  }

  /**
   * Normalize one raw chunk. Pure: same input, same output; never throws.
   */
  normalize(content: string, rawType = '', toolCallId?: string): NormalizedContent {
    const stripped = stripPrefixes(content);
    const contentType = detectContentType(content, rawType);
    const isTool = contentType.startsWith('tool_');
    const toolMetadata = isTool ? detectToolEvent(content) : undefined;
    const isCoordination = isCoordinationContent(content);

    let cleaned = stripped;
    let filterReason: FilterReason | undefined;

    if (contentType === 'presentation') {
      if (!cleaned.trim()) {
        filterReason = 'empty';
      }
    } else {
      filterReason = this.filterReason(stripped, contentType, isTool);
      if (!filterReason) {
        cleaned = cleanContent(stripped);
        if (!cleaned.trim()) {
          filterReason = 'empty';
        }
      }
    }

    const metadata: Record<string, unknown> = { rawType };

    return Object.freeze({
      contentType,
      cleanedContent: cleaned,
      original: content,
      metadata: Object.freeze(metadata),
      shouldDisplay: filterReason === undefined,
      isCoordination,
      ...(toolMetadata && { toolMetadata }),
      ...(toolCallId !== undefined && { toolCallId }),
      ...(filterReason && { filterReason }),
    });
  }

  private filterReason(stripped: string, contentType: ContentType, isTool: boolean): FilterReason | undefined {
    if (!stripped.trim()) {
      return 'empty';
    }
    if (isJsonNoise(stripped)) {
      return 'json_noise';
    }
    if (isWorkspaceToolJson(stripped, this.prefixThreshold)) {
      return 'workspace_json';
    }
    if (!isTool && isWorkspaceStateNoise(stripped)) {
      return 'workspace_noise';
    }
    if (contentType === 'status' && isMcpConnectionNoise(stripped)) {
      return 'mcp_noise';
    }
    return undefined;
  }
}

const defaultNormalizer = new ContentNormalizer();

/**
 * Normalize with default options.
 */
export function normalizeContent(content: string, rawType = '', toolCallId?: string): NormalizedContent {
  return defaultNormalizer.normalize(content, rawType, toolCallId);
}
