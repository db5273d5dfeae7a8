/**
 * Tool Registry
 *
 * Tool categorization and display formatting: category/color/icon lookup,
 * MCP name parsing (`mcp__{server}__{tool}`), and short summaries of tool
 * arguments and results for cards.
 *
 * The category table lives in data/tool-categories.json. Categories are
 * checked in file order and the first substring match wins.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { stripInjectionMarkers } from './content-normalizer.js';

// =============================================================================
// CATEGORY TABLE
// =============================================================================

const CategoryFileSchema = z.object({
  default: z.object({ category: z.string(), color: z.string(), icon: z.string() }),
  categories: z.array(
    z.object({
      name: z.string(),
      color: z.string(),
      icon: z.string(),
      patterns: z.array(z.string()),
    }),
  ),
});

export type ToolCategoryTable = z.infer<typeof CategoryFileSchema>;

export interface ToolCategoryInfo {
  category: string;
  color: string;
  icon: string;
}

const CATEGORY_FILE = new URL('../../data/tool-categories.json', import.meta.url);

let categoryTable: ToolCategoryTable | null = null;

/**
 * The category table, read and validated on first use.
 */
export function getToolCategoryTable(): ToolCategoryTable {
  if (!categoryTable) {
    const raw: unknown = JSON.parse(readFileSync(CATEGORY_FILE, 'utf-8'));
    categoryTable = CategoryFileSchema.parse(raw);
  }
  return categoryTable;
}

// =============================================================================
// MCP NAMES
// =============================================================================

const MCP_PREFIX = 'mcp__';

/**
 * Server name of an MCP tool: `mcp__filesystem__write_file` → `filesystem`.
 * Returns null for non-MCP tools.
 */
export function getMcpServerName(toolName: string): string | null {
  if (!toolName.startsWith(MCP_PREFIX)) {
    return null;
  }
  const parts = toolName.split('__');
  return parts.length >= 2 ? parts[1] : null;
}

/**
 * Tool name of an MCP tool. Custom tools keep everything after the
 * `custom_tool` segment: `mcp__linear__custom_tool__triage__issue` → `triage__issue`.
 */
export function getMcpToolName(toolName: string): string | null {
  if (!toolName.startsWith(MCP_PREFIX)) {
    return null;
  }
  const parts = toolName.split('__');
  if (parts.length >= 4 && parts[2] === 'custom_tool') {
    return parts.slice(3).join('__');
  }
  return parts.length >= 3 ? parts[2] : null;
}

export function isMcpTool(toolName: string): boolean {
  return getMcpServerName(toolName) !== null;
}

// =============================================================================
// CATEGORY + DISPLAY NAME
// =============================================================================

export function getToolCategory(toolName: string): ToolCategoryInfo {
  const table = getToolCategoryTable();
  let toolLower = toolName.toLowerCase();

  // MCP tools are matched on their last segment only
  if (toolName.startsWith(MCP_PREFIX)) {
    const parts = toolName.split('__');
    if (parts.length >= 3) {
      toolLower = parts[parts.length - 1].toLowerCase();
    }
  }

  for (const entry of table.categories) {
    if (entry.patterns.some((pattern) => toolLower.includes(pattern))) {
      return { category: entry.name, color: entry.color, icon: entry.icon };
    }
  }

  return { ...table.default };
}

/**
 * `mcp__server__tool` → `server/tool`, `mcp__server__custom_tool__name` →
 * `server/name`, snake_case → Title Case.
 */
export function formatToolDisplayName(toolName: string): string {
  if (toolName.startsWith(MCP_PREFIX)) {
    const parts = toolName.split('__');
    if (parts.length >= 4 && parts[2] === 'custom_tool') {
      return `${parts[1]}/${parts.slice(3).join('__')}`;
    }
    if (parts.length >= 3) {
      return `${parts[1]}/${parts[2]}`;
    }
    if (parts.length === 2) {
      return parts[1];
    }
  }

  return toolName
    .split('_')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

// =============================================================================
// ARGUMENT / RESULT SUMMARIES
// =============================================================================

function truncate(text: string, max: number, suffix = '...'): string {
  return text.length > max ? text.slice(0, max) + suffix : text;
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return '[list]';
  }
  if (value !== null && typeof value === 'object') {
    return '[dict]';
  }
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON object, falling back to a dict-repr style literal
 * (`{'path': 'a', 'force': True}`).
 */
export function parseArgsObject(text: string): Record<string, unknown> | null {
  const attempts = [
    text,
    text
      .replace(/'/g, '"')
      .replace(/\bTrue\b/g, 'true')
      .replace(/\bFalse\b/g, 'false')
      .replace(/\bNone\b/g, 'null'),
  ];

  for (const attempt of attempts) {
    try {
      const parsed: unknown = JSON.parse(attempt);
      return isRecord(parsed) ? parsed : null;
    } catch {
      continue;
    }
  }
  return null;
}

const CONTENT_KEYS = new Set(['content', 'body', 'text', 'data']);
const PATH_KEYS = new Set(['path', 'file', 'directory', 'work_dir']);

/**
 * Readable summary of tool arguments: at most three `key: value` fields.
 */
export function cleanToolArguments(argsText: string): string {
  const trimmed = argsText.trim();

  if (trimmed.startsWith('{') || trimmed.startsWith('Arguments:')) {
    const data = parseArgsObject(trimmed.replace('Arguments:', '').trim());

    if (data) {
      const parts: string[] = [];
      for (const [key, value] of Object.entries(data)) {
        if (CONTENT_KEYS.has(key) && typeof value === 'string' && value.length > 50) {
          parts.push(`${key}: [${value.length} chars]`);
        } else if (PATH_KEYS.has(key) && typeof value === 'string') {
          const shortPath = value.includes('/') ? value.split('/').pop() ?? value : value;
          parts.push(value.length > 40 ? `${key}: .../${shortPath}` : `${key}: ${value}`);
        } else if (key === 'command' && typeof value === 'string') {
          parts.push(`${key}: ${truncate(value, 60)}`);
        } else if (key.startsWith('_')) {
          continue;
        } else if (typeof value === 'string' && value.length > 50) {
          parts.push(`${key}: ${value.slice(0, 50)}...`);
        } else {
          parts.push(`${key}: ${describeValue(value)}`);
        }
      }

      return parts.length > 0 ? parts.slice(0, 3).join(' | ') : '[no args]';
    }
  }

  return truncate(trimmed, 80);
}

/**
 * Readable summary of a tool result: common MCP JSON shapes, or a
 * five-line / 200-char preview.
 */
export function cleanToolResult(resultText: string): string {
  const trimmed = resultText.trim();

  if (trimmed.startsWith('{')) {
    const data = parseJsonRecord(trimmed);
    if (data) {
      if ('success' in data) {
        const ok = Boolean(data.success);
        const status = ok ? '✓' : '✗';
        if (typeof data.message === 'string') {
          return `${status} ${data.message.slice(0, 60)}`;
        }
        return `${status} ${ok ? 'Success' : 'Failed'}`;
      }
      if ('content' in data) {
        return truncate(describeContent(data.content), 100);
      }
      if ('error' in data) {
        return `✗ ${describeContent(data.error).slice(0, 60)}`;
      }
    }
  }

  const lines = trimmed.split('\n');
  if (lines.length > 5) {
    return `${lines.slice(0, 5).join('\n')}\n... [${lines.length - 5} more lines]`;
  }

  return truncate(trimmed, 200);
}

function describeContent(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
}

function parseJsonRecord(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * One-line summary of an argument object.
 */
export function summarizeArgs(args: Record<string, unknown>, maxLen = 80): string {
  const parts: string[] = [];

  for (const [key, value] of Object.entries(args)) {
    if (typeof value === 'string') {
      parts.push(`${key}: ${value.length > 30 ? value.slice(0, 27) + '...' : value}`);
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      parts.push(`${key}: ${value}`);
    } else if (value !== null && typeof value === 'object') {
      parts.push(`${key}: ${describeValue(value)}`);
    }
  }

  const result = parts.join(', ');
  return result.length > maxLen ? result.slice(0, maxLen - 3) + '...' : result;
}

/**
 * First meaningful line of a result, with a line count when multi-line.
 */
export function summarizeResult(result: string, maxLen = 100): string {
  if (!result) {
    return '';
  }

  const lines = stripInjectionMarkers(result).split('\n');
  let firstLine =
    lines.map((line) => line.trim()).find((line) => line && !line.startsWith('{') && !line.startsWith('[')) ??
    lines[0].trim();

  if (firstLine.length > maxLen) {
    firstLine = firstLine.slice(0, maxLen - 3) + '...';
  }

  return lines.length > 1 ? `${firstLine} [${lines.length} lines]` : firstLine;
}
