/**
 * Task Plan Support
 *
 * Planning tools return the agent's task list as JSON. These helpers
 * recognise planning tools, pull the task list out of a result (patching
 * the cached list when only one task changed) and keep the active plan
 * for a host to display.
 */

import { z } from 'zod';
import type { ToolDisplayData } from '../content/types.js';
import { ParseError, toError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { RibbonSink } from './types.js';

// =============================================================================
// PLANNING TOOLS
// =============================================================================

export type PlanningOperation = 'create' | 'update' | 'add' | 'edit' | 'get';

const PLANNING_OPERATIONS: ReadonlyArray<[string, PlanningOperation]> = [
  ['create_task_plan', 'create'],
  ['update_task_status', 'update'],
  ['add_task', 'add'],
  ['edit_task', 'edit'],
  ['get_task_plan', 'get'],
];

const PLANNING_TOOL_NAMES = [
  ...PLANNING_OPERATIONS.map(([name]) => name),
  'delete_task',
  'get_ready_tasks',
  'get_blocked_tasks',
];

export function isPlanningTool(toolName: string): boolean {
  const lower = toolName.toLowerCase();
  return PLANNING_TOOL_NAMES.some((name) => lower.includes(name));
}

export function getPlanningOperation(toolName: string): PlanningOperation | null {
  const lower = toolName.toLowerCase();
  for (const [name, operation] of PLANNING_OPERATIONS) {
    if (lower.includes(name)) {
      return operation;
    }
  }
  return null;
}

// =============================================================================
// RESULT PARSING
// =============================================================================

const TaskSchema = z
  .object({
    id: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

export type TaskItem = z.infer<typeof TaskSchema>;

const PlanResultSchema = z
  .object({
    tasks: z.array(TaskSchema).optional(),
    plan: z.object({ tasks: z.array(TaskSchema).optional() }).passthrough().optional(),
    task: TaskSchema.optional(),
  })
  .passthrough();

export interface TaskPlanUpdate {
  operation: PlanningOperation;
  tasks: TaskItem[];
  focusedTaskId?: string;
  planId: string;
  /** False for the initial `create`, true afterwards */
  showNotification: boolean;
}

/**
 * Task plan carried by a completed planning tool, or null when the result
 * holds no tasks. Malformed JSON raises ParseError.
 */
export function extractTaskPlanUpdate(
  tool: Pick<ToolDisplayData, 'toolId' | 'toolName' | 'resultFull'>,
  cachedTasks: readonly TaskItem[] | null,
): TaskPlanUpdate | null {
  const operation = getPlanningOperation(tool.toolName);
  if (!operation || !tool.resultFull) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(tool.resultFull);
  } catch (err) {
    throw new ParseError(
      'task plan result is not valid JSON',
      { toolId: tool.toolId, length: tool.resultFull.length },
      toError(err),
    );
  }

  const parsed = PlanResultSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const result = parsed.data;
  let tasks: TaskItem[] = result.tasks ?? result.plan?.tasks ?? [];
  let focusedTaskId: string | undefined;

  if ((operation === 'update' || operation === 'edit') && result.task) {
    const updated = result.task;
    focusedTaskId = updated.id;

    if (tasks.length === 0 && cachedTasks && cachedTasks.length > 0) {
      let replaced = false;
      tasks = cachedTasks.map((task) => {
        if (!replaced && task.id !== undefined && task.id === updated.id) {
          replaced = true;
          return { ...updated };
        }
        return { ...task };
      });
    }
  }

  if (tasks.length === 0) {
    return null;
  }

  return {
    operation,
    tasks,
    ...(focusedTaskId !== undefined && { focusedTaskId }),
    planId: tool.toolId,
    showNotification: operation !== 'create',
  };
}

export function countCompletedTasks(tasks: readonly TaskItem[]): number {
  return tasks.filter((task) => task.status === 'completed' || task.status === 'verified').length;
}

// =============================================================================
// TRACKER
// =============================================================================

/**
 * Display side of the task plan (a pinned card, a sidebar, a log line).
 */
export interface TaskPlanHost {
  updateTaskPlan(agentId: string, update: TaskPlanUpdate): void;
}

export interface TaskPlanTrackerOptions {
  agentId: string;
  host?: TaskPlanHost;
  getRibbon?: () => RibbonSink | undefined;
  logger?: StructuredLogger;
}

export class TaskPlanTracker {
  private readonly agentId: string;
  private readonly host?: TaskPlanHost;
  private readonly getRibbon: () => RibbonSink | undefined;
  private readonly logger: StructuredLogger;
  private activeTasks: TaskItem[] | null = null;
  private activePlanId: string | null = null;

  constructor(options: TaskPlanTrackerOptions) {
    this.agentId = options.agentId;
    this.host = options.host;
    this.getRibbon = options.getRibbon ?? (() => undefined);
    this.logger = options.logger ?? createComponentLogger('task-plan');
  }

  /**
   * Post-completion hook. Returns true when the tool was a planning tool,
   * whether or not its result changed the plan.
   */
  handleToolComplete(tool: ToolDisplayData): boolean {
    if (!getPlanningOperation(tool.toolName)) {
      return false;
    }

    let update: TaskPlanUpdate | null;
    try {
      update = extractTaskPlanUpdate(tool, this.activeTasks);
    } catch (err) {
      const error = err instanceof ParseError ? err : new ParseError('task plan extraction failed', undefined, toError(err));
      this.logger.warn('Dropping task plan update', { error: error.toLogString() });
      return true;
    }

    if (!update) {
      this.logger.debug('Planning tool result carried no tasks', { toolId: tool.toolId });
      return true;
    }

    this.activeTasks = update.tasks.map((task) => ({ ...task }));
    this.activePlanId = update.planId;

    this.host?.updateTaskPlan(this.agentId, update);
    this.getRibbon()?.setTasks?.(this.agentId, countCompletedTasks(update.tasks), update.tasks.length);

    this.logger.debug('Task plan updated', {
      operation: update.operation,
      tasks: update.tasks.length,
    });
    return true;
  }

  getActiveTasks(): TaskItem[] | null {
    return this.activeTasks;
  }

  getActivePlanId(): string | null {
    return this.activePlanId;
  }

  clear(): void {
    this.activeTasks = null;
    this.activePlanId = null;
  }
}
