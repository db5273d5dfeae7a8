/**
 * Timeline Controller Tests
 *
 * Drives the controller against a TranscriptTimeline and a recording
 * ribbon, and checks the emitted lines.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TimelineController, type TimelineControllerOptions } from '../../src/timeline/timeline-controller.js';
import { TranscriptTimeline } from '../../src/timeline/transcript-timeline.js';
import { resolveConfig } from '../../src/config/schema.js';
import { StructuredLogger, MemorySink } from '../../src/utilities/logger.js';
import type { StatusInfo } from '../../src/content/content-handlers.js';
import type { RibbonSink, TextClass } from '../../src/timeline/types.js';

class RecordingRibbon implements RibbonSink {
  rounds: Array<[string, number, boolean]> = [];
  statuses: Array<[string, StatusInfo]> = [];
  tasks: Array<[string, number, number]> = [];

  setRound(agentId: string, roundNumber: number, contextReset: boolean): void {
    this.rounds.push([agentId, roundNumber, contextReset]);
  }

  setStatus(agentId: string, status: StatusInfo): void {
    this.statuses.push([agentId, status]);
  }

  setTasks(agentId: string, completed: number, total: number): void {
    this.tasks.push([agentId, completed, total]);
  }
}

class FailingTextTimeline extends TranscriptTimeline {
  override addText(_text: string, _style: string, _textClass: TextClass, _roundNumber: number): void {
    throw new Error('display detached');
  }
}

describe('TimelineController', () => {
  let timeline: TranscriptTimeline;
  let ribbon: RecordingRibbon;
  let sink: MemorySink;

  function create(options: Partial<TimelineControllerOptions> = {}): TimelineController {
    return new TimelineController({
      agentId: 'agent_a',
      getTimeline: () => timeline,
      getRibbon: () => ribbon,
      logger: new StructuredLogger({ level: 'debug', sinks: [sink] }),
      now: () => new Date('2026-01-01T00:00:00.000Z'),
      ...options,
    });
  }

  beforeEach(() => {
    timeline = new TranscriptTimeline();
    ribbon = new RecordingRibbon();
    sink = new MemorySink();
  });

  describe('text lanes', () => {
    it('emits complete lines and flushes on a lane change', () => {
      const controller = create();
      controller.process('Let me ', 'thinking');
      controller.process('check\nthe config', 'thinking');
      controller.process('Answer text', 'content');
      controller.flush();

      expect(timeline.getLines()).toEqual([
        '[1] thinking-inline: Let me check',
        '[1] thinking-inline: the config',
        '[1] content-inline: Answer text',
      ]);
    });

    it('assembles lines from single-character chunks', () => {
      const controller = create();
      controller.process('H', 'content');
      controller.process('i', 'content');
      expect(controller.getLineBuffer()).toBe('Hi');
      controller.process('\n', 'content');

      expect(timeline.getLines()).toEqual(['[1] content-inline: Hi']);
      expect(controller.getLineBuffer()).toBe('');
    });

    it('drops JSON-noise lines', () => {
      const controller = create();
      controller.process('{\n', 'content');
      controller.process('kept\n', 'content');
      expect(timeline.getLines()).toEqual(['[1] content-inline: kept']);
    });

    it('drops workspace action JSON', () => {
      const controller = create();
      controller.process('{"action_type": "vote", "target_agent_id":"a2"}\n', 'content');
      expect(timeline.getLines()).toEqual([]);
    });

    it('shows text with an unrecognised raw type in the content lane', () => {
      const controller = create();
      controller.process('Plain line\n', '');
      controller.process('Agent output line\n', 'agent_output');

      expect(timeline.getLines()).toEqual([
        '[1] content-inline: Plain line',
        '[1] content-inline: Agent output line',
      ]);
    });

    it('works without a mounted timeline', () => {
      const controller = create({ getTimeline: () => undefined });
      controller.process('hello\n', 'content');
      expect(sink.getEntries({ level: 'warn' })).toEqual([]);
    });
  });

  describe('tools', () => {
    it('batches consecutive same-server calls', () => {
      const controller = create();
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read', args: { path: 'a.txt' } });
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__write' });
      controller.processToolComplete({ toolId: 't1', result: 'ok' });

      expect(timeline.getLines()).toEqual([
        '[1] tool add id=t1 name=fs/read status=running',
        '[1] tool convert_to_batch id=t2 name=fs/write status=running batch=batch_1 server=fs pending=t1',
        '[1] tool update_batch id=t1 name=fs/read status=success batch=batch_1',
      ]);
    });

    it('starts a new run after intervening content', () => {
      const controller = create();
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read' });
      controller.process('Working on it', 'status');
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__read' });

      expect(timeline.getLines()).toEqual([
        '[1] tool add id=t1 name=fs/read status=running',
        '[1] status: ● Working on it',
        '[1] tool add id=t2 name=fs/read status=running',
      ]);
      expect(ribbon.statuses).toEqual([
        ['agent_a', { type: 'working', icon: '⟳', color: 'yellow', label: 'Working' }],
      ]);
    });

    it('keeps batching across filtered text', () => {
      const controller = create();
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read' });
      controller.process('{', 'thinking');
      controller.process('\n', 'thinking');
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__read' });

      expect(timeline.getLines()).toEqual([
        '[1] tool add id=t1 name=fs/read status=running',
        '[1] tool convert_to_batch id=t2 name=fs/read status=running batch=batch_1 server=fs pending=t1',
      ]);
    });

    it('breaks the run on a visible thinking line', () => {
      const controller = create();
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read' });
      controller.process('Let me check\n', 'thinking');
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__read' });

      expect(timeline.getLines()).toEqual([
        '[1] tool add id=t1 name=fs/read status=running',
        '[1] thinking-inline: Let me check',
        '[1] tool add id=t2 name=fs/read status=running',
      ]);
    });

    it('breaks the run on a partial line flushed by the next tool', () => {
      const controller = create();
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read' });
      controller.process('Let me', 'content');
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__read' });

      expect(timeline.getLines()).toEqual([
        '[1] tool add id=t1 name=fs/read status=running',
        '[1] content-inline: Let me',
        '[1] tool add id=t2 name=fs/read status=running',
      ]);
    });

    it('breaks the run on a final answer', () => {
      const controller = create();
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read' });
      controller.process('Done', 'presentation');
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__read' });

      expect(timeline.getLines()).toEqual([
        '[1] tool add id=t1 name=fs/read status=running',
        '[1] response: Done',
        '[1] tool add id=t2 name=fs/read status=running',
      ]);
    });

    it('breaks the run on an injection', () => {
      const controller = create();
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read' });
      controller.process('[INJECTION] New answer from agent2', '');
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__read' });

      expect(timeline.getLines()).toEqual([
        '[1] tool add id=t1 name=fs/read status=running',
        '[1] injection: 📥 Context Update: New answer from agent2',
        '[1] tool add id=t2 name=fs/read status=running',
      ]);
    });

    it('keeps skipped tools standalone', () => {
      const controller = create({ config: resolveConfig({ batching: { skipTools: ['write'] } }) });
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read' });
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__write' });
      controller.processToolComplete({ toolId: 't2', result: 'ok' });

      expect(timeline.getLines()).toEqual([
        '[1] tool add id=t1 name=fs/read status=running',
        '[1] tool add id=t2 name=fs/write status=running',
        '[1] tool update id=t2 name=fs/write status=success',
      ]);
    });

    it('honours the skip predicate', () => {
      const controller = create({ shouldSkipBatching: (tool) => tool.toolId === 't2' });
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read' });
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__read' });

      expect(timeline.getLines()[1]).toBe('[1] tool add id=t2 name=fs/read status=running');
    });

    it('follows tool status lines by call id', () => {
      const controller = create();
      controller.process('partial', 'content');
      controller.process('🔧 Calling mcp__fs__read...', 'tool', 'c1');
      controller.process('Arguments for Calling mcp__fs__read: {"path": "a.txt"}', 'tool', 'c1');
      controller.process('Results for Calling mcp__fs__read: done', 'tool', 'c1');

      expect(timeline.getLines()).toEqual([
        '[1] content-inline: partial',
        '[1] tool add id=c1 name=fs/read status=running',
        '[1] tool update id=c1 name=fs/read status=success',
      ]);
      expect(timeline.getTool('c1')?.argsSummary).toBe('path: a.txt');
      expect(controller.getPendingToolCount()).toBe(0);
    });

    it('runs completion hooks and feeds task plans to the host', () => {
      const onToolComplete = vi.fn();
      const updateTaskPlan = vi.fn();
      const controller = create({ onToolComplete, taskPlanHost: { updateTaskPlan } });

      controller.processToolStart({ toolId: 'p1', toolName: 'mcp__planning__create_task_plan' });
      controller.processToolComplete({
        toolId: 'p1',
        result: JSON.stringify({ tasks: [{ id: 'a', status: 'completed' }, { id: 'b' }] }),
      });

      expect(onToolComplete).toHaveBeenCalledTimes(1);
      expect(updateTaskPlan).toHaveBeenCalledWith('agent_a', expect.objectContaining({ operation: 'create' }));
      expect(ribbon.tasks).toEqual([['agent_a', 1, 2]]);
      expect(controller.getTaskPlan()?.getActivePlanId()).toBe('p1');
    });

    it('skips the task plan when planning is disabled', () => {
      const controller = create({ config: resolveConfig({ planning: { enabled: false } }) });
      expect(controller.getTaskPlan()).toBeUndefined();
    });

    it('logs a failing completion hook', () => {
      const controller = create({
        onToolComplete: () => {
          throw new Error('hook broke');
        },
      });
      controller.processToolStart({ toolId: 't1', toolName: 'lookup' });
      controller.processToolComplete({ toolId: 't1', result: 'ok' });

      const warnings = sink.getEntries({ level: 'warn' });
      expect(warnings.map((entry) => entry.message)).toEqual(['Tool completion hook failed']);
      expect(timeline.getLines()).toHaveLength(2);
    });
    it('runs the completion hook when the task plan host throws', () => {
      const onToolComplete = vi.fn();
      const controller = create({
        onToolComplete,
        taskPlanHost: {
          updateTaskPlan: () => {
            throw new Error('host gone');
          },
        },
      });

      controller.processToolStart({ toolId: 'p1', toolName: 'mcp__planning__create_task_plan' });
      controller.processToolComplete({ toolId: 'p1', result: JSON.stringify({ tasks: [{ id: 'a' }] }) });

      expect(onToolComplete).toHaveBeenCalledTimes(1);
      expect(sink.getEntries({ level: 'warn' }).map((entry) => entry.message)).toEqual(['Task plan update failed']);
    });
  });

  describe('status, presentation and notices', () => {
    it('drops MCP connection chatter', () => {
      const controller = create();
      controller.process('Connected to 3 MCP servers', 'status');
      expect(timeline.getLines()).toEqual([]);
      expect(ribbon.statuses).toEqual([]);
    });

    it('shows the final answer', () => {
      const controller = create();
      controller.process('The answer is 42', 'presentation');
      expect(timeline.getLines()).toEqual(['[1] response: The answer is 42']);
    });

    it('previews injections up to the configured length', () => {
      const controller = create({ config: resolveConfig({ display: { previewLength: 10 } }) });
      controller.process('[INJECTION] New answer from agent2\nmore', '');
      expect(timeline.getLines()).toEqual(['[1] injection: 📥 Context Update: New answer...']);
    });

    it('shows reminders', () => {
      const controller = create();
      controller.process('[REMINDER] Check the tests', '');
      expect(timeline.getLines()).toEqual(['[1] reminder: 💡 Reminder: Check the tests']);
    });
  });

  describe('rounds', () => {
    it('flushes into the old round before a restart', () => {
      const controller = create();
      controller.process('line one\npartial', 'content');
      controller.process('Restarting (attempt: 2, context reset)', 'restart');
      controller.process('after\n', 'content');

      expect(timeline.getLines()).toEqual([
        '[1] content-inline: line one',
        '[1] content-inline: partial',
        '[2] separator: Round 2 (Restart • Context cleared)',
        '[2] content-inline: after',
      ]);
      expect(ribbon.rounds).toEqual([['agent_a', 2, true]]);
      expect(controller.getCurrentRound()).toBe(2);
      expect(controller.getViewedRound()).toBe(2);
    });

    it('defaults an unreadable attempt to round 1', () => {
      const controller = create();
      controller.process('restart attempt: zero', 'restart');

      expect(controller.getCurrentRound()).toBe(1);
      expect(timeline.getLines()).toEqual([]);
      expect(ribbon.rounds).toEqual([['agent_a', 1, false]]);
      expect(sink.getEntries().some((entry) => entry.message === 'Defaulting restart attempt to 1')).toBe(true);
    });

    it('defaults an attempt beyond the safe integer range to round 1', () => {
      const controller = create();
      controller.process('Restarting (attempt: 99999999999999999999)', 'restart');

      expect(controller.getCurrentRound()).toBe(1);
      expect(ribbon.rounds).toEqual([['agent_a', 1, false]]);
    });

    it('continues batch numbering across rounds', () => {
      const controller = create();
      controller.processToolStart({ toolId: 't1', toolName: 'mcp__fs__read' });
      controller.processToolStart({ toolId: 't2', toolName: 'mcp__fs__read' });
      controller.startNewRound(2);
      controller.processToolStart({ toolId: 't3', toolName: 'mcp__fs__read' });
      controller.processToolStart({ toolId: 't4', toolName: 'mcp__fs__read' });

      expect(timeline.getLines().slice(-3)).toEqual([
        '[2] separator: Round 2 (Restart)',
        '[2] tool add id=t3 name=fs/read status=running',
        '[2] tool convert_to_batch id=t4 name=fs/read status=running batch=batch_2 server=fs pending=t3',
      ]);
    });

    it('keeps context sources per round', () => {
      const controller = create();
      controller.addContextSources(['a.md', 'b.md']);
      controller.addContextSources(['a.md', 'c.md']);
      controller.startNewRound(2);

      expect(controller.getContextSources()).toEqual([]);
      expect(controller.getContextSources(1)).toEqual(['a.md', 'b.md', 'c.md']);

      controller.reset();
      expect(controller.getCurrentRound()).toBe(1);
      expect(controller.getContextByRound().get(1)).toEqual(['a.md', 'b.md', 'c.md']);
    });

    it('tracks the viewed round separately', () => {
      const controller = create();
      controller.startNewRound(3);
      controller.setViewedRound(1);
      expect(controller.getViewedRound()).toBe(1);
      expect(controller.getCurrentRound()).toBe(3);
    });
  });

  describe('sink failures', () => {
    it('logs a SinkError and keeps going', () => {
      timeline = new FailingTextTimeline();
      const controller = create();
      controller.process('hello\n', 'content');
      controller.processToolStart({ toolId: 't1', toolName: 'lookup' });

      const warnings = sink.getEntries({ level: 'warn' });
      expect(warnings).toHaveLength(1);
      expect(warnings[0].message).toBe('Timeline update failed');
      expect(warnings[0].data?.error).toBe(
        '[SinkError] (SINK) Sink operation failed: addText context={"operation":"addText"} cause=display detached',
      );
      expect(timeline.getLines()).toEqual(['[1] tool add id=t1 name=Lookup status=running']);
    });
  });
});
