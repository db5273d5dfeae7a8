/**
 * Event Adapter Tests
 *
 * Replays JSON event lines through a controller writing to a
 * TranscriptTimeline.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TimelineEventAdapter, mapChunkType } from '../../src/timeline/event-adapter.js';
import { TimelineController } from '../../src/timeline/timeline-controller.js';
import { TranscriptTimeline } from '../../src/timeline/transcript-timeline.js';
import { StructuredLogger, MemorySink } from '../../src/utilities/logger.js';

function line(event: Record<string, unknown>): string {
  return JSON.stringify(event);
}

function chunk(data: Record<string, unknown>): string {
  return line({ event_type: 'stream_chunk', agent_id: 'agent_a', data: { chunk: data } });
}

describe('mapChunkType', () => {
  it('maps chunk types to controller raw types', () => {
    expect(mapChunkType('mcp_status')).toBe('tool');
    expect(mapChunkType('reasoning_summary_done')).toBe('thinking');
    expect(mapChunkType('text')).toBe('content');
    expect(mapChunkType('final_answer')).toBe('presentation');
    expect(mapChunkType('debug')).toBeNull();
  });
});

describe('TimelineEventAdapter', () => {
  let timeline: TranscriptTimeline;
  let sink: MemorySink;
  let adapter: TimelineEventAdapter;

  beforeEach(() => {
    timeline = new TranscriptTimeline();
    sink = new MemorySink();
    const logger = new StructuredLogger({ level: 'debug', sinks: [sink] });
    const controller = new TimelineController({ agentId: 'agent_a', getTimeline: () => timeline, logger });
    adapter = new TimelineEventAdapter({ controller, agentId: 'agent_a', logger });
  });

  it('counts invalid, skipped and processed lines', () => {
    adapter.processLine('');
    adapter.processLine('not json', 2);
    adapter.processLine(line({ agent_id: 'agent_a' }), 3);
    adapter.processLine(line({ event_type: 'tool_start', data: {} }), 4);
    adapter.processLine(line({ event_type: 'thinking', agent_id: 'agent_b', data: { content: 'x' } }));
    adapter.processLine(line({ event_type: 'heartbeat' }));
    adapter.processLine(line({ event_type: 'text', agent_id: 'agent_a', data: { content: 'Hello there\n' } }));

    expect(adapter.getStats()).toEqual({ processed: 1, skipped: 2, invalid: 3 });
    expect(timeline.getLines()).toEqual(['[1] content-inline: Hello there']);

    const warnings = sink.getEntries({ level: 'warn' });
    expect(warnings).toHaveLength(3);
    expect(warnings.every((entry) => entry.message === 'Skipping event')).toBe(true);
  });

  it('replays structured tool events', () => {
    adapter.processLine(
      line({
        event_type: 'tool_start',
        timestamp: '2026-01-01T00:00:00Z',
        data: { tool_id: 't1', tool_name: 'mcp__fs__read', args: { path: 'a.txt' } },
      }),
    );
    adapter.processLine(
      line({ event_type: 'tool_complete', data: { tool_id: 't1', result: 'ok', elapsed_seconds: 1.5 } }),
    );

    expect(timeline.getLines()).toEqual([
      '[1] tool add id=t1 name=fs/read status=running',
      '[1] tool update id=t1 name=fs/read status=success',
    ]);
    expect(timeline.getTool('t1')?.argsSummary).toBe('path: a.txt');
    expect(timeline.getTool('t1')?.elapsedSeconds).toBe(1.5);
  });

  it('replays stream chunks', () => {
    adapter.processLine(
      chunk({
        type: 'tool_calls',
        tool_calls: [
          { id: 'c1', function: { name: 'mcp__fs__read', arguments: '{"path": "a.txt"}' } },
          { id: 'c2', function: { name: 'mcp__fs__write' } },
        ],
      }),
    );
    adapter.processLine(chunk({ type: 'content', status: 'function_call_output', tool_call_id: 'c1', content: 'done' }));
    adapter.processLine(chunk({ type: 'reasoning', content: 'thinking hard\n' }));
    adapter.processLine(chunk({ type: 'debug', content: 'x' }));
    adapter.processLine(chunk({ type: 'content', content: 'hidden', display: false }));

    expect(timeline.getLines()).toEqual([
      '[1] tool add id=c1 name=fs/read status=running',
      '[1] tool convert_to_batch id=c2 name=fs/write status=running batch=batch_1 server=fs pending=c1',
      '[1] tool update_batch id=c1 name=fs/read status=success batch=batch_1',
      '[1] thinking-inline: thinking hard',
    ]);
    expect(adapter.getStats()).toEqual({ processed: 3, skipped: 2, invalid: 0 });
  });

  it('starts new rounds and flushes buffered text first', () => {
    adapter.processLine(line({ event_type: 'text', data: { content: 'partial' } }));
    adapter.processLine(line({ event_type: 'round_start', data: { round_number: 2, context_reset: true } }));
    adapter.processLine(line({ event_type: 'final_answer', data: { content: 'Done' } }));
    adapter.processLine(line({ event_type: 'status', data: { message: 'Task completed' } }));

    expect(timeline.getLines()).toEqual([
      '[1] content-inline: partial',
      '[2] separator: Round 2 (Restart • Context cleared)',
      '[2] response: Done',
      '[2] status: ● Task completed',
    ]);
  });

  it('flushes the controller on demand', () => {
    adapter.processLine(line({ event_type: 'thinking', data: { content: 'tail' } }));
    expect(timeline.getLines()).toEqual([]);
    adapter.flush();
    expect(timeline.getLines()).toEqual(['[1] thinking-inline: tail']);
  });
});
