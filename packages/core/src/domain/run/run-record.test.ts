import { describe, it, expect } from 'vitest';
import { RecordParseError } from '../../shared/errors.js';
import { contentToText, normalizeRunStatus, parseRunLog, parseRunRecord } from './run-record.js';
import { toEpochMs } from './timestamps.js';

describe('toEpochMs', () => {
  it('should treat small numbers as seconds', () => {
    expect(toEpochMs(1_700_000_000)).toBe(1_700_000_000_000);
    expect(toEpochMs('1700000000.5')).toBe(1_700_000_000_500);
  });

  it('should keep millisecond epochs and parse ISO strings', () => {
    expect(toEpochMs(1_700_000_000_000)).toBe(1_700_000_000_000);
    expect(toEpochMs('2023-11-14T22:13:20.000Z')).toBe(1_700_000_000_000);
  });

  it('should return null for unreadable values', () => {
    expect(toEpochMs('yesterday-ish')).toBeNull();
    expect(toEpochMs('')).toBeNull();
    expect(toEpochMs(null)).toBeNull();
  });

  it('should return null for epochs a date cannot hold', () => {
    expect(toEpochMs(1e17)).toBeNull();
    expect(toEpochMs('99999999999999999')).toBeNull();
    expect(toEpochMs(8.64e15)).toBe(8.64e15);
  });
});

describe('normalizeRunStatus', () => {
  it('should map status aliases', () => {
    expect(normalizeRunStatus('COMPLETED')).toBe('completed');
    expect(normalizeRunStatus('success')).toBe('completed');
    expect(normalizeRunStatus('cancelled')).toBe('failed');
    expect(normalizeRunStatus('error')).toBe('failed');
    expect(normalizeRunStatus('pending')).toBe('running');
    expect(normalizeRunStatus(undefined)).toBe('running');
  });
});

describe('contentToText', () => {
  it('should join text parts', () => {
    expect(contentToText(['one', { type: 'text', text: 'two' }, { type: 'image' }])).toBe('one\ntwo');
  });

  it('should serialize structured output', () => {
    expect(contentToText({ answer: 42 })).toBe('{"answer":42}');
  });
});

describe('parseRunRecord', () => {
  it('should read a complete record', () => {
    const run = parseRunRecord(
      {
        run_id: 'r1',
        parent_run_id: '',
        agent_id: 7,
        agent_name: 'Planner',
        status: 'completed',
        created_at: 1_700_000_000,
        input: { content: 'hi' },
        content: 'hello',
        events: [{ event: 'RunStarted', agent_id: 'a-7', agent_name: 'Planner', created_at: 1_700_000_001 }],
        member_responses: [{ agent_id: 'a-9', agent_public_id: 'pub-9', agent_name: 'Weather' }],
      },
      0,
    );

    expect(run).toEqual({
      runId: 'r1',
      parentRunId: null,
      teamId: null,
      teamName: null,
      agentId: '7',
      agentName: 'Planner',
      status: 'completed',
      createdAt: '2023-11-14T22:13:20.000Z',
      createdAtMs: 1_700_000_000_000,
      inputContent: 'hi',
      content: 'hello',
      events: [
        {
          event: 'RunStarted',
          agentId: 'a-7',
          agentName: 'Planner',
          teamId: null,
          teamName: null,
          createdAt: '2023-11-14T22:13:21.000Z',
        },
      ],
      memberResponses: [{ agentId: 'a-9', agentPublicId: 'pub-9', agentName: 'Weather' }],
    });
  });

  it('should take the first user part of a message list', () => {
    const run = parseRunRecord(
      {
        run_id: 'r1',
        input: {
          input_content: [
            { role: 'system', content: 'be brief' },
            { role: 'user', content: 'first question' },
            { role: 'user', content: 'second question' },
          ],
        },
      },
      0,
    );
    expect(run).not.toBeInstanceOf(RecordParseError);
    if (run instanceof RecordParseError) return;
    expect(run.inputContent).toBe('first question');
    expect(run.status).toBe('running');
  });

  it('should degrade malformed optional fields to absent', () => {
    const run = parseRunRecord(
      { run_id: 'r1', agent_name: { nested: true }, created_at: [1], events: 'nope', member_responses: 5 },
      3,
    );
    expect(run).not.toBeInstanceOf(RecordParseError);
    if (run instanceof RecordParseError) return;
    expect(run.agentName).toBeNull();
    expect(run.createdAt).toBeNull();
    expect(run.events).toEqual([]);
    expect(run.memberResponses).toEqual([]);
  });

  it('should reject a record without a run id', () => {
    const result = parseRunRecord({ content: 'orphan' }, 4);
    expect(result).toBeInstanceOf(RecordParseError);
    if (!(result instanceof RecordParseError)) return;
    expect(result.index).toBe(4);
    expect(result.code).toBe('RECORD_PARSE_ERROR');
  });
});

describe('parseRunLog', () => {
  it('should accept an envelope and skip bad and repeated records', () => {
    const log = parseRunLog({
      runs: [{ run_id: 'r1' }, 'garbage', { run_id: 'r2' }, { run_id: 'r1', content: 'again' }],
    });

    expect(log.runs.map((run) => run.runId)).toEqual(['r1', 'r2']);
    expect(log.skipped.map((error) => error.index)).toEqual([1, 3]);
    expect(log.skipped[1]?.runId).toBe('r1');
  });

  it('should report a payload that is not a list', () => {
    const log = parseRunLog('not a log');
    expect(log.runs).toEqual([]);
    expect(log.skipped).toHaveLength(1);
    expect(log.skipped[0]?.index).toBe(-1);
  });
});

describe('parseRunLog with out-of-range timestamps', () => {
  it('should keep a run whose created_at is out of range, without a timestamp', () => {
    const log = parseRunLog([
      { run_id: 'good', content: 'fine', created_at: 1_700_000_000 },
      { run_id: 'bad', content: 'x', created_at: 1e17 },
    ]);

    expect(log.skipped).toEqual([]);
    expect(log.runs.map((run) => [run.runId, run.createdAt, run.createdAtMs])).toEqual([
      ['good', '2023-11-14T22:13:20.000Z', 1_700_000_000_000],
      ['bad', null, null],
    ]);
  });

  it('should drop only the timestamp of an event that is out of range', () => {
    const log = parseRunLog([
      {
        run_id: 'r1',
        content: 'fine',
        created_at: 1_700_000_000,
        events: [{ event: 'RunStarted', created_at: '99999999999999999' }],
      },
    ]);

    expect(log.runs).toHaveLength(1);
    expect(log.runs[0].events[0]).toMatchObject({ event: 'RunStarted', createdAt: null });
  });
});
