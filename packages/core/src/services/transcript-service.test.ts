import { describe, it, expect } from 'vitest';
import type { LocalMessage } from '../domain/message/local-message.js';
import type { RunRecord } from '../domain/run/run-record.js';
import type { StreamMarker } from '../domain/stream/stream-marker.js';
import type { EngineConfig } from '../domain/config/engine-config.js';
import { deriveMessageId, derivePlaceholderId } from '../domain/transcript/identity.js';
import { fixedClock } from '../shared/clock.js';
import { at, BASE_MS, iso, makeLocal, makeRun } from '../testing/builders.js';
import {
  FakeAgentDirectory,
  FakeAttachmentIndex,
  FakeFeedbackStore,
  FakeLedger,
  FakeMarkerStore,
  FakeRunLog,
} from '../testing/fakes.js';
import { TranscriptService } from './transcript-service.js';

interface Setup {
  runs?: RunRecord[];
  locals?: LocalMessage[];
  marker?: StreamMarker | null;
  config?: Partial<EngineConfig>;
}

function setup({ runs = [], locals = [], marker = null, config }: Setup = {}) {
  const runLog = new FakeRunLog(new Map([['session-1', runs]]));
  const ledger = new FakeLedger(locals);
  const markers = new FakeMarkerStore(marker);
  const agents = new FakeAgentDirectory([{ id: 'agent-1', publicId: 'pub-1', name: 'Researcher' }]);
  const attachments = new FakeAttachmentIndex();
  const feedback = new FakeFeedbackStore();
  const service = new TranscriptService({
    runLog,
    ledger,
    markers,
    agents,
    attachments,
    feedback,
    clock: fixedClock(BASE_MS),
    config,
  });
  return { service, runLog, ledger, markers, agents, attachments };
}

function streamMarker(overrides: Partial<StreamMarker> = {}): StreamMarker {
  return {
    streamId: 'stream-9',
    sessionId: 'session-1',
    userId: 'user-1',
    teamId: null,
    runId: null,
    status: 'streaming',
    ...overrides,
  };
}

const request = { sessionId: 'session-1', userId: 'user-1' };

describe('TranscriptService.reconcile', () => {
  it('should turn a run with input and output into a user then assistant message', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', inputContent: 'hi', content: 'hello' })],
    });

    const page = await service.reconcile(request);

    expect(page.messages.map((m) => [m.role, m.content])).toEqual([
      ['user', 'hi'],
      ['assistant', 'hello'],
    ]);
    expect(page.messages[0].messageId).toBe(
      deriveMessageId({ sessionId: 'session-1', runId: 'r1', role: 'user', content: 'hi', timestamp: iso(0) }),
    );
    expect(page.messages[0].timestamp).toBe(iso(0));
    expect(page.hasMore).toBe(false);
    expect(page.totalRuns).toBe(1);
    expect(page.runSummaries[0].messageCount).toBe(2);
    expect(page.oldestMessageId).toBe(page.messages[0].messageId);
    expect(page.newestMessageId).toBe(page.messages[1].messageId);
    expect(page.degraded).toBe(false);
  });

  it('should let an unmatched ledger row stand in for a run without input', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', content: 'final answer', createdAtMs: at(10) })],
      locals: [makeLocal({ id: 'local-1', content: 'hi', createdAt: iso(5) })],
    });

    const page = await service.reconcile(request);

    expect(page.messages.map((m) => [m.role, m.content, m.messageId])).toEqual([
      ['user', 'hi', 'local-1'],
      ['assistant', 'final answer', page.messages[1].messageId],
    ]);
    expect(page.messages[0].localMessageId).toBe('local-1');
    expect(page.messages[0].runId).toBeNull();
    expect(page.runSummaries[0].messageCount).toBe(1);
  });

  it('should give the run-log message the ledger id when the content matches', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', inputContent: 'hi', content: 'final answer', createdAtMs: at(10) })],
      locals: [makeLocal({ id: 'local-1', content: 'hi', createdAt: iso(5) })],
    });

    const page = await service.reconcile(request);

    expect(page.messages).toHaveLength(2);
    expect(page.messages[0].messageId).toBe('local-1');
    expect(page.messages[0].runId).toBe('r1');
    expect(page.messages[0].timestamp).toBe(iso(10));
  });

  it('should drop a stale unmatched ledger row under the drop policy', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', content: 'final answer', createdAtMs: at(10) })],
      locals: [makeLocal({ id: 'local-1', content: 'hi', createdAt: iso(5) })],
      config: { staleLocalPolicy: 'drop' },
    });

    const page = await service.reconcile(request);

    expect(page.messages.map((m) => m.content)).toEqual(['final answer']);
  });

  it('should show only the parent run and roll child agents into its summary', async () => {
    const { service } = setup({
      runs: [
        makeRun({ runId: 'r1', inputContent: 'weather in Lisbon?', content: 'It is sunny.' }),
        makeRun({
          runId: 'r2',
          parentRunId: 'r1',
          agentName: 'Weather',
          inputContent: 'lookup Lisbon',
          content: 'sunny, 24C',
          createdAtMs: at(1),
        }),
      ],
    });

    const page = await service.reconcile(request);

    expect(page.messages.map((m) => m.content)).toEqual(['weather in Lisbon?', 'It is sunny.']);
    expect(page.messages.every((m) => m.runId === 'r1')).toBe(true);
    expect(page.totalRuns).toBe(1);
    expect(page.runSummaries[0].childRunIds).toEqual(['r2']);
    expect(page.runSummaries[0].agentsInvolved).toEqual([{ agentId: null, agentPublicId: null, agentName: 'Weather' }]);
    expect(page.messages[1].agentsInvolved).toEqual([{ agentId: null, agentPublicId: null, agentName: 'Weather' }]);
  });

  it('should attach the active stream to the newest user message and append a placeholder', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', inputContent: 'first', content: 'answer one' })],
      locals: [makeLocal({ id: 'local-2', content: 'second question', createdAt: iso(20) })],
      marker: streamMarker(),
    });

    const page = await service.reconcile(request);

    expect(page.messages).toHaveLength(4);
    const [, , user, placeholder] = page.messages;
    expect(user.messageId).toBe('local-2');
    expect(user.streamId).toBe('stream-9');
    expect(placeholder).toMatchObject({
      messageId: derivePlaceholderId('session-1', 'stream-9'),
      role: 'assistant',
      content: '',
      timestamp: iso(20),
      streamId: 'stream-9',
      status: 'streaming',
    });
    expect(page.newestMessageId).toBe(placeholder.messageId);
  });

  it('should ignore a marker whose run has already completed', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', inputContent: 'first', content: 'answer one' })],
      marker: streamMarker({ runId: 'r1' }),
    });

    const page = await service.reconcile(request);

    expect(page.messages).toHaveLength(2);
    expect(page.messages.every((m) => m.status === 'complete')).toBe(true);
    expect(page.messages.every((m) => m.streamId === null)).toBe(true);
  });

  it('should return the same transcript on repeated reads', async () => {
    const { service } = setup({
      runs: [
        makeRun({ runId: 'r1', inputContent: 'q1', content: 'a1' }),
        makeRun({ runId: 'r2', inputContent: 'q2', content: 'a2', createdAtMs: at(10) }),
      ],
      locals: [
        makeLocal({ id: 'local-1', content: 'q1', createdAt: iso(0) }),
        makeLocal({ id: 'local-3', content: 'q3', createdAt: iso(30) }),
      ],
    });

    const first = await service.reconcile(request);
    const second = await service.reconcile(request);

    expect(second).toEqual(first);
  });

  it('should keep every unmatched ledger row under the retain policy', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', inputContent: 'q1', content: 'a1', createdAtMs: at(100) })],
      locals: [
        makeLocal({ id: 'local-1', content: 'an old question', createdAt: iso(0) }),
        makeLocal({ id: 'local-2', content: 'another old one', createdAt: iso(50) }),
        makeLocal({ id: 'local-3', content: 'a new question', createdAt: iso(200) }),
      ],
    });

    const page = await service.reconcile(request);

    expect(page.messages.map((m) => m.content)).toEqual([
      'an old question',
      'another old one',
      'q1',
      'a1',
      'a new question',
    ]);
  });

  it('should collapse an assistant fragment into the message that contains it', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', inputContent: 'question?', content: 'The answer is 42.' })],
      locals: [makeLocal({ id: 'local-a', role: 'assistant', content: 'The answer is', createdAt: iso(100) })],
    });

    const page = await service.reconcile(request);

    expect(page.messages.map((m) => m.content)).toEqual(['question?', 'The answer is 42.']);
    expect(page.messages[1].localMessageId).toBe('local-a');
  });

  it('should page backwards without gaps or overlaps', async () => {
    const { service } = setup({
      runs: [
        makeRun({ runId: 'r1', inputContent: 'q1', content: 'a1', createdAtMs: at(0) }),
        makeRun({ runId: 'r2', inputContent: 'q2', content: 'a2', createdAtMs: at(10) }),
        makeRun({ runId: 'r3', inputContent: 'q3', content: 'a3', createdAtMs: at(20) }),
      ],
    });

    const first = await service.reconcile({ ...request, limit: 2 });
    expect(first.messages.map((m) => m.content)).toEqual(['q3', 'a3']);
    expect(first.hasMore).toBe(true);

    const second = await service.reconcile({ ...request, limit: 2, beforeMessageId: first.oldestMessageId });
    expect(second.messages.map((m) => m.content)).toEqual(['q2', 'a2']);
    expect(second.hasMore).toBe(true);

    const third = await service.reconcile({ ...request, limit: 2, beforeMessageId: second.oldestMessageId });
    expect(third.messages.map((m) => m.content)).toEqual(['q1', 'a1']);
    expect(third.hasMore).toBe(false);
  });

  it('should return an empty page for a cursor that names no message', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', inputContent: 'q1', content: 'a1' })],
    });

    const page = await service.reconcile({ ...request, beforeMessageId: 'no-such-message' });

    expect(page.messages).toEqual([]);
    expect(page.hasMore).toBe(false);
    expect(page.oldestMessageId).toBeNull();
    expect(page.totalRuns).toBe(1);
  });

  it('should fall back to the ledger and flag the page when the run log fails', async () => {
    const { service, runLog } = setup({
      runs: [makeRun({ runId: 'r1', inputContent: 'q1', content: 'a1' })],
      locals: [makeLocal({ id: 'local-1', content: 'hi' })],
    });
    runLog.failWith = new Error('connection refused');

    const page = await service.reconcile(request);

    expect(page.degraded).toBe(true);
    expect(page.messages.map((m) => m.messageId)).toEqual(['local-1']);
    expect(page.totalRuns).toBe(0);
  });

  it('should still build a page when the marker store fails', async () => {
    const { service, markers } = setup({
      runs: [makeRun({ runId: 'r1', inputContent: 'q1', content: 'a1' })],
    });
    markers.failWith = new Error('keyspace unavailable');

    const page = await service.reconcile(request);

    expect(page.degraded).toBe(false);
    expect(page.messages).toHaveLength(2);
  });

  it('should leave out system rows unless asked for them', async () => {
    const locals = [
      makeLocal({ id: 'local-1', content: 'hi' }),
      makeLocal({ id: 'sys-1', role: 'system', content: 'You are helpful.', createdAt: iso(1) }),
    ];

    const hidden = await setup({ locals }).service.reconcile(request);
    const shown = await setup({ locals }).service.reconcile({ ...request, includeSystem: true });

    expect(hidden.messages.map((m) => m.messageId)).toEqual(['local-1']);
    expect(shown.messages.map((m) => m.messageId)).toEqual(['local-1', 'sys-1']);
  });

  it('should show current agent names from the directory', async () => {
    const { service } = setup({
      runs: [makeRun({ runId: 'r1', agentId: 'agent-1', agentName: 'Old Name', inputContent: 'q1', content: 'a1' })],
    });

    const page = await service.reconcile(request);

    expect(page.runSummaries[0].agentName).toBe('Researcher');
    expect(page.messages[1]).toMatchObject({ agentId: 'agent-1', agentPublicId: 'pub-1', agentName: 'Researcher' });
  });
});
