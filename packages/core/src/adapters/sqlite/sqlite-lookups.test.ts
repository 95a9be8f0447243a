import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { fixedClock } from '../../shared/clock.js';
import { BASE_MS } from '../../testing/builders.js';
import { openDatabase, type SqliteDatabase } from './database.js';
import { SqliteAgentDirectory } from './sqlite-agent-directory.js';
import { SqliteAttachmentIndex } from './sqlite-attachment-index.js';
import { SqliteFeedbackStore } from './sqlite-feedback-store.js';

let db: SqliteDatabase;

beforeEach(() => {
  db = openDatabase(':memory:');
});

afterEach(() => {
  db.close();
});

describe('SqliteAgentDirectory', () => {
  it('should find agents by id or public id in any case', async () => {
    const directory = new SqliteAgentDirectory(db);
    await directory.upsertAgent({ id: 'agent-1', publicId: 'PUB-1', name: 'Researcher' });
    await directory.upsertAgent({ id: 'agent-2', publicId: null, name: 'Writer' });

    const found = await directory.getAgents(['AGENT-1', 'pub-1', 'agent-3']);

    expect(found).toEqual([{ id: 'agent-1', publicId: 'PUB-1', name: 'Researcher' }]);
  });

  it('should find agents by name and see renames', async () => {
    const directory = new SqliteAgentDirectory(db);
    await directory.upsertAgent({ id: 'agent-1', publicId: null, name: 'Researcher' });
    await directory.upsertAgent({ id: 'agent-1', publicId: null, name: 'Analyst' });

    expect(await directory.findAgentsByName([' researcher '])).toEqual([]);
    expect(await directory.findAgentsByName(['ANALYST'])).toEqual([{ id: 'agent-1', publicId: null, name: 'Analyst' }]);
  });
});

describe('SqliteAttachmentIndex', () => {
  it('should group attachments by lowercased message id', async () => {
    const index = new SqliteAttachmentIndex(db, fixedClock(BASE_MS));
    await index.addAttachment({ attachmentId: 'a1', messageId: 'MSG-1', filename: 'one.pdf', url: '/files/a1' });
    await index.addAttachment({ attachmentId: 'a2', messageId: 'msg-1', filename: 'two.pdf', url: '/files/a2', size: 42 });
    await index.addAttachment({ attachmentId: 'a3', messageId: 'msg-2', filename: 'three.pdf', url: null });

    const byMessage = await index.listAttachments(['Msg-1']);

    expect([...byMessage.keys()]).toEqual(['msg-1']);
    expect(byMessage.get('msg-1')).toEqual([
      { attachmentId: 'a1', filename: 'one.pdf', url: '/files/a1', contentType: null, size: null },
      { attachmentId: 'a2', filename: 'two.pdf', url: '/files/a2', contentType: null, size: 42 },
    ]);
  });

  it('should find attachments filed under a content signature', async () => {
    const index = new SqliteAttachmentIndex(db, fixedClock(BASE_MS));
    await index.addAttachment({
      attachmentId: 'a1',
      messageId: null,
      filename: 'chart.png',
      url: '/files/a1',
      contentType: 'image/png',
      contentSignature: 'user:see the chart',
    });

    expect(await index.findByContentSignature('user', 'see the chart')).toEqual([
      { attachmentId: 'a1', filename: 'chart.png', url: '/files/a1', contentType: 'image/png', size: null },
    ]);
    expect(await index.findByContentSignature('assistant', 'see the chart')).toEqual([]);
    expect(await index.findByContentSignature('user', '')).toEqual([]);
  });
});

describe('SqliteFeedbackStore', () => {
  it('should keep only the latest rating per user and message', async () => {
    const clock = fixedClock(BASE_MS);
    const store = new SqliteFeedbackStore(db, clock);
    await store.recordFeedback({ entityId: 'MSG-1', userId: 'u1', rating: 'thumbs_up' });
    clock.advance(1_000);
    const latest = await store.recordFeedback({ entityId: 'msg-1', userId: 'u1', rating: 'thumbs_down', comment: 'wrong' });
    await store.recordFeedback({ entityId: 'msg-1', userId: 'u2', rating: 'thumbs_up' });

    const records = await store.getFeedback(['msg-1'], 'u1');

    expect(records).toEqual([
      {
        feedbackId: latest,
        entityId: 'msg-1',
        reaction: 'dislike',
        comment: 'wrong',
        createdAt: '2023-11-14T22:13:21.000Z',
      },
    ]);
  });

  it('should map a neutral rating to no reaction', async () => {
    const store = new SqliteFeedbackStore(db, fixedClock(BASE_MS));
    await store.recordFeedback({ entityId: 'msg-1', userId: 'u1', rating: 'neutral' });

    const [record] = await store.getFeedback(['MSG-1'], 'u1');

    expect(record.reaction).toBeNull();
  });
});
