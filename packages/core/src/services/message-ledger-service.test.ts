import { describe, it, expect } from 'vitest';
import { ThreadmergeError } from '../shared/errors.js';
import { FakeLedger } from '../testing/fakes.js';
import { MessageLedgerService } from './message-ledger-service.js';

describe('MessageLedgerService', () => {
  it('should store a user message with its attachments and custom fields', async () => {
    const ledger = new FakeLedger();
    const service = new MessageLedgerService(ledger);

    const message = await service.recordMessage({
      sessionId: 'session-1',
      userId: 'user-1',
      content: 'see attached',
      attachments: [{ attachmentId: 'att-1', filename: 'report.pdf', url: '/files/att-1', size: 2048 }],
      customFields: { source: 'web' },
    });

    expect(message.role).toBe('user');
    expect(ledger.messages).toHaveLength(1);
    expect(message.metadata).toEqual({
      attachments: [
        { attachment_id: 'att-1', filename: 'report.pdf', blob_url: '/files/att-1', content_type: null, file_size: 2048 },
      ],
      custom_fields: { source: 'web' },
    });
  });

  it('should accept a message that is only an attachment', async () => {
    const service = new MessageLedgerService(new FakeLedger());

    const message = await service.recordMessage({
      sessionId: 'session-1',
      userId: 'user-1',
      content: '',
      attachments: [{ attachmentId: 'att-1', filename: 'photo.jpg', url: null }],
    });

    expect(message.content).toBe('');
  });

  it('should refuse an empty message', async () => {
    const service = new MessageLedgerService(new FakeLedger());

    const error = await service
      .recordMessage({ sessionId: 'session-1', userId: 'user-1', content: '   ' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ThreadmergeError);
    expect(error instanceof ThreadmergeError ? error.code : null).toBe('EMPTY_MESSAGE');
  });

  it('should link a message to its stream', async () => {
    const ledger = new FakeLedger();
    const service = new MessageLedgerService(ledger);
    const message = await service.recordMessage({ sessionId: 'session-1', userId: 'user-1', content: 'hi' });

    await service.attachStream(message.id, 'stream-1');

    expect(ledger.messages[0].metadata).toEqual({ stream_id: 'stream-1' });
  });

  it('should report a stream attached to an unknown message', async () => {
    const service = new MessageLedgerService(new FakeLedger());

    await expect(service.attachStream('missing', 'stream-1')).rejects.toMatchObject({ code: 'MESSAGE_NOT_FOUND' });
  });
});
