import { describe, it, expect } from 'vitest';
import { toAttachments } from './ledger.js';

describe('toAttachments', () => {
  it('should turn name=url pairs into attachments with distinct ids', () => {
    const attachments = toAttachments([
      ['notes.txt', '/files/notes.txt'],
      ['plot.png', '/files/plot.png'],
    ]);

    expect(attachments.map(({ filename, url }) => ({ filename, url }))).toEqual([
      { filename: 'notes.txt', url: '/files/notes.txt' },
      { filename: 'plot.png', url: '/files/plot.png' },
    ]);
    expect(attachments[0].attachmentId).not.toBe(attachments[1].attachmentId);
  });
});
