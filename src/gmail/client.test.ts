import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GmailApiClient } from './client';
import { RemoteRequestError } from './errors';
import type { Transport } from './transport';

describe('GmailApiClient', () => {
  const get = vi.fn<Transport['get']>();
  const transport: Transport = { get };

  beforeEach(() => {
    get.mockReset();
  });

  describe('getLabels', () => {
    it('returns the label list', async () => {
      get.mockResolvedValueOnce({
        labels: [
          { id: 'INBOX', name: 'INBOX', type: 'system' },
          { id: 'Label_1', name: 'Receipts', type: 'user' },
        ],
      });

      const labels = await new GmailApiClient(transport).getLabels();

      expect(get).toHaveBeenCalledWith('users/me/labels');
      expect(labels).toEqual([
        { id: 'INBOX', name: 'INBOX', type: 'system' },
        { id: 'Label_1', name: 'Receipts', type: 'user' },
      ]);
    });

    it('drops malformed entries and keeps the valid labels', async () => {
      get.mockResolvedValueOnce({
        labels: [{ id: 'INBOX', name: 'INBOX', type: 'system' }, null, 'SPAM', { id: 'Label_2', name: 'Travel' }],
      });

      const labels = await new GmailApiClient(transport).getLabels();

      expect(labels).toEqual([
        { id: 'INBOX', name: 'INBOX', type: 'system' },
        { id: 'Label_2', name: 'Travel' },
      ]);
    });

    it('returns an empty list when the account has no labels', async () => {
      get.mockResolvedValueOnce({});

      await expect(new GmailApiClient(transport).getLabels()).resolves.toEqual([]);
    });
  });

  describe('getProfile', () => {
    it('returns profile metadata', async () => {
      get.mockResolvedValueOnce({
        emailAddress: 'someone@example.com',
        messagesTotal: 42,
        threadsTotal: 30,
        historyId: '1234',
      });

      const profile = await new GmailApiClient(transport).getProfile();

      expect(get).toHaveBeenCalledWith('users/me/profile');
      expect(profile).toEqual({
        emailAddress: 'someone@example.com',
        messagesTotal: 42,
        threadsTotal: 30,
        historyId: '1234',
      });
    });
  });

  describe('getMessageIds', () => {
    it('asks for maxResults and keeps server order', async () => {
      get.mockResolvedValueOnce({
        messages: [
          { id: 'm3', threadId: 't3' },
          { id: 'm1', threadId: 't1' },
        ],
        resultSizeEstimate: 2,
      });

      const ids = await new GmailApiClient(transport).getMessageIds(10);

      expect(get).toHaveBeenCalledWith('users/me/messages', { maxResults: 10 });
      expect(ids).toEqual(['m3', 'm1']);
    });

    it('returns an empty list for an empty mailbox', async () => {
      get.mockResolvedValueOnce({ resultSizeEstimate: 0 });

      await expect(new GmailApiClient(transport).getMessageIds(10)).resolves.toEqual([]);
    });

    it('drops entries without an id', async () => {
      get.mockResolvedValueOnce({ messages: [{ id: 'm1' }, { threadId: 't2' }, { id: '' }] });

      await expect(new GmailApiClient(transport).getMessageIds(5)).resolves.toEqual(['m1']);
    });

    it('rejects a limit that is not a positive integer without calling the API', async () => {
      const client = new GmailApiClient(transport);

      await expect(client.getMessageIds(0)).rejects.toBeInstanceOf(RangeError);
      await expect(client.getMessageIds(2.5)).rejects.toBeInstanceOf(RangeError);
      expect(get).not.toHaveBeenCalled();
    });
  });

  describe('getMessageDetail', () => {
    it('fetches one message by id', async () => {
      get.mockResolvedValueOnce({ id: 'm1', threadId: 't1', labelIds: ['INBOX'], snippet: 'hello' });

      const detail = await new GmailApiClient(transport).getMessageDetail('m1');

      expect(get).toHaveBeenCalledWith('users/me/messages/m1');
      expect(detail).toEqual({ id: 'm1', threadId: 't1', labelIds: ['INBOX'], snippet: 'hello' });
    });

    it('keeps fields the normalizer does not read', async () => {
      get.mockResolvedValueOnce({
        id: 'm1',
        historyId: '987',
        sizeEstimate: 2048,
        payload: { partId: '', filename: '', mimeType: 'text/plain', body: { size: 0 } },
      });

      const detail = await new GmailApiClient(transport).getMessageDetail('m1');

      expect(detail.historyId).toBe('987');
      expect(detail.sizeEstimate).toBe(2048);
      expect(detail.payload?.partId).toBe('');
      expect(detail.payload?.filename).toBe('');
    });

    it('returns an empty resource when the body is not an object', async () => {
      get.mockResolvedValueOnce(['not', 'a', 'message']);

      await expect(new GmailApiClient(transport).getMessageDetail('m1')).resolves.toEqual({});
    });

    it('escapes the id and the user id in the path', async () => {
      get.mockResolvedValueOnce({});

      await new GmailApiClient(transport, { userId: 'someone@example.com' }).getMessageDetail('a/b');

      expect(get).toHaveBeenCalledWith('users/someone%40example.com/messages/a%2Fb');
    });

    it('propagates request errors', async () => {
      get.mockRejectedValueOnce(new RemoteRequestError(404, 'users/me/messages/gone'));

      await expect(new GmailApiClient(transport).getMessageDetail('gone')).rejects.toMatchObject({
        status: 404,
        endpoint: 'users/me/messages/gone',
      });
    });
  });
});
