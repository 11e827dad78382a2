import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { AxiosInstance } from 'axios';
import { createTestContext, RunningServer, startServer } from './helpers/fixtures';
import { Envelope, HistoryBody, ItemBody, loginAs } from './helpers/http';

/**
 * Concurrency Tests
 *
 * Many clients try to take the same item at once over HTTP. The checkout is a
 * conditional update on the item's state, so exactly one request wins and
 * every other one is told who holds the item.
 */

const CONCURRENT_REQUESTS = 50;

describe('concurrent checkouts', () => {
  let server: RunningServer;
  let quartermaster: AxiosInstance;
  let member: AxiosInstance;

  beforeAll(async () => {
    const ctx = await createTestContext();
    server = await startServer(ctx.container);
    quartermaster = await loginAs(server.baseUrl, 'qm');
    member = await loginAs(server.baseUrl, 'member');
  });

  afterAll(async () => {
    await server.close();
  });

  async function createItem(name: string): Promise<number> {
    const response = await quartermaster.post<Envelope<ItemBody>>('/v1/items', { name });
    const id = response.data.data?.id;
    if (response.status !== 201 || id === undefined) {
      throw new Error(`Failed to create item: ${response.status}`);
    }
    return id;
  }

  it('lets exactly one of many simultaneous checkouts succeed', async () => {
    const itemId = await createItem(`Concurrency Test Item ${Date.now()}`);

    const responses = await Promise.all(
      Array.from({ length: CONCURRENT_REQUESTS }, (_, index) =>
        member.post<Envelope<ItemBody>>(`/v1/items/${itemId}/checkout`, { person_name: `Person ${index}` })
      )
    );

    const succeeded = responses.filter((response) => response.status === 200);
    const conflicts = responses.filter((response) => response.status === 409);

    expect(succeeded).toHaveLength(1);
    expect(conflicts).toHaveLength(CONCURRENT_REQUESTS - 1);

    const holder = succeeded[0]?.data.data?.checkedOutBy;
    expect(holder).toMatch(/^Person \d+$/);
    for (const conflict of conflicts) {
      expect(conflict.data.error?.code).toBe('ALREADY_CHECKED_OUT');
      expect(conflict.data.error?.details).toEqual({ checkedOutBy: holder });
    }

    const item = await member.get<Envelope<ItemBody>>(`/v1/items/${itemId}`);
    expect(item.data.data).toMatchObject({ isCheckedOut: true, checkedOutBy: holder });

    const history = await member.get<Envelope<HistoryBody[]>>(`/v1/items/${itemId}/history`);
    expect(history.data.data).toHaveLength(1);
  });

  it('lets exactly one of many simultaneous checkins succeed', async () => {
    const itemId = await createItem(`Checkin Race Item ${Date.now()}`);
    await member.post(`/v1/items/${itemId}/checkout`, { person_name: 'Jane' });

    const responses = await Promise.all(
      Array.from({ length: 10 }, () => member.post<Envelope<ItemBody>>(`/v1/items/${itemId}/checkin`, { person_name: 'Jane' }))
    );

    expect(responses.filter((response) => response.status === 200)).toHaveLength(1);
    for (const response of responses.filter((r) => r.status !== 200)) {
      expect(response.status).toBe(409);
      expect(response.data.error?.code).toBe('NOT_CHECKED_OUT');
    }

    const history = await member.get<Envelope<HistoryBody[]>>(`/v1/items/${itemId}/history`);
    expect(history.data.data?.map((entry) => entry.action)).toEqual(['checkin', 'checkout']);
  });
});
