import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { AxiosInstance } from 'axios';
import { createTestContext, RunningServer, startServer } from './helpers/fixtures';
import { createClient, Envelope, HistoryBody, ItemBody, loginAs, RequestBody } from './helpers/http';

describe('HTTP API', () => {
  let server: RunningServer;
  let anonymous: AxiosInstance;
  let quartermaster: AxiosInstance;
  let admin: AxiosInstance;
  let member: AxiosInstance;

  beforeAll(async () => {
    const ctx = await createTestContext();
    server = await startServer(ctx.container);
    anonymous = createClient(server.baseUrl);
    quartermaster = await loginAs(server.baseUrl, 'qm');
    admin = await loginAs(server.baseUrl, 'admin');
    member = await loginAs(server.baseUrl, 'member');
  });

  afterAll(async () => {
    await server.close();
  });

  describe('service endpoints', () => {
    it('reports health with the data store state', async () => {
      const response = await anonymous.get<{ status: string; database: string }>('/health');

      expect(response.status).toBe(200);
      expect(response.data).toMatchObject({ status: 'healthy', database: 'connected' });
    });

    it('serves the OpenAPI document built from the route annotations', async () => {
      const response = await anonymous.get<{ info: { title: string }; paths: Record<string, unknown> }>(
        '/openapi.json'
      );

      expect(response.status).toBe(200);
      expect(response.data.info.title).toBe('Custody Inventory API');
      expect(Object.keys(response.data.paths)).toContain('/v1/items/{id}/checkout');
    });

    it('answers unknown routes with NOT_FOUND', async () => {
      const response = await anonymous.get<Envelope<never>>('/nope');

      expect(response.status).toBe(404);
      expect(response.data.error).toEqual({ code: 'NOT_FOUND', message: 'Route GET /nope not found' });
    });
  });

  describe('authentication', () => {
    it('requires a bearer token', async () => {
      const response = await anonymous.get<Envelope<ItemBody[]>>('/v1/items');

      expect(response.status).toBe(401);
      expect(response.data.error).toEqual({ code: 'UNAUTHENTICATED', message: 'Access token required' });
    });

    it('rejects a malformed token', async () => {
      const response = await createClient(server.baseUrl, 'not-a-token').get<Envelope<ItemBody[]>>('/v1/items');

      expect(response.status).toBe(401);
      expect(response.data.error?.code).toBe('UNAUTHENTICATED');
    });

    it('rejects wrong credentials', async () => {
      const response = await anonymous.post<Envelope<never>>('/v1/auth/login', {
        username: 'qm',
        password: 'wrong-password',
      });

      expect(response.status).toBe(401);
      expect(response.data.error?.code).toBe('INVALID_CREDENTIALS');
    });

    it('returns the current account without its password hash', async () => {
      const response = await admin.get<Envelope<Record<string, unknown>>>('/v1/auth/me');

      expect(response.status).toBe(200);
      expect(response.data.data).toMatchObject({ username: 'admin', fullName: 'Alice Admin', role: 'admin' });
      expect(response.data.data).not.toHaveProperty('passwordHash');
    });
  });

  describe('items and custody', () => {
    it('walks an item through checkout, a refused checkout and checkin', async () => {
      const created = await quartermaster.post<Envelope<ItemBody>>('/v1/items', {
        name: 'Item A',
        barcode: 'API-1',
      });
      expect(created.status).toBe(201);
      const id = created.data.data?.id;

      const checkout = await member.post<Envelope<ItemBody>>(`/v1/items/${id}/checkout`, {
        person_name: 'Jane',
        notes: 'demo',
      });
      expect(checkout.status).toBe(200);
      expect(checkout.data.message).toBe('Item checked out to Jane');
      expect(checkout.data.data).toMatchObject({ isCheckedOut: true, checkedOutBy: 'Jane' });

      const refused = await member.post<Envelope<ItemBody>>(`/v1/items/${id}/checkout`, { person_name: 'Bob' });
      expect(refused.status).toBe(409);
      expect(refused.data.error).toEqual({
        code: 'ALREADY_CHECKED_OUT',
        message: 'Item is already checked out to Jane',
        details: { checkedOutBy: 'Jane' },
      });

      const checkin = await member.post<Envelope<ItemBody>>(`/v1/items/${id}/checkin`, { person_name: 'Jane' });
      expect(checkin.status).toBe(200);
      expect(checkin.data.data).toMatchObject({ isCheckedOut: false, checkedOutBy: null, checkedOutDate: null });

      const history = await member.get<Envelope<HistoryBody[]>>(`/v1/items/${id}/history`);
      expect(history.data.data?.map((entry) => [entry.action, entry.personName, entry.notes])).toEqual([
        ['checkin', 'Jane', null],
        ['checkout', 'Jane', 'demo'],
      ]);
    });

    it('denies item creation to a member', async () => {
      const response = await member.post<Envelope<ItemBody>>('/v1/items', { name: 'Lantern' });

      expect(response.status).toBe(403);
      expect(response.data.error).toMatchObject({
        code: 'PERMISSION_DENIED',
        details: { requiredRoles: ['quartermaster'] },
      });
    });

    it('reports field errors for an invalid body', async () => {
      const created = await quartermaster.post<Envelope<ItemBody>>('/v1/items', { name: 'Shovel' });
      const response = await member.post<Envelope<ItemBody>>(`/v1/items/${created.data.data?.id}/checkout`, {});

      expect(response.status).toBe(400);
      expect(response.data.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: { errors: [{ field: 'person_name', message: 'Person name is required' }] },
      });
    });

    it('rejects a non-numeric id', async () => {
      const response = await member.get<Envelope<ItemBody>>('/v1/items/abc');

      expect(response.status).toBe(400);
      expect(response.data.error?.details).toEqual({
        errors: [{ field: 'id', message: 'ID must be a number' }],
      });
    });

    it('refuses checkout state in an update', async () => {
      const created = await quartermaster.post<Envelope<ItemBody>>('/v1/items', { name: 'Kettle' });
      const response = await admin.patch<Envelope<ItemBody>>(`/v1/items/${created.data.data?.id}`, {
        is_checked_out: true,
      });

      expect(response.status).toBe(400);
      expect(response.data.error?.code).toBe('VALIDATION_ERROR');
    });

    it('searches items', async () => {
      await quartermaster.post('/v1/items', { name: 'Signal Mirror' });

      const response = await member.get<Envelope<ItemBody[]>>('/v1/items/search', { params: { q: 'mirror' } });

      expect(response.status).toBe(200);
      expect(response.data.data?.map((item) => item.name)).toEqual(['Signal Mirror']);
    });

    it('keeps stats from members and shows them to admins', async () => {
      expect((await member.get('/v1/stats')).status).toBe(403);

      const response = await admin.get<Envelope<{ totalItems: number }>>('/v1/stats');
      expect(response.status).toBe(200);
      expect(response.data.data?.totalItems).toBeGreaterThan(0);
    });

    it('deletes an item', async () => {
      const created = await quartermaster.post<Envelope<ItemBody>>('/v1/items', { name: 'Bucket' });
      const id = created.data.data?.id;

      const deleted = await quartermaster.delete<Envelope<{ success: boolean }>>(`/v1/items/${id}`);
      expect(deleted.status).toBe(200);
      expect(deleted.data).toEqual({ data: { success: true }, message: 'Item deleted successfully' });

      expect((await member.get(`/v1/items/${id}`)).status).toBe(404);
    });
  });

  describe('item requests', () => {
    it('runs an add request from submission to approval', async () => {
      const submitted = await admin.post<Envelope<RequestBody>>('/v1/requests', {
        request_type: 'add_item',
        item_name: 'Water filter',
        description: 'For the hiking trip',
      });
      expect(submitted.status).toBe(201);
      expect(submitted.data.data).toMatchObject({
        status: 'pending',
        itemName: 'Water filter',
        requesterName: 'Alice Admin',
      });
      const id = submitted.data.data?.id;

      const mine = await admin.get<Envelope<RequestBody[]>>('/v1/requests/mine');
      expect(mine.data.data?.map((request) => request.id)).toContain(id);

      const reviewed = await quartermaster.post<
        Envelope<{ request: RequestBody; sideEffect: { kind: string; item?: ItemBody } }>
      >(`/v1/requests/${id}/review`, { decision: 'approve' });
      expect(reviewed.status).toBe(200);
      expect(reviewed.data.data?.request.status).toBe('approved');
      expect(reviewed.data.data?.sideEffect).toMatchObject({ kind: 'item_created', item: { name: 'Water filter' } });

      const again = await quartermaster.post<Envelope<never>>(`/v1/requests/${id}/review`, { decision: 'approve' });
      expect(again.status).toBe(409);
      expect(again.data.error?.code).toBe('ALREADY_REVIEWED');
    });

    it('needs a reason to deny', async () => {
      const created = await quartermaster.post<Envelope<ItemBody>>('/v1/items', { name: 'Item B' });
      const submitted = await admin.post<Envelope<RequestBody>>('/v1/requests', {
        request_type: 'remove_item',
        item_id: created.data.data?.id,
        description: 'Rarely used',
      });
      const id = submitted.data.data?.id;

      const missing = await quartermaster.post<Envelope<never>>(`/v1/requests/${id}/review`, { decision: 'deny' });
      expect(missing.status).toBe(400);
      expect(missing.data.error?.code).toBe('MISSING_REASON');

      const denied = await quartermaster.post<Envelope<{ request: RequestBody }>>(`/v1/requests/${id}/review`, {
        decision: 'deny',
        denial_reason: 'not justified',
      });
      expect(denied.data.data?.request).toMatchObject({ status: 'denied', denialReason: 'not justified' });
      expect((await member.get(`/v1/items/${created.data.data?.id}`)).status).toBe(200);
    });

    it('rejects a remove request without a target', async () => {
      const response = await admin.post<Envelope<never>>('/v1/requests', {
        request_type: 'remove_item',
        description: 'Broken',
      });

      expect(response.status).toBe(400);
      expect(response.data.error?.code).toBe('INVALID_REQUEST_SHAPE');
    });

    it('keeps the review queue from admins', async () => {
      expect((await admin.get('/v1/requests/pending')).status).toBe(403);
      expect((await quartermaster.get('/v1/requests/pending')).status).toBe(200);
    });
  });

  describe('users', () => {
    it('lets a quartermaster create an account that can log in', async () => {
      const created = await quartermaster.post<Envelope<{ id: number; username: string }>>('/v1/users', {
        username: 'newcomer',
        password: 'test-password',
        full_name: 'New Comer',
        role: 'member',
      });
      expect(created.status).toBe(201);
      expect(created.data.data?.username).toBe('newcomer');

      const duplicate = await quartermaster.post<Envelope<never>>('/v1/users', {
        username: 'newcomer',
        password: 'test-password',
        full_name: 'Someone Else',
        role: 'member',
      });
      expect(duplicate.status).toBe(409);
      expect(duplicate.data.error?.code).toBe('DUPLICATE_LOGIN');

      await expect(loginAs(server.baseUrl, 'newcomer')).resolves.toBeDefined();
    });

    it('keeps account management from admins', async () => {
      expect((await admin.get('/v1/users')).status).toBe(403);
    });

    it('refuses to deactivate the acting account', async () => {
      const me = await quartermaster.get<Envelope<{ id: number }>>('/v1/auth/me');

      const response = await quartermaster.post<Envelope<never>>(`/v1/users/${me.data.data?.id}/deactivate`);

      expect(response.status).toBe(403);
      expect(response.data.error?.code).toBe('CANNOT_DEACTIVATE_SELF');
    });
  });

  describe('catalog', () => {
    it('manages categories', async () => {
      const created = await quartermaster.post<Envelope<{ id: number; name: string; createdByName: string }>>(
        '/v1/categories',
        { name: ' Radios ' }
      );
      expect(created.status).toBe(201);
      expect(created.data.data).toMatchObject({ name: 'Radios', createdByName: 'Default Quartermaster' });

      const duplicate = await quartermaster.post<Envelope<never>>('/v1/categories', { name: 'Radios' });
      expect(duplicate.status).toBe(409);
      expect(duplicate.data.error?.code).toBe('DUPLICATE_NAME');

      const listed = await member.get<Envelope<{ name: string }[]>>('/v1/categories');
      expect(listed.data.data?.map((entry) => entry.name)).toEqual(['Radios']);

      expect((await member.post('/v1/categories', { name: 'Tools' })).status).toBe(403);

      const renamed = await quartermaster.patch<Envelope<{ name: string }>>(
        `/v1/categories/${created.data.data?.id}`,
        { name: 'Comms' }
      );
      expect(renamed.data.data?.name).toBe('Comms');

      expect((await quartermaster.delete(`/v1/categories/${created.data.data?.id}`)).status).toBe(200);
      expect((await quartermaster.delete(`/v1/categories/${created.data.data?.id}`)).status).toBe(404);
    });

    it('keeps locations separate from categories', async () => {
      await quartermaster.post('/v1/locations', { name: 'Shed' });

      const locations = await member.get<Envelope<{ name: string }[]>>('/v1/locations');

      expect(locations.data.data?.map((entry) => entry.name)).toEqual(['Shed']);
    });
  });
});
