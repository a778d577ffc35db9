/**
 * API tests for /recipe/tags/.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';

import type { User } from '../src/api/accounts/types.ts';
import type { MemoryStore } from '../src/api/store/memory.ts';
import { authHeaders, buildTestApp, createTestUser } from './helpers/app.ts';

const TAGS_URL = '/recipe/tags/';

function detailUrl(id: number | string): string {
  return `${TAGS_URL}${id}/`;
}

describe('Tags API', () => {
  let app: FastifyInstance;
  let store: MemoryStore;

  beforeEach(async () => {
    ({ app, store } = await buildTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  describe('unauthenticated', () => {
    it('requires a token to list tags', async () => {
      const res = await app.inject({ method: 'GET', url: TAGS_URL });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'Authentication credentials were not provided.' });
      expect(res.headers['www-authenticate']).toBe('Bearer');
    });

    it('rejects a malformed token', async () => {
      const res = await app.inject({
        method: 'GET',
        url: TAGS_URL,
        headers: { authorization: 'Bearer not-a-jwt' },
      });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'Invalid token.' });
    });

    it('rejects a token for an inactive user', async () => {
      const user = await createTestUser(store);
      await store.users.update(user.id, { is_active: false });

      const res = await app.inject({ method: 'GET', url: TAGS_URL, headers: await authHeaders(user) });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'User inactive or deleted.' });
    });

    it('does not create a tag without a token', async () => {
      const res = await app.inject({ method: 'POST', url: TAGS_URL, payload: { name: 'Vegan' } });
      expect(res.statusCode).toBe(401);
      expect(await store.tags.list(1)).toEqual([]);
    });

    it.each<{ method: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'; url: string }>([
      { method: 'GET', url: TAGS_URL },
      { method: 'POST', url: TAGS_URL },
      { method: 'GET', url: detailUrl(1) },
      { method: 'PUT', url: detailUrl(1) },
      { method: 'PATCH', url: detailUrl(1) },
      { method: 'DELETE', url: detailUrl(1) },
    ])('requires a token for $method $url', async ({ method, url }) => {
      const res = await app.inject({ method, url, payload: { name: 'Vegan' } });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'Authentication credentials were not provided.' });
    });
  });

  describe('authenticated', () => {
    let user: User;
    let headers: Record<string, string>;

    beforeEach(async () => {
      user = await createTestUser(store);
      headers = await authHeaders(user);
    });

    it('lists tags by name descending', async () => {
      await store.tags.create(user.id, 'Vegan');
      await store.tags.create(user.id, 'Dessert');

      const res = await app.inject({ method: 'GET', url: TAGS_URL, headers });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([
        { id: 1, name: 'Vegan' },
        { id: 2, name: 'Dessert' },
      ]);
    });

    it('breaks name ties by id descending', async () => {
      await store.tags.create(user.id, 'Quick');
      await store.tags.create(user.id, 'Quick');

      const res = await app.inject({ method: 'GET', url: TAGS_URL, headers });
      expect(res.json()).toEqual([
        { id: 2, name: 'Quick' },
        { id: 1, name: 'Quick' },
      ]);
    });

    it('only lists tags owned by the caller', async () => {
      const other = await createTestUser(store, 'other@example.com');
      await store.tags.create(other.id, 'Fruity');
      const tag = await store.tags.create(user.id, 'Comfort Food');

      const res = await app.inject({ method: 'GET', url: TAGS_URL, headers });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([{ id: tag.id, name: 'Comfort Food' }]);
    });

    it('answers without the trailing slash', async () => {
      const res = await app.inject({ method: 'GET', url: '/recipe/tags', headers });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([]);
    });

    it('creates a tag owned by the caller', async () => {
      const res = await app.inject({ method: 'POST', url: TAGS_URL, headers, payload: { name: 'Test tag' } });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({ id: 1, name: 'Test tag' });
      expect(await store.tags.get(user.id, 1)).toEqual({ id: 1, user_id: user.id, name: 'Test tag' });
    });

    it('ignores an owner field in the payload', async () => {
      const other = await createTestUser(store, 'other@example.com');

      const res = await app.inject({
        method: 'POST',
        url: TAGS_URL,
        headers,
        payload: { name: 'Mine', user: other.id, user_id: other.id },
      });
      expect(res.statusCode).toBe(201);
      expect(await store.tags.list(other.id)).toEqual([]);
      expect(await store.tags.list(user.id)).toEqual([{ id: 1, user_id: user.id, name: 'Mine' }]);
    });

    it('trims the name', async () => {
      const res = await app.inject({ method: 'POST', url: TAGS_URL, headers, payload: { name: '  Spicy  ' } });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({ id: 1, name: 'Spicy' });
    });

    it('rejects an empty name without creating anything', async () => {
      const res = await app.inject({ method: 'POST', url: TAGS_URL, headers, payload: { name: '' } });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'Validation failed',
        fields: { name: ['This field may not be blank.'] },
      });
      expect(await store.tags.list(user.id)).toEqual([]);
    });

    it('rejects a missing name', async () => {
      const res = await app.inject({ method: 'POST', url: TAGS_URL, headers, payload: {} });
      expect(res.statusCode).toBe(400);
      expect(res.json().fields).toEqual({ name: ['This field is required.'] });
    });

    it('rejects a name longer than 255 characters', async () => {
      const res = await app.inject({ method: 'POST', url: TAGS_URL, headers, payload: { name: 'x'.repeat(256) } });
      expect(res.statusCode).toBe(400);
      expect(res.json().fields).toEqual({ name: ['Ensure this field has no more than 255 characters.'] });
    });

    it('rejects malformed JSON with a 400', async () => {
      const res = await app.inject({
        method: 'POST',
        url: TAGS_URL,
        headers: { ...headers, 'content-type': 'application/json' },
        payload: '{"name":',
      });
      expect(res.statusCode).toBe(400);
    });

    it('retrieves one tag', async () => {
      const tag = await store.tags.create(user.id, 'Breakfast');

      const res = await app.inject({ method: 'GET', url: detailUrl(tag.id), headers });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ id: tag.id, name: 'Breakfast' });
    });

    it('returns 404 for another user\'s tag', async () => {
      const other = await createTestUser(store, 'other@example.com');
      const tag = await store.tags.create(other.id, 'Private');

      for (const method of ['GET', 'PUT', 'PATCH', 'DELETE'] as const) {
        const payload = method === 'PUT' || method === 'PATCH' ? { name: 'Stolen' } : undefined;
        const res = await app.inject({ method, url: detailUrl(tag.id), headers, payload });
        expect(res.statusCode).toBe(404);
        expect(res.json()).toEqual({ error: 'Not found.' });
      }
      expect(await store.tags.get(other.id, tag.id)).toEqual({ id: tag.id, user_id: other.id, name: 'Private' });
    });

    it('returns 404 for an id that is not a positive integer', async () => {
      const res = await app.inject({ method: 'GET', url: detailUrl('abc'), headers });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Not found.' });
    });

    it('renames a tag with PATCH', async () => {
      const tag = await store.tags.create(user.id, 'After Dinner');

      const res = await app.inject({ method: 'PATCH', url: detailUrl(tag.id), headers, payload: { name: 'Dessert' } });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ id: tag.id, name: 'Dessert' });
      expect((await store.tags.get(user.id, tag.id))?.name).toBe('Dessert');
    });

    it('treats an empty PATCH as a no-op', async () => {
      const tag = await store.tags.create(user.id, 'Lunch');

      const res = await app.inject({ method: 'PATCH', url: detailUrl(tag.id), headers, payload: {} });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ id: tag.id, name: 'Lunch' });
    });

    it('requires the name on PUT', async () => {
      const tag = await store.tags.create(user.id, 'Lunch');

      const res = await app.inject({ method: 'PUT', url: detailUrl(tag.id), headers, payload: {} });
      expect(res.statusCode).toBe(400);
      expect(res.json().fields).toEqual({ name: ['This field is required.'] });
      expect((await store.tags.get(user.id, tag.id))?.name).toBe('Lunch');
    });

    it('deletes a tag and detaches it from recipes', async () => {
      const tag = await store.tags.create(user.id, 'Breakfast');
      const recipe = await store.recipes.create(user.id, {
        title: 'Porridge',
        time_minutes: 5,
        cost: '1.20',
        tags: [tag.id],
        ingredients: [],
      });

      const res = await app.inject({ method: 'DELETE', url: detailUrl(tag.id), headers });
      expect(res.statusCode).toBe(204);
      expect(res.body).toBe('');
      expect(await store.tags.list(user.id)).toEqual([]);
      expect((await store.recipes.get(user.id, recipe.id))?.tags).toEqual([]);
    });
  });
});
