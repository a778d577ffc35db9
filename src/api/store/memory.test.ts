import { describe, it, expect, beforeEach } from 'vitest';

import type { RecipeFields } from '../recipe/types.ts';
import { MemoryStore } from './memory.ts';

function fields(overrides: Partial<RecipeFields> = {}): RecipeFields {
  return { title: 'Sample recipe', time_minutes: 10, cost: '5.00', tags: [], ingredients: [], ...overrides };
}

describe('MemoryStore', () => {
  let store: MemoryStore;
  let ownerId: number;
  let otherId: number;

  beforeEach(async () => {
    store = new MemoryStore();
    ownerId = (await store.users.create({
      email: 'owner@example.com',
      name: '',
      password_hash: null,
      is_staff: false,
      is_superuser: false,
    })).id;
    otherId = (await store.users.create({
      email: 'other@example.com',
      name: '',
      password_hash: null,
      is_staff: false,
      is_superuser: false,
    })).id;
  });

  describe('users', () => {
    it('finds users by email case-insensitively', async () => {
      expect((await store.users.findByEmail('OWNER@example.com'))?.id).toBe(ownerId);
    });

    it('rejects a second user with the same email', async () => {
      await expect(
        store.users.create({ email: 'owner@example.com', name: '', password_hash: null, is_staff: false, is_superuser: false }),
      ).rejects.toMatchObject({ fields: { email: ['user with this email already exists.'] } });
    });

    it('returns copies, not live rows', async () => {
      const user = await store.users.findById(ownerId);
      if (user) user.name = 'mutated';
      expect((await store.users.findById(ownerId))?.name).toBe('');
    });
  });

  describe('named entities', () => {
    it('scopes every operation to the owner', async () => {
      const tag = await store.tags.create(ownerId, 'Vegan');

      expect(await store.tags.get(otherId, tag.id)).toBeNull();
      expect(await store.tags.update(otherId, tag.id, 'Stolen')).toBeNull();
      expect(await store.tags.delete(otherId, tag.id)).toBe(false);
      expect(await store.tags.list(otherId)).toEqual([]);
      expect(await store.tags.get(ownerId, tag.id)).toEqual({ id: tag.id, user_id: ownerId, name: 'Vegan' });
    });

    it('orders by name then id, both descending', async () => {
      await store.ingredients.create(ownerId, 'Basil');
      await store.ingredients.create(ownerId, 'Thyme');
      await store.ingredients.create(ownerId, 'Basil');

      const names = (await store.ingredients.list(ownerId)).map((i) => `${i.id}:${i.name}`);
      expect(names).toEqual(['2:Thyme', '3:Basil', '1:Basil']);
    });

    it('orders names by code unit, so lowercase sorts above uppercase', async () => {
      await store.tags.create(ownerId, 'apple');
      await store.tags.create(ownerId, 'Banana');
      await store.tags.create(ownerId, 'cherry');

      const names = (await store.tags.list(ownerId)).map((t) => t.name);
      expect(names).toEqual(['cherry', 'apple', 'Banana']);
    });

    it('reports only ids the owner holds', async () => {
      const mine = await store.tags.create(ownerId, 'Mine');
      const theirs = await store.tags.create(otherId, 'Theirs');

      expect(await store.tags.findOwnedIds(ownerId, [theirs.id, mine.id, 404])).toEqual([mine.id]);
    });

    it('keeps separate id sequences for tags and ingredients', async () => {
      const tag = await store.tags.create(ownerId, 'Vegan');
      const ingredient = await store.ingredients.create(ownerId, 'Salt');
      expect([tag.id, ingredient.id]).toEqual([1, 1]);
    });
  });

  describe('recipes', () => {
    it('keeps association order and hydrates detail in that order', async () => {
      const a = await store.tags.create(ownerId, 'A');
      const b = await store.tags.create(ownerId, 'B');
      const recipe = await store.recipes.create(ownerId, fields({ tags: [b.id, a.id] }));

      expect(recipe.tags).toEqual([b.id, a.id]);
      const detail = await store.recipes.getDetail(ownerId, recipe.id);
      expect(detail?.tags).toEqual([
        { id: b.id, user_id: ownerId, name: 'B' },
        { id: a.id, user_id: ownerId, name: 'A' },
      ]);
    });

    it('lists newest first', async () => {
      await store.recipes.create(ownerId, fields({ title: 'One' }));
      await store.recipes.create(ownerId, fields({ title: 'Two' }));

      expect((await store.recipes.list(ownerId)).map((r) => r.title)).toEqual(['Two', 'One']);
    });

    it('leaves absent keys untouched on update', async () => {
      const tag = await store.tags.create(ownerId, 'Keep');
      const recipe = await store.recipes.create(ownerId, fields({ tags: [tag.id] }));

      const updated = await store.recipes.update(ownerId, recipe.id, { cost: '7.25' });
      expect(updated).toEqual({ ...recipe, cost: '7.25' });
    });

    it('does not update or delete another owner\'s recipe', async () => {
      const recipe = await store.recipes.create(ownerId, fields());

      expect(await store.recipes.update(otherId, recipe.id, { title: 'Nope' })).toBeNull();
      expect(await store.recipes.delete(otherId, recipe.id)).toBe(false);
      expect(await store.recipes.getDetail(otherId, recipe.id)).toBeNull();
    });
  });

  describe('deleteUser', () => {
    it('cascades to everything the user owns', async () => {
      const tag = await store.tags.create(ownerId, 'Mine');
      const ingredient = await store.ingredients.create(ownerId, 'Salt');
      await store.recipes.create(ownerId, fields({ tags: [tag.id], ingredients: [ingredient.id] }));
      const kept = await store.recipes.create(otherId, fields({ title: 'Other' }));

      expect(store.deleteUser(ownerId)).toBe(true);

      expect(await store.users.findById(ownerId)).toBeNull();
      expect(await store.tags.list(ownerId)).toEqual([]);
      expect(await store.ingredients.list(ownerId)).toEqual([]);
      expect(await store.recipes.list(ownerId)).toEqual([]);
      expect(store.recipes.tagLinks).toEqual([]);
      expect(store.recipes.ingredientLinks).toEqual([]);
      expect(await store.recipes.list(otherId)).toEqual([kept]);
    });

    it('returns false for an unknown user', () => {
      expect(store.deleteUser(999)).toBe(false);
    });
  });
});
