import { test, expect } from 'vitest';
import { generateId } from './ulid.js';

test('generateId creates 26 character lowercase ULID', () => {
  const id = generateId();
  expect(id).toHaveLength(26);
  expect(id).toBe(id.toLowerCase());
});

test('generateId creates unique ids', () => {
  const id1 = generateId();
  const id2 = generateId();
  expect(id1).not.toBe(id2);
});

test('generateId sorts in creation order', () => {
  const ids = Array.from({ length: 50 }, () => generateId());
  expect([...ids].sort()).toEqual(ids);
});
