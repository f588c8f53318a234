import assert from 'node:assert/strict';
import { test } from 'node:test';
import { PriceLookup } from './price_lookup.js';

const lookup = new PriceLookup([
  { timestamp: 300, price: 3 },
  { timestamp: 100, price: 1 },
  { timestamp: 200, price: 2 }
]);

test('empty snapshot falls back', () => {
  assert.equal(new PriceLookup([]).resolvePrice(50, 100), 100);
});

test('exact timestamps return their own price', () => {
  assert.equal(lookup.resolvePrice(100, 99), 1);
  assert.equal(lookup.resolvePrice(200, 99), 2);
  assert.equal(lookup.resolvePrice(300, 99), 3);
});

test('exact match tolerates less than a tenth of a second either way', () => {
  assert.equal(lookup.resolvePrice(200.05, 99), 2);
  assert.equal(lookup.resolvePrice(199.95, 99), 2);
  assert.equal(lookup.resolvePrice(199.85, 99), 1);
});

test('between samples the earlier price carries forward', () => {
  assert.equal(lookup.resolvePrice(150, 99), 1);
  assert.equal(lookup.resolvePrice(250, 99), 2);
  assert.equal(lookup.resolvePrice(10_000, 99), 3);
});

test('before the earliest sample resolves to zero', () => {
  assert.equal(lookup.resolvePrice(50, 99), 0);
  assert.equal(lookup.resolvePrice(99.85, 99), 0);
});

test('duplicate timestamps: exact match prefers the first stored', () => {
  const dup = new PriceLookup([
    { timestamp: 100, price: 9 },
    { timestamp: 100, price: 4 }
  ]);
  assert.equal(dup.resolvePrice(100, 1), 9);
  assert.equal(dup.resolvePrice(150, 1), 9);
});

test('hasSampleNear', () => {
  assert.equal(lookup.hasSampleNear(100.09), true);
  assert.equal(lookup.hasSampleNear(150), false);
  assert.equal(new PriceLookup([]).hasSampleNear(0), false);
});
