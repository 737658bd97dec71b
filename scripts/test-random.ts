import assert from "node:assert/strict";
import test from "node:test";
import { createRandomSeed, createSeededRandom, hashToSeed } from "../lib/cover/random";

test("same seed replays the same sequence", () => {
  const first = createSeededRandom(42);
  const second = createSeededRandom(42);

  const a = Array.from({ length: 20 }, () => first.next());
  const b = Array.from({ length: 20 }, () => second.next());

  assert.deepEqual(a, b);
  assert(a.every((value) => value >= 0 && value < 1), "next() must stay in [0, 1).");
});

test("different seeds diverge", () => {
  const a = createSeededRandom(1);
  const b = createSeededRandom(2);
  const left = Array.from({ length: 5 }, () => a.next());
  const right = Array.from({ length: 5 }, () => b.next());

  assert.notDeepEqual(left, right);
});

test("int is inclusive at both ends", () => {
  const rng = createSeededRandom(7);
  const seen = new Set<number>();

  for (let index = 0; index < 2000; index += 1) {
    const value = rng.int(3, 6);
    assert(Number.isInteger(value) && value >= 3 && value <= 6, `int(3, 6) returned ${value}`);
    seen.add(value);
  }

  assert.deepEqual([...seen].sort(), [3, 4, 5, 6]);
  assert.equal(rng.int(9, 9), 9);
  assert.equal(rng.int(9, 2), 9);
});

test("pick draws members and rejects an empty list", () => {
  const rng = createSeededRandom(11);
  const items = ["a", "b", "c"] as const;

  for (let index = 0; index < 50; index += 1) {
    assert(items.includes(rng.pick(items)));
  }

  assert.throws(() => rng.pick([]), /empty list/);
});

test("seed is normalized to an unsigned 32-bit integer", () => {
  assert.equal(createSeededRandom(-1).seed, 4294967295);
  assert.equal(createSeededRandom(5).seed, 5);
});

test("hashToSeed is stable and unsigned", () => {
  assert.equal(hashToSeed("cover"), hashToSeed("cover"));
  assert.notEqual(hashToSeed("cover|0"), hashToSeed("cover|1"));
  assert.equal(hashToSeed(""), 2166136261);

  const seed = createRandomSeed();
  assert(Number.isInteger(seed) && seed >= 0 && seed <= 0xffffffff, `unexpected random seed ${seed}`);
});
