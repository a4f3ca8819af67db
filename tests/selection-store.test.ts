import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createSelectionStore, generateToken } from "../src/services/selection-store.ts";
import { HD_FORMAT } from "./fixtures.ts";

const URL = "https://youtu.be/abc123";
const HD_OPTION = { id: "hd" as const, label: HD_FORMAT.label, format: HD_FORMAT };

function createClock(start = 1_000_000) {
  const clock = { now: start };
  return { clock, now: () => clock.now };
}

describe("generateToken", () => {
  it("should produce 12 url-safe characters", () => {
    const token = generateToken();
    assert.match(token, /^[A-Za-z0-9_-]{12}$/);
  });

  it("should not repeat", () => {
    const tokens = new Set(Array.from({ length: 100 }, () => generateToken()));
    assert.equal(tokens.size, 100);
  });
});

describe("createSelectionStore", () => {
  it("should return a stored entry by token", () => {
    const { now } = createClock();
    const store = createSelectionStore({ ttlMs: 1000, maxEntries: 10 }, now);

    const token = store.create(URL, [HD_OPTION]);
    const result = store.get(token);

    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.entry.token, token);
      assert.equal(result.entry.url, URL);
      assert.deepEqual(result.entry.options, [HD_OPTION]);
      assert.equal(result.entry.format, null);
      assert.equal(result.entry.createdAt, 1_000_000);
    }
  });

  it("should report unknown tokens", () => {
    const store = createSelectionStore({ ttlMs: 1000, maxEntries: 10 });
    assert.deepEqual(store.get("missing"), { ok: false, error: "not_found" });
  });

  it("should hide entries once the TTL has passed", () => {
    const { clock, now } = createClock();
    const store = createSelectionStore({ ttlMs: 1000, maxEntries: 10 }, now);
    const token = store.create(URL);

    clock.now += 999;
    assert.equal(store.get(token).ok, true);

    clock.now += 1;
    assert.deepEqual(store.get(token), { ok: false, error: "not_found" });
    assert.equal(store.size(), 0);
  });

  it("should record the chosen format", () => {
    const { now } = createClock();
    const store = createSelectionStore({ ttlMs: 1000, maxEntries: 10 }, now);
    const token = store.create(URL, [HD_OPTION]);

    const result = store.setFormat(token, HD_FORMAT);
    assert.equal(result.ok, true);

    const lookup = store.get(token);
    assert.equal(lookup.ok && lookup.entry.format, HD_FORMAT);
  });

  it("should not set a format on an expired entry", () => {
    const { clock, now } = createClock();
    const store = createSelectionStore({ ttlMs: 1000, maxEntries: 10 }, now);
    const token = store.create(URL);

    clock.now += 1000;
    assert.deepEqual(store.setFormat(token, HD_FORMAT), { ok: false, error: "not_found" });
  });

  it("should consume entries once", () => {
    const store = createSelectionStore({ ttlMs: 1000, maxEntries: 10 });
    const token = store.create(URL);

    assert.equal(store.consume(token), true);
    assert.equal(store.consume(token), false);
    assert.equal(store.get(token).ok, false);
  });

  it("should sweep expired entries on create", () => {
    const { clock, now } = createClock();
    const store = createSelectionStore({ ttlMs: 1000, maxEntries: 10 }, now);
    store.create(URL);
    store.create(URL);

    clock.now += 500;
    const fresh = store.create(URL);
    assert.equal(store.size(), 3);

    clock.now += 600;
    store.create(URL);
    assert.equal(store.size(), 2);
    assert.equal(store.get(fresh).ok, true);
  });

  it("should count what a sweep removed", () => {
    const { clock, now } = createClock();
    const store = createSelectionStore({ ttlMs: 1000, maxEntries: 10 }, now);
    store.create(URL);
    store.create(URL);

    clock.now += 1000;
    assert.equal(store.sweep(), 2);
    assert.equal(store.size(), 0);
  });

  it("should evict the oldest entries beyond the cap", () => {
    const store = createSelectionStore({ ttlMs: 60_000, maxEntries: 2 });
    const first = store.create(URL);
    const second = store.create(URL);
    const third = store.create(URL);

    assert.equal(store.size(), 2);
    assert.equal(store.get(first).ok, false);
    assert.equal(store.get(second).ok, true);
    assert.equal(store.get(third).ok, true);
  });
});
