import assert from "node:assert/strict";
import test from "node:test";

import { ChannelRegistry } from "../channelRegistry";

type FakeChannel = { id: Buffer; name: string };

function idOf(byte: number): Buffer {
  return Buffer.alloc(16, byte);
}

test("ChannelRegistry looks channels up by id content", () => {
  const registry = new ChannelRegistry<FakeChannel>();
  const a: FakeChannel = { id: idOf(0xaa), name: "a" };

  assert.equal(registry.add(a), undefined);
  assert.equal(registry.size, 1);
  assert.equal(registry.get(idOf(0xaa)), a);
  assert.equal(registry.has(idOf(0xaa)), true);
  assert.equal(registry.get(idOf(0xbb)), undefined);
});

test("ChannelRegistry.add returns the channel it replaced", () => {
  const registry = new ChannelRegistry<FakeChannel>();
  const first: FakeChannel = { id: idOf(1), name: "first" };
  const second: FakeChannel = { id: idOf(1), name: "second" };

  registry.add(first);
  assert.equal(registry.add(second), first);
  assert.equal(registry.size, 1);
  assert.equal(registry.get(idOf(1)), second);
});

test("ChannelRegistry.remove is idempotent and never evicts a replacement", () => {
  const registry = new ChannelRegistry<FakeChannel>();
  const stale: FakeChannel = { id: idOf(7), name: "stale" };
  const current: FakeChannel = { id: idOf(7), name: "current" };

  registry.add(stale);
  registry.add(current);

  assert.equal(registry.remove(stale), false);
  assert.equal(registry.get(idOf(7)), current);

  assert.equal(registry.remove(current), true);
  assert.equal(registry.remove(current), false);
  assert.equal(registry.size, 0);
});

test("ChannelRegistry.drain empties the registry", () => {
  const registry = new ChannelRegistry<FakeChannel>();
  const a: FakeChannel = { id: idOf(1), name: "a" };
  const b: FakeChannel = { id: idOf(2), name: "b" };
  registry.add(a);
  registry.add(b);

  assert.deepEqual(registry.drain(), [a, b]);
  assert.equal(registry.size, 0);
  assert.deepEqual(registry.values(), []);
});
