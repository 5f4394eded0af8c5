import test from "node:test";
import assert from "node:assert/strict";
import { SessionClusterer, clusterSession, isSameMessage } from "../src/session.js";
import { InvalidInputError } from "../src/errors.js";
import { SqliteMessageStore } from "../src/storage.js";
import type { Trigger } from "../src/types.js";
import { FailingStore, HOUR, MINUTE, at, captureLogs, stored, userMessage } from "./helpers.js";

test("a gap equal to the threshold is included, one microsecond more is excluded", () => {
  captureLogs();
  const newestFirst = [stored({ id: 2, createdAt: at(0) }), stored({ id: 1, createdAt: at(-HOUR - 1) })];
  const session = clusterSession(newestFirst, at(HOUR), HOUR);
  assert.deepEqual(
    session.map((m) => m.id),
    [2],
  );
});

test("the cursor follows the last included message, not the trigger", () => {
  captureLogs();
  // Each step is 50 minutes; the oldest is 150 minutes before the trigger.
  const newestFirst = [
    stored({ id: 3, createdAt: at(-50 * MINUTE) }),
    stored({ id: 2, createdAt: at(-100 * MINUTE) }),
    stored({ id: 1, createdAt: at(-150 * MINUTE) }),
  ];
  const session = clusterSession(newestFirst, at(0), HOUR);
  assert.deepEqual(
    session.map((m) => m.id),
    [1, 2, 3],
  );
});

test("scanning stops at the first violation even if older messages are close together", () => {
  const { lines } = captureLogs(true);
  const newestFirst = [
    stored({ id: 4, createdAt: at(-MINUTE) }),
    stored({ id: 3, createdAt: at(-3 * HOUR) }),
    stored({ id: 2, createdAt: at(-3 * HOUR - MINUTE) }),
    stored({ id: 1, createdAt: at(-3 * HOUR - 2 * MINUTE) }),
  ];
  const session = clusterSession(newestFirst, at(0), HOUR);
  assert.deepEqual(
    session.map((m) => m.id),
    [4],
  );
  assert.deepEqual(lines, [
    `debug [context-engine] session boundary before message 3 (gap ${3 * HOUR - MINUTE}us > ${HOUR}us)`,
  ]);
});

test("an oversized first gap leaves the trigger alone", () => {
  captureLogs();
  const session = clusterSession([stored({ id: 1, createdAt: at(-2 * HOUR) })], at(0), HOUR);
  assert.deepEqual(session, []);
  assert.deepEqual(clusterSession([], at(0), HOUR), []);
});

test("isSameMessage matches by storage id, then by sequence id, within one conversation", () => {
  const a = stored({ id: 1, createdAt: at(0), sequenceId: "10" });
  const unsaved: Trigger = { ...a, id: undefined };
  assert.equal(isSameMessage(a, stored({ id: 1, createdAt: at(5) })), true);
  assert.equal(isSameMessage(a, stored({ id: 2, createdAt: at(0), sequenceId: "10" })), false);
  assert.equal(isSameMessage(a, unsaved), true);
  assert.equal(isSameMessage(unsaved, { ...unsaved, sequenceId: null }), false);
  assert.equal(isSameMessage(a, { ...a, conversationId: "chat-2" }), false);
});

test("SessionClusterer: long silence splits sessions (A, B, C, trigger D)", async () => {
  captureLogs();
  const store = new SqliteMessageStore(":memory:");
  try {
    await store.append(userMessage("chat-1", "A", at(0), { sequenceId: "a" }));
    await store.append(userMessage("chat-1", "B", at(HOUR), { sequenceId: "b" }));
    await store.append(userMessage("chat-1", "C", at(71 * HOUR), { sequenceId: "c" }));
    const d = await store.append(userMessage("chat-1", "D", at(71 * HOUR + 10 * MINUTE), { sequenceId: "d" }));

    const session = await new SessionClusterer(store).currentSession(d, { lookbackLimit: 25, gapThreshold: 2 * HOUR });
    assert.deepEqual(
      session.map((m) => m.text),
      ["C"],
    );
  } finally {
    store.close();
  }
});

test("SessionClusterer never returns more than lookbackLimit messages", async () => {
  captureLogs();
  const store = new SqliteMessageStore(":memory:");
  try {
    for (let i = 0; i < 10; i++) {
      await store.append(userMessage("chat-1", `m${i}`, at(i * MINUTE)));
    }
    const trigger = await store.append(userMessage("chat-1", "now", at(10 * MINUTE)));
    const session = await new SessionClusterer(store).currentSession(trigger, { lookbackLimit: 4, gapThreshold: HOUR });
    assert.deepEqual(
      session.map((m) => m.text),
      ["m6", "m7", "m8", "m9"],
    );
    assert.deepEqual(
      await new SessionClusterer(store).currentSession(trigger, { lookbackLimit: 0, gapThreshold: HOUR }),
      [],
    );
  } finally {
    store.close();
  }
});

test("SessionClusterer does not count the trigger, stored or not", async () => {
  captureLogs();
  const store = new SqliteMessageStore(":memory:");
  try {
    await store.append(userMessage("chat-1", "earlier", at(0)));
    const trigger = await store.append(userMessage("chat-1", "trigger", at(MINUTE), { sequenceId: "t" }));
    const clusterer = new SessionClusterer(store);
    const params = { lookbackLimit: 10, gapThreshold: HOUR };

    const fromStored = await clusterer.currentSession(trigger, params);
    const fromUnsaved = await clusterer.currentSession({ ...trigger, id: undefined }, params);
    assert.deepEqual(
      fromStored.map((m) => m.text),
      ["earlier"],
    );
    assert.deepEqual(
      fromUnsaved.map((m) => m.text),
      ["earlier"],
    );
  } finally {
    store.close();
  }
});

test("SessionClusterer rejects a trigger with neither id nor sequence id", async () => {
  captureLogs();
  const store = new FailingStore();
  const trigger: Trigger = { ...stored({ id: 1, createdAt: at(MINUTE), text: "synthetic trigger" }), id: undefined };
  await assert.rejects(
    new SessionClusterer(store).currentSession(trigger, { lookbackLimit: 1, gapThreshold: HOUR }),
    InvalidInputError,
  );
  assert.deepEqual(store.calls, []);
});

test("SessionClusterer keeps same-instant history for a trigger that was never appended", async () => {
  captureLogs();
  const store = new SqliteMessageStore(":memory:");
  try {
    await store.append(userMessage("chat-1", "earlier", at(0)));
    await store.append(userMessage("chat-1", "same instant", at(MINUTE), { sequenceId: "s1" }));
    const trigger: Trigger = {
      conversationId: "chat-1",
      participantId: "user-1",
      sequenceId: "t2",
      role: "user",
      text: "never appended",
      createdAt: at(MINUTE),
      replyToSequenceId: null,
      rawPayload: null,
    };

    const session = await new SessionClusterer(store).currentSession(trigger, { lookbackLimit: 10, gapThreshold: HOUR });
    assert.deepEqual(
      session.map((m) => m.text),
      ["earlier", "same instant"],
    );
  } finally {
    store.close();
  }
});

test("SessionClusterer ignores messages stored after the trigger", async () => {
  captureLogs();
  const store = new SqliteMessageStore(":memory:");
  try {
    await store.append(userMessage("chat-1", "before", at(0)));
    const trigger = await store.append(userMessage("chat-1", "trigger", at(MINUTE)));
    await store.append(userMessage("chat-1", "same instant, later row", at(MINUTE)));
    await store.append(userMessage("chat-1", "after", at(2 * MINUTE)));

    const session = await new SessionClusterer(store).currentSession(trigger, { lookbackLimit: 10, gapThreshold: HOUR });
    assert.deepEqual(
      session.map((m) => m.text),
      ["before"],
    );
  } finally {
    store.close();
  }
});
