import assert from "node:assert/strict";
import { describe, it } from "node:test";
import * as messages from "../src/bot/messages.ts";
import type { DownloadTask } from "../src/services/download-queue.ts";
import { createStatusMessages, statusTextFor } from "../src/services/status-messages.ts";
import { HD_FORMAT, tick } from "./fixtures.ts";

const URL = "https://youtu.be/abc123";

function task(overrides: Partial<DownloadTask> = {}): DownloadTask {
  return {
    id: "9",
    identity: 100,
    url: URL,
    format: HD_FORMAT,
    state: "running",
    enqueuedAt: 0,
    startedAt: 1,
    finishedAt: null,
    attempt: 1,
    result: null,
    ...overrides,
  };
}

function createMockTransport(failEdits = false) {
  const sent: Array<[string | number, string]> = [];
  const edits: Array<[string | number, number, string]> = [];
  let nextId = 500;

  const transport = {
    sendStatus: async (identity: string | number, text: string) => {
      sent.push([identity, text]);
      return nextId++;
    },
    editText: async (identity: string | number, messageId: number, text: string) => {
      if (failEdits) throw new Error("message to edit not found");
      edits.push([identity, messageId, text]);
    },
  };

  return { transport, sent, edits };
}

describe("statusTextFor", () => {
  it("should include the file size while sending", () => {
    const done = task({
      state: "succeeded",
      result: { kind: "succeeded", artifact: { filePath: "/tmp/x.mp4", fileSize: 1536, title: "Clip" } },
    });
    assert.equal(
      statusTextFor(done, "sending"),
      "✅ <b>Download completed</b>\n\nFormat: <b>HD (720p)</b>\nSize: 1.5 KB\n\nNow sending file...",
    );
  });

  it("should leave the queued stage to the menu reply", () => {
    assert.equal(statusTextFor(task(), "queued"), null);
  });
});

describe("createStatusMessages", () => {
  it("should edit the attached menu when a queued task starts", async () => {
    const mock = createMockTransport();
    const status = createStatusMessages({ transport: mock.transport });

    status.attach("9", 100, 42, "queued");
    status.onTransition(task(), "queued");
    await tick();

    assert.deepEqual(mock.edits, [[100, 42, messages.downloadStarted("HD (720p)", URL)]]);
    assert.deepEqual(mock.sent, []);
  });

  it("should not repeat the start of a task dispatched during enqueue", async () => {
    const mock = createMockTransport();
    const status = createStatusMessages({ transport: mock.transport });

    // The transition fires before the handler attaches the menu message
    status.onTransition(task(), "queued");
    status.attach("9", 100, 42, "downloading");
    await tick();

    assert.deepEqual(mock.edits, []);
    assert.deepEqual(mock.sent, []);
  });

  it("should post a new message when none was attached and edit it afterwards", async () => {
    const mock = createMockTransport();
    const status = createStatusMessages({ transport: mock.transport });

    status.onTransition(task(), "queued");
    await status.update(task(), "sent");

    assert.deepEqual(mock.sent, [[100, messages.downloadStarted("HD (720p)", URL)]]);
    assert.deepEqual(mock.edits, [[100, 500, messages.FILE_SENT]]);
  });

  it("should ignore other transitions", async () => {
    const mock = createMockTransport();
    const status = createStatusMessages({ transport: mock.transport });

    status.attach("9", 100, 42, "queued");
    status.onTransition(task({ state: "queued" }), null);
    status.onTransition(task({ state: "succeeded" }), "running");
    await tick();

    assert.deepEqual(mock.edits, []);
  });

  it("should skip an edit for the stage already shown", async () => {
    const mock = createMockTransport();
    const status = createStatusMessages({ transport: mock.transport });

    status.attach("9", 100, 42, "queued");
    await status.update(task(), "failed");
    await status.update(task(), "failed");

    assert.equal(mock.edits.length, 1);
  });

  it("should resolve when an edit fails", async () => {
    const mock = createMockTransport(true);
    const status = createStatusMessages({ transport: mock.transport });

    status.attach("9", 100, 42, "queued");
    await status.update(task(), "cancelled");

    assert.deepEqual(mock.edits, []);
  });

  it("should forget delivered tasks", () => {
    const status = createStatusMessages({ transport: createMockTransport().transport });

    status.attach("9", 100, 42, "queued");
    status.attach("10", 100, 43, "queued");
    status.forget("9");

    assert.equal(status.size(), 1);
  });
});
