import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  CancelledError,
  DownloadError,
  ExtractionError,
  FormatUnavailableError,
  OutputTooLargeError,
  SourceUnavailableError,
  TaskTimeoutError,
  TransientNetworkError,
  UnknownError,
  describeError,
  toDownloadError,
} from "../src/services/errors.ts";

describe("DownloadError taxonomy", () => {
  it("should mark only transient network failures as retryable", () => {
    assert.equal(new TransientNetworkError("reset").retryable, true);
    assert.equal(new SourceUnavailableError("gone").retryable, false);
    assert.equal(new FormatUnavailableError("nope").retryable, false);
    assert.equal(new OutputTooLargeError(10, 5).retryable, false);
    assert.equal(new TaskTimeoutError(1000).retryable, false);
    assert.equal(new UnknownError("boom").retryable, false);
  });

  it("should group source and format failures as extraction errors", () => {
    const source = new SourceUnavailableError("private video", { url: "https://youtu.be/x" });
    assert.ok(source instanceof ExtractionError);
    assert.ok(source instanceof DownloadError);
    assert.equal(source.type, "source_unavailable");
    assert.deepEqual(source.context, { url: "https://youtu.be/x" });

    const format = new FormatUnavailableError("no formats");
    assert.ok(format instanceof ExtractionError);
    assert.equal(format.type, "format_unavailable");
  });

  it("should describe the size in too-large errors", () => {
    const known = new OutputTooLargeError(60_000_000, 52_428_800, { taskId: "1" });
    assert.equal(known.message, "Output of 60000000 bytes exceeds the 52428800 byte limit");
    assert.deepEqual(known.context, { taskId: "1", sizeBytes: 60_000_000, limitBytes: 52_428_800 });

    const unknown = new OutputTooLargeError(null, 100);
    assert.equal(unknown.message, "Output exceeds the 100 byte limit");
  });

  it("should name timeouts by their deadline", () => {
    const error = new TaskTimeoutError(1500, { taskId: "7" });
    assert.equal(error.name, "TimeoutError");
    assert.equal(error.type, "timeout");
    assert.equal(error.message, "Timed out after 1500ms");
    assert.deepEqual(error.context, { taskId: "7", timeoutMs: 1500 });
  });

  it("should keep cancellation outside the failure taxonomy", () => {
    const error = new CancelledError();
    assert.equal(error.message, "Operation cancelled");
    assert.equal(error instanceof DownloadError, false);
  });
});

describe("toDownloadError", () => {
  it("should pass download errors through", () => {
    const error = new TransientNetworkError("reset");
    assert.equal(toDownloadError(error), error);
  });

  it("should wrap other errors as unknown with the cause", () => {
    const cause = new TypeError("bad input");
    const error = toDownloadError(cause, { url: "https://youtu.be/x" });
    assert.ok(error instanceof UnknownError);
    assert.equal(error.message, "bad input");
    assert.equal(error.cause, cause);
    assert.deepEqual(error.context, { url: "https://youtu.be/x" });
  });

  it("should wrap non-errors", () => {
    const error = toDownloadError("plain string");
    assert.equal(error.type, "unknown");
    assert.equal(error.message, "plain string");
  });
});

describe("describeError", () => {
  it("should prefer the stack", () => {
    const error = new Error("boom");
    assert.equal(describeError(error), error.stack);
  });

  it("should stringify non-errors", () => {
    assert.equal(describeError(42), "42");
  });
});
