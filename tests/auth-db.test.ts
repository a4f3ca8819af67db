import assert from "node:assert/strict";
import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import {
  type AuthDbClient,
  createAuthDb,
  createSqliteExecutor,
  mapInviteRow,
  mapUserRow,
  parseSqliteDate,
} from "../src/db/auth-db.ts";

const ADMIN_ID = 1001;

describe("row mappers", () => {
  it("should parse SQLite timestamps as UTC", () => {
    assert.equal(parseSqliteDate("2024-01-02 03:04:05").toISOString(), "2024-01-02T03:04:05.000Z");
    assert.equal(parseSqliteDate(null).getTime(), 0);
  });

  it("should map user rows", () => {
    assert.deepEqual(
      mapUserRow({ id: 5, username: "alice", added_at: "2024-01-02 03:04:05", added_by: 1001, is_active: 1 }),
      {
        userId: 5,
        username: "alice",
        addedAt: new Date("2024-01-02T03:04:05Z"),
        addedBy: 1001,
        isActive: true,
      },
    );
  });

  it("should map invite rows", () => {
    assert.deepEqual(
      mapInviteRow({
        id: "code-1",
        created_by: 1001,
        created_at: "2024-01-02 03:04:05",
        used_by: null,
        used_at: null,
        is_active: 1,
      }),
      {
        code: "code-1",
        createdBy: 1001,
        createdAt: new Date("2024-01-02T03:04:05Z"),
        usedBy: null,
        usedAt: null,
        isActive: true,
      },
    );
  });
});

describe("createSqliteExecutor", () => {
  it("should create a missing data directory", async () => {
    const root = await mkdtemp(join(tmpdir(), "auth-db-"));
    try {
      const dataDir = join(root, "fresh", "data");
      const db = createAuthDb(createSqliteExecutor(join(dataDir, "bot.db")));

      assert.deepEqual(db.init(ADMIN_ID), { ok: true, data: undefined });
      assert.deepEqual(db.isAuthorized(ADMIN_ID), { ok: true, data: true });
      db.close();
      assert.equal(existsSync(join(dataDir, "bot.db")), true);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});

describe("createAuthDb", () => {
  let db: AuthDbClient;

  beforeEach(() => {
    db = createAuthDb(createSqliteExecutor(":memory:"));
    const result = db.init(ADMIN_ID);
    assert.equal(result.ok, true);
  });

  afterEach(() => {
    db.close();
  });

  describe("init", () => {
    it("should authorize the admin", () => {
      assert.deepEqual(db.isAuthorized(ADMIN_ID), { ok: true, data: true });
    });

    it("should be safe to run twice and re-activate the admin", () => {
      db.deactivateUser(ADMIN_ID);
      assert.equal(db.init(ADMIN_ID).ok, true);
      assert.deepEqual(db.isAuthorized(ADMIN_ID), { ok: true, data: true });
    });
  });

  describe("users", () => {
    it("should reject unknown users", () => {
      assert.deepEqual(db.isAuthorized(42), { ok: true, data: false });
    });

    it("should add a user once", () => {
      assert.deepEqual(db.addUser(42, { username: "alice", addedBy: ADMIN_ID }), { ok: true, data: true });
      assert.deepEqual(db.addUser(42), { ok: true, data: false });
      assert.deepEqual(db.isAuthorized(42), { ok: true, data: true });

      const user = db.getUser(42);
      assert.equal(user.ok, true);
      if (user.ok) {
        assert.equal(user.data?.username, "alice");
        assert.equal(user.data?.addedBy, ADMIN_ID);
        assert.equal(user.data?.isActive, true);
        assert.ok(user.data?.addedAt instanceof Date);
      }
    });

    it("should deactivate and re-activate a user", () => {
      db.addUser(42);
      assert.deepEqual(db.deactivateUser(42), { ok: true, data: true });
      assert.deepEqual(db.isAuthorized(42), { ok: true, data: false });

      assert.deepEqual(db.addUser(42), { ok: true, data: false });
      assert.deepEqual(db.isAuthorized(42), { ok: true, data: true });
    });

    it("should report deactivating an unknown user", () => {
      assert.deepEqual(db.deactivateUser(404), { ok: true, data: false });
    });

    it("should return null for an unknown user", () => {
      assert.deepEqual(db.getUser(404), { ok: true, data: null });
    });

    it("should list all users", () => {
      db.addUser(5);
      db.addUser(3);

      const users = db.getAllUsers();
      assert.equal(users.ok, true);
      if (users.ok) {
        assert.deepEqual(users.data.map((u) => u.userId).sort((a, b) => a - b), [3, 5, ADMIN_ID]);
      }
    });
  });

  describe("invites", () => {
    it("should create an active invite", () => {
      const created = db.createInvite(ADMIN_ID);
      assert.equal(created.ok, true);
      if (!created.ok) return;

      assert.match(created.data.code, /^[0-9a-f-]{36}$/);
      assert.equal(created.data.createdBy, ADMIN_ID);
      assert.equal(created.data.isActive, true);
      assert.equal(created.data.usedBy, null);
    });

    it("should authorize the user who redeems it", () => {
      const created = db.createInvite(ADMIN_ID);
      if (!created.ok) assert.fail(created.error.message);

      assert.deepEqual(db.useInvite(created.data.code, 42, "bob"), { ok: true, data: true });
      assert.deepEqual(db.isAuthorized(42), { ok: true, data: true });

      const invite = db.getInvite(created.data.code);
      assert.equal(invite.ok, true);
      if (invite.ok) {
        assert.equal(invite.data?.usedBy, 42);
        assert.equal(invite.data?.isActive, false);
        assert.ok(invite.data?.usedAt instanceof Date);
      }

      const user = db.getUser(42);
      assert.equal(user.ok && user.data?.username, "bob");
      assert.equal(user.ok && user.data?.addedBy, 0);
    });

    it("should only be redeemed once", () => {
      const created = db.createInvite(ADMIN_ID);
      if (!created.ok) assert.fail(created.error.message);

      db.useInvite(created.data.code, 42);
      assert.deepEqual(db.useInvite(created.data.code, 43), { ok: true, data: false });
      assert.deepEqual(db.isAuthorized(43), { ok: true, data: false });
    });

    it("should reject unknown codes", () => {
      assert.deepEqual(db.useInvite("no-such-code", 42), { ok: true, data: false });
      assert.deepEqual(db.getInvite("no-such-code"), { ok: true, data: null });
    });

    it("should re-activate a deactivated user", () => {
      db.addUser(42, { username: "carol" });
      db.deactivateUser(42);
      const created = db.createInvite(ADMIN_ID);
      if (!created.ok) assert.fail(created.error.message);

      assert.deepEqual(db.useInvite(created.data.code, 42), { ok: true, data: true });
      assert.deepEqual(db.isAuthorized(42), { ok: true, data: true });
      const user = db.getUser(42);
      assert.equal(user.ok && user.data?.username, "carol");
    });
  });

  describe("errors", () => {
    it("should return query errors instead of throwing", () => {
      const closed = createAuthDb(createSqliteExecutor(":memory:"));
      closed.close();

      const result = closed.isAuthorized(ADMIN_ID);
      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.equal(result.error.type, "query_error");
        assert.ok(result.error.message.startsWith(`Failed to check authorization of ${ADMIN_ID}: `));
      }
    });
  });
});
