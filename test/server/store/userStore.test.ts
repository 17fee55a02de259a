import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConflictError, PersistenceError } from "../../../server/errors.js";
import { openTestStores, type TestStores } from "../helpers.js";

let stores: TestStores;

beforeEach(async () => {
  stores = await openTestStores();
});

afterEach(() => {
  stores.handle.close();
});

describe("UserStore", () => {
  it("stores emails in lower case and finds them case-insensitively", async () => {
    const created = await stores.users.createUser({
      username: "alice",
      email: " Alice@Example.COM ",
      passwordHash: "scrypt$00$00",
    });

    expect(created.email).toBe("alice@example.com");
    expect(await stores.users.findByEmail("ALICE@example.com")).toEqual({ ...created, passwordHash: "scrypt$00$00" });
    expect(await stores.users.findById(created.id)).toEqual(created);
  });

  it("refuses a second user with the same email", async () => {
    await stores.users.createUser({ username: "alice", email: "alice@example.com", passwordHash: "scrypt$00$00" });

    await expect(
      stores.users.createUser({ username: "other", email: "ALICE@example.com", passwordHash: "scrypt$00$00" }),
    ).rejects.toThrow(new ConflictError("Email already registered"));
  });

  it("records the last login time", async () => {
    const created = await stores.users.createUser({
      username: "alice",
      email: "alice@example.com",
      passwordHash: "scrypt$00$00",
    });

    await stores.users.recordLogin(created.id, new Date("2026-02-01T08:30:00.000Z"));

    expect(await stores.users.findById(created.id)).toMatchObject({ lastLoginAt: "2026-02-01T08:30:00.000Z" });
  });

  it("returns null for unknown users", async () => {
    expect(await stores.users.findById("missing")).toBeNull();
    expect(await stores.users.findByEmail("missing@example.com")).toBeNull();
  });

  it("wraps driver failures in PersistenceError", async () => {
    stores.handle.close();

    await expect(stores.users.findById("any")).rejects.toThrow(new PersistenceError("Failed to load user"));
    await expect(
      stores.users.createUser({ username: "alice", email: "alice@example.com", passwordHash: "scrypt$00$00" }),
    ).rejects.toThrow(new PersistenceError("Failed to create user"));
  });
});
