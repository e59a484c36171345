import { describe, expect, it } from "vitest";
import { DECOY_DIGEST, hashPassword, verifyPassword } from "../../src/auth/credentials";

describe("credentials", () => {
  it("produces a salted scrypt digest", async () => {
    const digest = await hashPassword("password123");
    expect(digest).toMatch(/^scrypt\$[A-Za-z0-9_-]+\$[A-Za-z0-9_-]+$/);
    expect(digest).not.toContain("password123");
    expect(await hashPassword("password123")).not.toBe(digest);
  });

  it("verifies the right password only", async () => {
    const digest = await hashPassword("password123");
    expect(await verifyPassword(digest, "password123")).toBe(true);
    expect(await verifyPassword(digest, "password124")).toBe(false);
  });

  it("treats malformed digests as a mismatch", async () => {
    expect(await verifyPassword("password123", "password123")).toBe(false);
    expect(await verifyPassword("bcrypt$abc$def", "password123")).toBe(false);
    expect(await verifyPassword("scrypt$abc$def", "password123")).toBe(false);
    expect(await verifyPassword("scrypt$$", "password123")).toBe(false);
  });

  it("offers a well-formed decoy digest that matches nothing", async () => {
    const [prefix, salt, hash] = DECOY_DIGEST.split("$");

    expect(prefix).toBe("scrypt");
    expect(Buffer.from(salt, "base64url")).toHaveLength(16);
    expect(Buffer.from(hash, "base64url")).toHaveLength(64);
    expect(await verifyPassword(DECOY_DIGEST, "password123")).toBe(false);
  });
});
