import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // seeding hashes passwords with scrypt
    testTimeout: 20_000,
  },
});
