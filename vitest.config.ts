import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["kbchat/src/**/*.test.ts"],
    environment: "node"
  }
});
