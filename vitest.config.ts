import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["{core,client,server,harness}/src/**/*.test.ts"],
    environment: "node",
  },
});
