import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["gpx/**/*_test.ts"],
  },
});
