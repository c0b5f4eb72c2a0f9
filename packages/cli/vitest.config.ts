import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    name: "ics2json-cli",
    root: __dirname,
    include: ["src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@icsjson/ics": path.resolve(__dirname, "../ics/src"),
    },
  },
});
