import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "ics",
    root: __dirname,
    include: ["src/**/*.test.ts"],
  },
});
