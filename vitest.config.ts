import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      // Keeps dayjs' zone conversions independent of the host clock settings.
      TZ: "UTC",
    },
  },
});
