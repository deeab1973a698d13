import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    restoreMocks: true,
    include: ["src/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "dist/**"],
  },
});
