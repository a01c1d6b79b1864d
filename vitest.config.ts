import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["skills/**/test/**/*.test.ts"],
    setupFiles: ["skills/eks-env/test/setup.ts"],
    environment: "node",
  },
});
