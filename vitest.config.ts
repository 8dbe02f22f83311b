import { tmpdir } from "node:os";
import { join } from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      LABELCTL_CONFIG_DIR: join(tmpdir(), "labelctl-test-config"),
      LABELCTL_TOKEN: "",
      LABELCTL_BASE_URL: "",
    },
  },
});
