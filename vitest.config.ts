import { fileURLToPath, URL } from "node:url";
import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./web/src", import.meta.url)),
    },
  },
  test: {
    environment: "jsdom",
    include: ["web/src/**/*.test.ts", "web/src/**/*.test.tsx"],
    setupFiles: ["web/src/test/setup.ts"],
  },
});
