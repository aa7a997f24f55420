import { defineConfig, type ViteUserConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()] as unknown as ViteUserConfig["plugins"],
  test: {
    globals: true,
    testTimeout: 10000,
    hookTimeout: 10000,
    environment: "node",
    include: ["src/**/*.test.{ts,tsx}"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
