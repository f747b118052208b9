import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["tests/**/*.test.ts"],
        env: {
            WS_LOG_LEVEL: "silent",
        },
        testTimeout: 10000,
    },
});
