import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/__tests__/**/*.test.ts"],
        environment: "node",
        // unit tags only exist at compile time, so their tests run through tsc
        typecheck: {
            enabled: true,
            include: ["src/**/__tests__/**/*.test-d.ts"],
            tsconfig: "./tsconfig.json",
        },
    },
});
