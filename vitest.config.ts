import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		environment: "node",
		env: {
			WIRE_LOG_LEVEL: "silent",
		},
	},
});
