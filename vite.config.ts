import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";

export default defineConfig({
	build: {
		lib: {
			entry: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
			name: "WireScript",
			formats: ["es", "cjs"],
			fileName: (format) => (format === "es" ? "wirescript.js" : "wirescript.cjs"),
		},
		rollupOptions: {
			external: [/^node:/, "dotenv", "pino", "pino-pretty", "zod"],
		},
		sourcemap: true,
		target: "es2022",
		minify: false,
		outDir: "dist",
		emptyOutDir: true,
	},
});
