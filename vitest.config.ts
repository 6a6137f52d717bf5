import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		coverage: {
			provider: "v8",
			include: ["src/**/*.ts"],
			exclude: ["src/**/*.test.ts", "src/**/__tests__/**", "src/**/index.ts"],
		},
		benchmark: {
			include: ["benches/**/*.bench.ts"],
		},
	},
});
