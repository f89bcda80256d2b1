import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
	// Load .env so JOURNAL_* overrides are visible to tests that opt in.
	// Passing '' as the prefix loads ALL vars (not just VITE_-prefixed ones).
	const env = loadEnv(mode ?? "test", process.cwd(), "");
	Object.assign(process.env, env);

	return {
		test: {
			globals: true,
			include: [
				"tests/unit/**/*.test.ts",
				"tests/integration/**/*.test.ts",
			],
			setupFiles: ["tests/setup.ts"],
			testTimeout: 30000,
		},
	};
});
