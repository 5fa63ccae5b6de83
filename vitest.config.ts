import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@candlemath/core": path.join(root, "packages/core/src/index.ts"),
			"@candlemath/indicators": path.join(root, "packages/indicators/src/index.ts"),
		},
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
	},
});
