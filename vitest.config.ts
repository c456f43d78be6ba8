import path from "node:path";
import { defineConfig } from "vitest/config";

const pkg = (name: string): string =>
	path.resolve(__dirname, "packages", name, "src", "index.ts");

export default defineConfig({
	resolve: {
		alias: {
			"@sreit/core": pkg("core"),
			"@sreit/indicators": pkg("indicators"),
			"@sreit/data": pkg("data"),
			"@sreit/analysis": pkg("analysis"),
			"@sreit/narrative": pkg("narrative"),
			"@sreit/dashboard": pkg("dashboard"),
			"@sreit/notifier": pkg("notifier"),
		},
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
	},
});
