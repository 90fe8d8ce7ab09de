import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = fileURLToPath(new URL("./src", import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^#cli\/(.*)$/, replacement: `${src}/cli/$1` },
			{ find: /^#commands\/(.*)$/, replacement: `${src}/commands/$1` },
			{ find: /^#config\/(.*)$/, replacement: `${src}/config/$1` },
			{ find: /^#config$/, replacement: `${src}/config/index.ts` },
			{ find: /^#content\/(.*)$/, replacement: `${src}/content/$1` },
			{ find: /^#core\/(.*)$/, replacement: `${src}/$1` },
			{ find: /^#git\/(.*)$/, replacement: `${src}/git/$1` },
			{ find: /^#publish\/(.*)$/, replacement: `${src}/publish/$1` },
			{ find: /^#reconcile\/(.*)$/, replacement: `${src}/reconcile/$1` },
		],
	},
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		testTimeout: 10000,
	},
});
