import eslint from "@eslint/js";
import jsonc from "eslint-plugin-jsonc";
import tseslint from "typescript-eslint";
import type { Rule } from "eslint";
import type { ConfigArray } from "typescript-eslint";

const TEST_SUFFIXES = [".unit.test.ts", ".integration.test.ts"];

// Test files are either unit or integration suites
const testFileNamingRule: Rule.RuleModule = {
	meta: {
		type: "problem",
		docs: { description: "Enforce that test files end with .unit.test.ts or .integration.test.ts" },
		messages: {
			invalidTestFileName: "Test file must end with .unit.test.ts or .integration.test.ts. Found: '{{actual}}'",
		},
	},
	create(context) {
		return {
			Program() {
				const filename = context.filename;
				if (TEST_SUFFIXES.some((suffix) => filename.endsWith(suffix))) return;
				context.report({
					loc: { column: 0, line: 1 },
					messageId: "invalidTestFileName",
					data: { actual: filename },
				});
			},
		};
	},
};

const layout = {
	indent: ["error", "tab"],
	quotes: ["error", "double", { avoidEscape: true }],
} as const;

export default [
	{ ignores: ["dist/**", "node_modules/**", "*.config.ts"] },

	{
		...eslint.configs.recommended,
		files: ["**/*.ts"],
	},

	// Sources: strict, type-aware, no type assertions
	...tseslint.configs.strictTypeChecked.map((config) => ({ ...config, files: ["src/**/*.ts"] })),
	{
		files: ["src/**/*.ts"],
		linterOptions: { noInlineConfig: true },
		languageOptions: {
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			...layout,
			"@typescript-eslint/restrict-plus-operands": ["error", { allowNumberAndString: true }],
			"@typescript-eslint/consistent-type-assertions": ["error", { assertionStyle: "never" }],
			complexity: ["warn", { max: 16 }],
			"max-depth": ["warn", { max: 4 }],
		},
	},
	{
		// Recursive descent and tree walks
		files: ["src/parser/*.ts", "src/schema-check.ts"],
		rules: { complexity: "off", "max-depth": "off" },
	},

	// Tests
	...tseslint.configs.recommended.map((config) => ({ ...config, files: ["test/**/*.ts"] })),
	{
		files: ["test/**/*.test.ts"],
		plugins: { local: { rules: { "test-file-naming": testFileNamingRule } } },
		rules: { "local/test-file-naming": "error" },
	},
	{
		files: ["test/**/*.ts"],
		rules: layout,
	},

	// Fixtures
	...jsonc.configs["flat/recommended-with-json"].map((config) => ({ ...config, files: ["**/*.json"] })),
	{
		files: ["**/*.json"],
		rules: {
			"jsonc/indent": ["error", "tab"],
			"jsonc/quotes": ["error", "double"],
		},
	},
] satisfies ConfigArray;
