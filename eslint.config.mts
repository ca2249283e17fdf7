// @ts-check
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";

import eslint from "@eslint/js";
import eslintCommentsConfigs from "@eslint-community/eslint-plugin-eslint-comments/configs";
import vitest from "eslint-plugin-vitest";
import globals from "globals";
import tseslint from "typescript-eslint";

export default tseslint.config(
	eslint.configs.recommended,
	tseslint.configs.strictTypeChecked,
	eslintCommentsConfigs.recommended,
	{
		languageOptions: {
			parser: tseslint.parser,
			globals: { ...globals.node },
			parserOptions: {
				projectService: true,
				tsconfigRootDir: dirname(fileURLToPath(import.meta.url)),
			},
		},
		files: ["**/*.ts"],
		rules: {
			complexity: ["error", 8],
			"max-lines-per-function": [
				"error",
				{ max: 50, skipBlankLines: true, skipComments: true },
			],
			"max-params": ["error", 5],
			"max-depth": ["error", 4],
			"max-lines": [
				"error",
				{ max: 300, skipBlankLines: true, skipComments: true },
			],
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{ allowNumber: true, allowBoolean: true, allowNullish: false },
			],
			"@typescript-eslint/ban-ts-comment": [
				"error",
				{ "ts-ignore": true, "ts-nocheck": true, "ts-expect-error": true },
			],
			"@eslint-community/eslint-comments/no-unlimited-disable": "error",
			"@eslint-community/eslint-comments/disable-enable-pair": "error",
			"@eslint-community/eslint-comments/no-unused-disable": "error",
			"no-restricted-syntax": [
				"error",
				{
					selector: "SwitchStatement",
					message: [
						"Switch statements are forbidden.",
						"How to fix: Use ts-pattern match() instead.",
					].join("\n"),
				},
				{
					selector: 'CallExpression[callee.name="require"]',
					message: "Avoid using require(). Use ES6 imports instead.",
				},
				{
					selector: "NewExpression[callee.name='Promise']",
					message: "Use Effect.async / Effect.tryPromise instead of new Promise.",
				},
			],
		},
	},
	{
		files: ["test/**/*.ts"],
		...vitest.configs.recommended,
		rules: {
			...vitest.configs.recommended.rules,
			"max-lines-per-function": "off",
			"max-lines": "off",
		},
	},
	{ ignores: ["dist/**", "coverage/**"] },
);
