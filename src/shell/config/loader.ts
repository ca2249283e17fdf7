// PURITY: SHELL (reads the config file)
// INVARIANT: A missing default config yields defaultCheckerConfig; a broken one is a ConfigError
// COMPLEXITY: O(n) where n = |config file|

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { RuleId } from "../../core/hcl/findings.js";
import { isRuleId, RULE_IDS } from "../../core/rules/index.js";
import type { CheckerConfig } from "../../core/types/index.js";

export const DEFAULT_CONFIG_FILE = "hcl-style.config.json";

export const defaultCheckerConfig: CheckerConfig = {
	rules: { "ST.003": true, "ST.005": true },
	excludeDirs: [".terraform", ".git", "node_modules"],
};

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export type Validated<T> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly detail: string };

function validateRules(
	value: JSONValue | undefined,
): Validated<CheckerConfig["rules"]> {
	if (value === undefined) {
		return { ok: true, value: defaultCheckerConfig.rules };
	}
	if (!isJSONObject(value)) {
		return { ok: false, detail: `"rules" must be an object` };
	}
	const rules: Record<RuleId, boolean> = { ...defaultCheckerConfig.rules };
	for (const [key, enabled] of Object.entries(value)) {
		if (!isRuleId(key)) {
			return {
				ok: false,
				detail: `Unknown rule "${key}" (known rules: ${RULE_IDS.join(", ")})`,
			};
		}
		if (typeof enabled !== "boolean") {
			return { ok: false, detail: `"rules.${key}" must be true or false` };
		}
		rules[key] = enabled;
	}
	return { ok: true, value: rules };
}

function validateExcludeDirs(
	value: JSONValue | undefined,
): Validated<readonly string[]> {
	if (value === undefined) {
		return { ok: true, value: defaultCheckerConfig.excludeDirs };
	}
	return isStringArray(value)
		? { ok: true, value }
		: { ok: false, detail: `"excludeDirs" must be an array of strings` };
}

/**
 * Validates parsed config JSON.
 *
 * @param parsed - Result of JSON.parse on the config file
 * @returns The config, or a description of the first problem found
 *
 * @pure true
 */
export function validateCheckerConfig(
	parsed: JSONValue,
): Validated<CheckerConfig> {
	if (!isJSONObject(parsed)) {
		return { ok: false, detail: "config root must be a JSON object" };
	}
	const rules = validateRules(parsed["rules"]);
	if (!rules.ok) return rules;
	const excludeDirs = validateExcludeDirs(parsed["excludeDirs"]);
	if (!excludeDirs.ok) return excludeDirs;
	return {
		ok: true,
		value: { rules: rules.value, excludeDirs: excludeDirs.value },
	};
}

/**
 * Parses config file text.
 *
 * @pure true
 */
export function parseCheckerConfig(
	raw: string,
	configPath: string,
): Effect.Effect<CheckerConfig, ConfigError> {
	return Effect.gen(function* () {
		const parsed: JSONValue = yield* Effect.try({
			try: () => JSON.parse(raw),
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: `invalid JSON: ${String(error)}`,
				}),
		});
		const result = validateCheckerConfig(parsed);
		if (!result.ok) {
			return yield* Effect.fail(
				new ConfigError({ path: configPath, detail: result.detail }),
			);
		}
		return result.value;
	});
}

/**
 * Loads hcl-style.config.json.
 *
 * @param configPath - Explicit path from --config; must exist when given
 * @param cwd - Directory searched for the default file
 *
 * @effect Effect<CheckerConfig, ConfigError>
 */
export function loadCheckerConfig(
	configPath: string | undefined,
	cwd: string = process.cwd(),
): Effect.Effect<CheckerConfig, ConfigError> {
	const resolved = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
	return Effect.gen(function* () {
		if (!fs.existsSync(resolved)) {
			if (configPath === undefined) return defaultCheckerConfig;
			return yield* Effect.fail(
				new ConfigError({ path: resolved, detail: "file not found" }),
			);
		}
		const raw = yield* Effect.try({
			try: () => fs.readFileSync(resolved, "utf8"),
			catch: (error) =>
				new ConfigError({ path: resolved, detail: String(error) }),
		});
		return yield* parseCheckerConfig(raw, resolved);
	});
}
