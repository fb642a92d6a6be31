/**
 * Placeholder substitution for configuration paths
 *
 * - %NAME%   environment variable
 * - {{name}} configuration variable (global, overridden per entry)
 *
 * Environment placeholders expand first. Undefined names are errors.
 */

import { ConfigError } from "./errors.js"

export type Variables = Record<string, string>

const ENV_PATTERN = /%(\w+)%/g
const VARIABLE_PATTERN = /\{\{(\w+)\}\}/g

/** Passes allowed when chained variables refer to each other */
const MAX_PASSES = 10

export function expandEnvVariables(
	text: string,
	env: NodeJS.ProcessEnv = process.env,
): string {
	return text.replace(ENV_PATTERN, (_match, name: string) => {
		const value = env[name]
		if (value === undefined) {
			throw new ConfigError(`undefined environment variable '${name}'`)
		}
		return value
	})
}

/**
 * Expand environment placeholders, then one pass of {{name}} placeholders.
 */
export function substituteVariables(
	text: string,
	variables: Variables,
	context = "path",
	env: NodeJS.ProcessEnv = process.env,
): string {
	const expanded = expandEnvVariables(text, env)
	return expanded.replace(VARIABLE_PATTERN, (_match, name: string) => {
		const value = variables[name]
		if (value === undefined) {
			throw new ConfigError(`undefined variable '${name}' referenced in ${context}`)
		}
		return value
	})
}

/** Substitute repeatedly until the text stops changing */
export function resolveChained(
	text: string,
	variables: Variables,
	context: string,
	env: NodeJS.ProcessEnv = process.env,
): string {
	let value = text
	for (let pass = 0; pass < MAX_PASSES; pass++) {
		const next = substituteVariables(value, variables, context, env)
		if (next === value) break
		value = next
	}
	return value
}

/**
 * Resolve a variables map in declaration order: a value may refer to the
 * variables declared before it, and to everything in `inherited`.
 */
export function resolveVariables(
	raw: Variables,
	inherited: Variables = {},
	context = "variables",
	env: NodeJS.ProcessEnv = process.env,
): Variables {
	const resolved: Variables = {}
	for (const [key, value] of Object.entries(raw)) {
		resolved[key] = resolveChained(
			expandEnvVariables(value, env),
			{ ...inherited, ...resolved },
			context,
			env,
		)
	}
	return resolved
}
