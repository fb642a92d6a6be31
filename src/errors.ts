/**
 * Configuration problems detected before any entry runs
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		readonly path?: string,
	) {
		super(path ? `${path}: ${message}` : message)
		this.name = "ConfigError"
	}
}
