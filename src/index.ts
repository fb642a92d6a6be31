// This module is a library entry point
// For CLI usage, run: npx artifact-sync --config artifact-sync.yaml

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./variables.js"
export * from "./metadata.js"
export * from "./hash.js"
export * from "./chunks.js"
export * from "./extract.js"
export * from "./processes.js"
export * from "./launch.js"
export * from "./progress.js"
export * from "./github.js"
export {
	HTTP_AGENT,
	HttpStatusError,
	headRemote,
	readText,
	type HttpOptions,
	type RemoteProbe,
} from "./http.js"
export {
	TransferEngine,
	getPartPath,
	moveFile,
	type FetchOptions,
	type TransferEngineOptions,
	type TransferResult,
} from "./download.js"
export * from "./core/index.js"
