// CHANGE: Central export file for all type definitions
// WHY: Provides a single import point for types used across modules

export type {
	CLIOptions,
	ClipboardBackend,
	SnapshotConfig,
	SnapshotOptions,
	ToolCommands,
} from "./config.js";
