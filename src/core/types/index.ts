// CHANGE: Central export point for port types
// PURITY: CORE

export type {
	ByteSource,
	CodecEnvironment,
	ErrorSink,
	OutputSink,
	SourceOpener,
} from "./io.js";
