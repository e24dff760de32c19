export * from "./types";
export * from "./origins";
export * from "./Exceptions";
export { ErrorChannel } from "./ErrorChannel";
export {
	CollabSettingsDefaults,
	resolveSettings,
	type CollabSettings,
	type StalenessComparison,
} from "./CollabSettings";
export { DefaultTimeProvider, type Debounced, type TimeProvider } from "./TimeProvider";
export {
	configureLogger,
	initializeLogger,
	onLogEntry,
	setDebugging,
	shutdownLogger,
	type IFileAdapter,
	type LogEntry,
	type LogLevel,
} from "./debug";
export { NodeFileAdapter } from "./NodeFileAdapter";

export {
	DocumentReplica,
	ReplicaWriter,
	type ContentChanged,
	type ReplicaOptions,
	type UpdateListener,
} from "./replica/DocumentReplica";
export {
	AwarenessRegistrar,
	type AwarenessRegistrarOptions,
	type AwarenessState,
	type PresenceDiff,
	type PresenceIdentity,
	type PresenceSelection,
} from "./awareness/AwarenessRegistrar";
export { colorForUser } from "./awareness/colors";
export type {
	EditingSurface,
	PresenceDecoration,
	SurfaceDispatch,
	SurfaceUpdate,
} from "./binding/EditingSurface";
export { CodeMirrorSurface } from "./binding/CodeMirrorSurface";
export {
	EditingSurfaceBinding,
	type BindingOptions,
} from "./binding/EditingSurfaceBinding";
export { UndoScope, type UndoStackState } from "./undo/UndoScope";
export {
	StalenessReconciler,
	type FetchSnapshot,
	type StalenessResult,
	type StalenessStats,
} from "./reconcile/StalenessReconciler";
export { decodeFromTransport, encodeForTransport } from "./transport/encoding";
export type { Transport } from "./transport/Transport";
export { TransportBridge } from "./transport/TransportBridge";
export {
	CollabSession,
	type CollabSessionOptions,
	type ReconcileOutcome,
	type SessionIdentity,
} from "./session/CollabSession";
