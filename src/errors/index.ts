export {
	LifecycleError,
	isLifecycleError,
	notInitialized,
	type LifecycleErrorCode,
} from "./LifecycleError";
export { runPhaseOf, tagRunPhase, type RunPhase } from "./runPhase";
