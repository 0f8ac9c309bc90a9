export { RwLock, type LockState, type WriteGuard } from "./RwLock";
export { PendingViewSwap, type SwapSlot } from "./PendingViewSwap";
export {
	ApplicationStore,
	type AppliedSwap,
	type ApplicationState,
	type StoreSnapshot,
} from "./ApplicationStore";
