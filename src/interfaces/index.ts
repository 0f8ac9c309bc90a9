/**
 * Interfaces module
 */

export type { IAppLifecycle } from "./IAppLifecycle";
