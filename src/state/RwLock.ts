/**
 * Reader/Writer Lock
 * Async many-readers-or-one-writer cell with FIFO fairness
 *
 * Each acquisition is recorded in the async context of the call chain that
 * holds it. Asking for the same lock again from inside that chain would never
 * be granted, so it throws a REENTRANT_LOCK LifecycleError instead.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { LifecycleError } from "../errors";

type LockMode = "read" | "write";

interface Hold {
	owner: object;
	mode: LockMode;
	released: boolean;
}

interface Waiter {
	mode: LockMode;
	grant: () => void;
}

/**
 * Mutable view of the locked value, valid while the write lock is held
 */
export interface WriteGuard<T> {
	value: T;
}

/**
 * Snapshot of lock occupancy
 */
export interface LockState {
	readers: number;
	writing: boolean;
	waiting: number;
}

const heldLocks = new AsyncLocalStorage<readonly Hold[]>();

function currentHolds(): readonly Hold[] {
	return heldLocks.getStore() ?? [];
}

export class RwLock<T> {
	private value: T;
	private readers = 0;
	private writing = false;
	private waiters: Waiter[] = [];

	constructor(
		initial: T,
		private readonly name: string = "RwLock",
	) {
		this.value = initial;
	}

	/**
	 * Run `fn` with shared access to the value
	 * The lock is held until the returned promise settles
	 */
	async read<R>(fn: (value: T) => R | Promise<R>): Promise<R> {
		const hold = await this.acquire("read");
		try {
			return await heldLocks.run([...currentHolds(), hold], () =>
				fn(this.value),
			);
		} finally {
			this.release(hold);
		}
	}

	/**
	 * Run `fn` with exclusive access to the value
	 * Assignments to `guard.value` are committed when `fn` settles
	 */
	async write<R>(fn: (guard: WriteGuard<T>) => R | Promise<R>): Promise<R> {
		const hold = await this.acquire("write");
		const guard: WriteGuard<T> = { value: this.value };
		try {
			return await heldLocks.run([...currentHolds(), hold], () => fn(guard));
		} finally {
			this.value = guard.value;
			this.release(hold);
		}
	}

	/**
	 * Current occupancy (for diagnostics and tests)
	 */
	get state(): LockState {
		return {
			readers: this.readers,
			writing: this.writing,
			waiting: this.waiters.length,
		};
	}

	private acquire(mode: LockMode): Promise<Hold> {
		const alreadyHeld = currentHolds().some(
			(hold) => hold.owner === this && !hold.released,
		);
		if (alreadyHeld) {
			throw new LifecycleError(
				"REENTRANT_LOCK",
				`${this.name}: ${mode} access requested while the same call chain already holds it`,
			);
		}

		const hold: Hold = { owner: this, mode, released: false };

		// Queue behind any waiter so a steady stream of readers cannot starve a writer
		if (!this.writing && this.waiters.length === 0) {
			if (mode === "read") {
				this.readers++;
				return Promise.resolve(hold);
			}
			if (this.readers === 0) {
				this.writing = true;
				return Promise.resolve(hold);
			}
		}

		return new Promise((resolve) => {
			this.waiters.push({ mode, grant: () => resolve(hold) });
		});
	}

	private release(hold: Hold): void {
		if (hold.released) return;
		hold.released = true;

		if (hold.mode === "write") {
			this.writing = false;
		} else {
			this.readers--;
		}

		this.drain();
	}

	private drain(): void {
		while (this.waiters.length > 0 && !this.writing) {
			const next = this.waiters[0];

			if (next.mode === "write") {
				if (this.readers > 0) return;
				this.waiters.shift();
				this.writing = true;
				next.grant();
				return;
			}

			this.waiters.shift();
			this.readers++;
			next.grant();
		}
	}
}
