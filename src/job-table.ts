/**
 * JobTable - generation-indexed arena of live jobs with a ready queue
 */

import createDebug from "debug";

const debugTable = createDebug("scopeline:table");

/**
 * Stable identity of a table entry. A key stops resolving once its entry is
 * removed, even after the slot is reused.
 */
export interface JobKey {
	readonly index: number;
	readonly generation: number;
}

interface Slot<E> {
	generation: number;
	entry: E | undefined;
	queued: boolean;
}

/**
 * Holds the jobs of one scope.
 *
 * Insertion may happen at any time, including while a batch taken with
 * `takeReady()` is being processed; entries queued during that processing go
 * into the next batch.
 */
export class JobTable<E> implements Iterable<E> {
	private readonly slots: Slot<E>[] = [];
	private readonly free: number[] = [];
	private readyQueue: JobKey[] = [];
	private live = 0;

	get size(): number {
		return this.live;
	}

	get isEmpty(): boolean {
		return this.live === 0;
	}

	get hasReady(): boolean {
		return this.readyQueue.length > 0;
	}

	insert(entry: E): JobKey {
		const reused = this.free.pop();
		let index: number;
		let slot: Slot<E>;
		if (reused !== undefined) {
			index = reused;
			slot = this.slotAt(reused);
		} else {
			index = this.slots.length;
			slot = { generation: 0, entry: undefined, queued: false };
			this.slots.push(slot);
		}
		slot.entry = entry;
		slot.queued = false;
		this.live++;
		if (debugTable.enabled) {
			debugTable(
				"inserted at %d (generation %d, live: %d)",
				index,
				slot.generation,
				this.live,
			);
		}
		return { index, generation: slot.generation };
	}

	get(key: JobKey): E | undefined {
		return this.resolve(key)?.entry;
	}

	has(key: JobKey): boolean {
		return this.resolve(key) !== undefined;
	}

	remove(key: JobKey): E | undefined {
		const slot = this.resolve(key);
		if (!slot) return undefined;
		const entry = slot.entry;
		slot.entry = undefined;
		slot.queued = false;
		slot.generation++;
		this.free.push(key.index);
		this.live--;
		return entry;
	}

	/**
	 * Queue a live entry for the next batch. Returns false if the key is
	 * stale or already queued.
	 */
	markReady(key: JobKey): boolean {
		const slot = this.resolve(key);
		if (!slot || slot.queued) return false;
		slot.queued = true;
		this.readyQueue.push(key);
		return true;
	}

	/**
	 * Take every queued key in FIFO order, leaving an empty queue behind.
	 * Keys whose entry has since been removed are skipped.
	 */
	takeReady(): JobKey[] {
		const batch = this.readyQueue;
		this.readyQueue = [];
		const live: JobKey[] = [];
		for (const key of batch) {
			const slot = this.resolve(key);
			if (!slot) continue;
			slot.queued = false;
			live.push(key);
		}
		return live;
	}

	/**
	 * Remove every entry and return them in slot order.
	 */
	drain(): E[] {
		const drained: E[] = [];
		for (let index = 0; index < this.slots.length; index++) {
			const slot = this.slotAt(index);
			if (slot.entry === undefined) continue;
			drained.push(slot.entry);
			this.remove({ index, generation: slot.generation });
		}
		this.readyQueue = [];
		return drained;
	}

	*[Symbol.iterator](): Iterator<E> {
		for (const slot of this.slots) {
			if (slot.entry !== undefined) yield slot.entry;
		}
	}

	private resolve(key: JobKey): Slot<E> | undefined {
		const slot = this.slots[key.index];
		if (!slot || slot.generation !== key.generation) return undefined;
		if (slot.entry === undefined) return undefined;
		return slot;
	}

	private slotAt(index: number): Slot<E> {
		const slot = this.slots[index];
		if (!slot) {
			throw new Error(`JobTable slot ${index} out of range`);
		}
		return slot;
	}
}
