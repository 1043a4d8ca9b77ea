/**
 * Fixed-capacity FIFO. Pushing into a full buffer evicts the oldest entry.
 */
export class RingBuffer<T> {
	private readonly slots: Array<T | undefined>;
	private start = 0;
	private count = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new Error(`RingBuffer capacity must be a positive integer, got ${capacity}`);
		}
		this.slots = new Array<T | undefined>(capacity);
	}

	get size(): number {
		return this.count;
	}

	get isFull(): boolean {
		return this.count === this.capacity;
	}

	/** Returns the evicted entry when the buffer was full. */
	push(item: T): T | undefined {
		if (this.count < this.capacity) {
			this.slots[(this.start + this.count) % this.capacity] = item;
			this.count += 1;
			return undefined;
		}
		const evicted = this.slots[this.start];
		this.slots[this.start] = item;
		this.start = (this.start + 1) % this.capacity;
		return evicted;
	}

	/** Oldest first. */
	toArray(): T[] {
		const out: T[] = [];
		for (let i = 0; i < this.count; i += 1) {
			const item = this.slots[(this.start + i) % this.capacity];
			if (item !== undefined) {
				out.push(item);
			}
		}
		return out;
	}

	latest(): T | undefined {
		return this.count === 0
			? undefined
			: this.slots[(this.start + this.count - 1) % this.capacity];
	}

	clear(): void {
		this.slots.fill(undefined);
		this.start = 0;
		this.count = 0;
	}
}
