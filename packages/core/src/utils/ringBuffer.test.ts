import { describe, expect, it } from "vitest";
import { RingBuffer } from "./ringBuffer";

describe("RingBuffer", () => {
	it("keeps insertion order until full", () => {
		const buffer = new RingBuffer<number>(3);
		buffer.push(1);
		buffer.push(2);
		expect(buffer.toArray()).toEqual([1, 2]);
		expect(buffer.size).toBe(2);
		expect(buffer.isFull).toBe(false);
		expect(buffer.latest()).toBe(2);
	});

	it("evicts the oldest entry on insert when full", () => {
		const buffer = new RingBuffer<number>(3);
		[1, 2, 3].forEach((n) => buffer.push(n));
		expect(buffer.push(4)).toBe(1);
		expect(buffer.push(5)).toBe(2);
		expect(buffer.toArray()).toEqual([3, 4, 5]);
		expect(buffer.size).toBe(3);
		expect(buffer.latest()).toBe(5);
	});

	it("rejects a non-positive capacity", () => {
		expect(() => new RingBuffer<number>(0)).toThrow(/positive integer/);
	});

	it("clears all entries", () => {
		const buffer = new RingBuffer<string>(2);
		buffer.push("a");
		buffer.clear();
		expect(buffer.toArray()).toEqual([]);
		expect(buffer.latest()).toBeUndefined();
	});
});
