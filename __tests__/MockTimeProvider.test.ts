import { describe, test, expect, jest } from "@jest/globals";
import { MockTimeProvider } from "./mocks/MockTimeProvider";

describe("MockTimeProvider", () => {
	test("timeouts fire once the clock passes their trigger time", () => {
		const mockTime = new MockTimeProvider(1_000);
		const mockFn = jest.fn();
		mockTime.setTimeout(mockFn, 100);

		mockTime.advance(99);
		expect(mockFn).not.toHaveBeenCalled();

		mockTime.advance(1);
		expect(mockFn).toHaveBeenCalledTimes(1);
		expect(mockTime.pendingTimers).toBe(0);
	});

	test("intervals fire once per elapsed period", () => {
		const mockTime = new MockTimeProvider(0);
		const mockFn = jest.fn();
		const id = mockTime.setInterval(mockFn, 10);

		mockTime.advance(35);
		expect(mockFn).toHaveBeenCalledTimes(3);

		mockTime.clearInterval(id);
		mockTime.advance(100);
		expect(mockFn).toHaveBeenCalledTimes(3);
	});

	test("callbacks observe the time they were due at", () => {
		const mockTime = new MockTimeProvider(0);
		const seen: number[] = [];
		mockTime.setTimeout(() => seen.push(mockTime.getTime()), 20);
		mockTime.setTimeout(() => seen.push(mockTime.getTime()), 10);

		mockTime.advance(50);

		expect(seen).toEqual([10, 20]);
		expect(mockTime.getTime()).toBe(50);
	});
});

describe("MockTimeProvider debounce", () => {
	test("multiple calls within the delay trigger once with the last arguments", () => {
		const mockTime = new MockTimeProvider(0);
		const mockFn = jest.fn();
		const debouncedFn = mockTime.debounce(mockFn, 1000);

		debouncedFn("first", 1);
		mockTime.advance(300);
		debouncedFn("second", 2);
		mockTime.advance(999);
		expect(mockFn).not.toHaveBeenCalled();

		mockTime.advance(1);
		expect(mockFn).toHaveBeenCalledTimes(1);
		expect(mockFn).toHaveBeenCalledWith("second", 2);
	});

	test("cancel drops the pending call", () => {
		const mockTime = new MockTimeProvider(0);
		const mockFn = jest.fn();
		const debouncedFn = mockTime.debounce(mockFn, 500);

		debouncedFn();
		debouncedFn.cancel();
		mockTime.advance(1000);

		expect(mockFn).not.toHaveBeenCalled();
	});
});
