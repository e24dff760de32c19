"use strict";
export class DefaultTimeProvider implements TimeProvider {
	private timeouts = new Map<number, ReturnType<typeof setTimeout>>();
	private intervals = new Map<number, ReturnType<typeof setInterval>>();
	private nextId = 1;

	getTime(): number {
		return Date.now();
	}

	setInterval(callback: () => void, ms: number): number {
		const id = this.nextId++;
		this.intervals.set(id, setInterval(callback, ms));
		return id;
	}

	clearInterval(timerId: number): void {
		const timer = this.intervals.get(timerId);
		if (timer !== undefined) {
			clearInterval(timer);
			this.intervals.delete(timerId);
		}
	}

	setTimeout(callback: () => void, ms: number): number {
		const id = this.nextId++;
		const timer = setTimeout(() => {
			this.timeouts.delete(id);
			callback();
		}, ms);
		this.timeouts.set(id, timer);
		return id;
	}

	clearTimeout(timerId: number): void {
		const timer = this.timeouts.get(timerId);
		if (timer !== undefined) {
			clearTimeout(timer);
			this.timeouts.delete(timerId);
		}
	}

	destroy(): void {
		for (const timer of this.timeouts.values()) {
			clearTimeout(timer);
		}
		this.timeouts.clear();
		for (const interval of this.intervals.values()) {
			clearInterval(interval);
		}
		this.intervals.clear();
	}

	debounce<A extends unknown[]>(
		func: (...args: A) => void,
		delay: number = 500,
	): Debounced<A> {
		let timer: number | null = null;
		const debounced = (...args: A) => {
			if (timer !== null) {
				this.clearTimeout(timer);
			}
			timer = this.setTimeout(() => {
				timer = null;
				func(...args);
			}, delay);
		};
		debounced.cancel = () => {
			if (timer !== null) {
				this.clearTimeout(timer);
				timer = null;
			}
		};
		return debounced;
	}
}

export type Debounced<A extends unknown[]> = ((...args: A) => void) & {
	cancel: () => void;
};

export interface TimeProvider {
	getTime: () => number;
	setInterval: (callback: () => void, ms: number) => number;
	clearInterval: (timerId: number) => void;
	setTimeout: (callback: () => void, ms: number) => number;
	clearTimeout: (timerId: number) => void;
	destroy: () => void;
	debounce: <A extends unknown[]>(
		func: (...args: A) => void,
		delay: number,
	) => Debounced<A>;
}
