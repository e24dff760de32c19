"use strict";

import { HasLogging } from "../debug";
import type { Subscriber, SubscriptionId, Unsubscriber } from "../types";

// Ids are unique across every observable so a component that owns several can
// accept any of them in a single `unsubscribe`.
let nextSubscriptionId: SubscriptionId = 1;

export interface IObservable<T> {
	subscribe(run: Subscriber<T>): SubscriptionId;
	unsubscribe(id: SubscriptionId): boolean;
	on(run: Subscriber<T>): Unsubscriber;
}

/**
 * Registered-callback list keyed by subscription id.
 *
 * Delivery is synchronous. A listener that throws is logged and skipped; the
 * remaining listeners still receive the value.
 */
export class Observable<T> extends HasLogging implements IObservable<T> {
	protected _listeners = new Map<SubscriptionId, Subscriber<T>>();
	protected destroyed = false;

	constructor(public observableName?: string) {
		super(observableName ? `Observable:${observableName}` : undefined);
	}

	get size(): number {
		return this._listeners.size;
	}

	has(id: SubscriptionId): boolean {
		return this._listeners.has(id);
	}

	subscribe(run: Subscriber<T>): SubscriptionId {
		const id = nextSubscriptionId++;
		if (this.destroyed) {
			this.warn(`subscribe after destroy on ${this.observableName}`);
			return id;
		}
		this._listeners.set(id, run);
		return id;
	}

	on(run: Subscriber<T>): Unsubscriber {
		const id = this.subscribe(run);
		return () => {
			this.unsubscribe(id);
		};
	}

	unsubscribe(id: SubscriptionId): boolean {
		return this._listeners.delete(id);
	}

	notifyListeners(value: T): void {
		if (this.destroyed) return;
		// snapshot: listeners may unsubscribe while being notified
		for (const [id, listener] of [...this._listeners]) {
			if (!this._listeners.has(id)) continue;
			try {
				listener(value);
			} catch (e) {
				this.error(
					`listener ${id} on ${this.observableName ?? "observable"} threw`,
					e,
				);
			}
		}
	}

	destroy() {
		if (this.destroyed) return;
		this.destroyed = true;
		this._listeners.clear();
	}
}
