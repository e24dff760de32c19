/** Callback to inform of a value update. */
export type Subscriber<T> = (value: T) => void;

/** Removes a previously registered listener. */
export type Unsubscriber = () => void;

/** Handle returned by `subscribe`, passed back to `unsubscribe`. */
export type SubscriptionId = number;

/**
 * A single replacement of `[from, to)` with `insert`.
 *
 * In a batch, positions refer to the document as it was before the batch was
 * applied; changes are sorted and never overlap.
 */
export interface TextChange {
	from: number;
	to: number;
	insert: string;
}

export interface SelectionOffsets {
	anchor: number;
	head: number;
}

export function clampOffset(offset: number, length: number): number {
	if (!Number.isFinite(offset) || offset < 0) return 0;
	return Math.min(Math.floor(offset), length);
}

export function clampSelection(
	selection: SelectionOffsets,
	length: number,
): SelectionOffsets {
	return {
		anchor: clampOffset(selection.anchor, length),
		head: clampOffset(selection.head, length),
	};
}
