export enum Color {
	RED,
	BLACK,
}

export type Comparator<T> = (a: T, b: T) => number;

// Total order over every number: -0 equals 0, NaN equals itself and sorts last.
export const compareNumbers: Comparator<number> = (a, b) => {
	if (a < b) return -1;
	if (a > b) return 1;
	if (a === b || (Number.isNaN(a) && Number.isNaN(b))) return 0;
	return Number.isNaN(a) ? 1 : -1;
};
export const compareStrings: Comparator<string> = (a, b) => (a < b ? -1 : a > b ? 1 : 0);

export class RedBlackNode<T> {
	value: T;
	color: Color;
	left: RedBlackNode<T> | null = null;
	right: RedBlackNode<T> | null = null;
	parent: RedBlackNode<T> | null = null;// Back-reference only. Always null for the tree root.

	constructor(value: T, color: Color = Color.RED) {
		this.value = value;
		this.color = color;// New nodes are RED unless they become the root.
	}
}

/**
 * Holds no value. Its left link is the actual root, so relinking "the parent of the root"
 * means relinking this slot.
 */
export class SentinelNode<T> {
	left: RedBlackNode<T> | null = null;
}

/**
 * What the balancing code needs from a tree: the sentinel it relinks through and an
 * optional hook told about every rotation.
 */
export interface TreeLinks<T> {
	readonly sentinel: SentinelNode<T>;
	readonly onRotate?: RotationHook<T>;
}

export type RotationDirection = 'left' | 'right';

export type RotationHook<T> = (direction: RotationDirection, node: RedBlackNode<T>) => void;
