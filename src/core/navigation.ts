import { Color, RedBlackNode, SentinelNode } from '../RedBlackNode.js';

// Null children count as BLACK.
export const isBlack = <T>(node: RedBlackNode<T> | null): boolean => {
	return node === null || node.color === Color.BLACK;
};

export const isRed = <T>(node: RedBlackNode<T> | null): boolean => {
	return node !== null && node.color === Color.RED;
};

export const isRoot = <T>(sentinel: SentinelNode<T>, node: RedBlackNode<T> | null): boolean => {
	return node !== null && sentinel.left === node && node.parent === null;
};

// The cursor may be null when it stands for the missing child of `parent`.
export const getSibling = <T>(node: RedBlackNode<T> | null, parent: RedBlackNode<T>): RedBlackNode<T> | null => {
	return node === parent.left ? parent.right : parent.left;
};

export const getUncle = <T>(node: RedBlackNode<T>): RedBlackNode<T> | null => {
	const parent = node.parent;
	const grandparent = parent ? parent.parent : null;
	if (!parent || !grandparent) {
		return null;
	}
	return parent === grandparent.left ? grandparent.right : grandparent.left;
};

// Points the slot that held `oldChild` (under `parent`, or the sentinel when `parent` is null) at `newChild`.
export const replaceChild = <T>(
	sentinel: SentinelNode<T>,
	parent: RedBlackNode<T> | null,
	oldChild: RedBlackNode<T>,
	newChild: RedBlackNode<T> | null
): void => {
	if (!parent) {
		sentinel.left = newChild;
	} else if (parent.left === oldChild) {
		parent.left = newChild;
	} else {
		parent.right = newChild;
	}
	if (newChild) {
		newChild.parent = parent;
	}
};

/**
 * Finds the in-order successor of a node that has a right child.
 *
 * When the right child has no left child it is the successor and nothing is relinked.
 * Otherwise the leftmost node of the right subtree is detached: its right subtree moves
 * into its parent's left slot. The detached node keeps its own `parent` and `right` links
 * so the caller can still tell where the black-height deficit lands.
 */
export const removeMin = <T>(node: RedBlackNode<T>): RedBlackNode<T> | null => {
	let min = node.right;
	if (!min) {
		return null;
	}
	let parent = min;
	while (min.left) {
		parent = min;
		min = min.left;
	}
	if (parent === min) {
		return min;
	}
	parent.left = min.right;
	if (min.right) {
		min.right.parent = parent;
	}
	return min;
};
