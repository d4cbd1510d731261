import { Color, Comparator, RedBlackNode, TreeLinks } from '../RedBlackNode.js';
import { InvalidStateError } from '../errors.js';
import { getUncle, isRed } from './navigation.js';
import { rotateLeft, rotateRight } from './rotations.js';

export type InsertResult<T> =
	| { kind: 'inserted' }
	| { kind: 'replaced'; previous: T }
	| { kind: 'ignored'; existing: T };

/**
 * Walks down from `root` looking for `value`.
 * Returns the node holding an equal value, or the last node visited (the would-be parent),
 * together with the comparison of `value` against that node.
 */
export const findParent = <T>(root: RedBlackNode<T>, value: T, comparator: Comparator<T>): [RedBlackNode<T>, number] => {
	let node = root;
	while (true) {
		const cmp = comparator(value, node.value);
		if (cmp === 0) {
			return [node, cmp];
		}
		const next = cmp < 0 ? node.left : node.right;
		if (!next) {
			return [node, cmp];
		}
		node = next;
	}
};

export const insertValue = <T>(links: TreeLinks<T>, comparator: Comparator<T>, value: T, overrideMode: boolean): InsertResult<T> => {
	const root = links.sentinel.left;
	if (!root) {
		links.sentinel.left = new RedBlackNode(value, Color.BLACK);
		return { kind: 'inserted' };
	}

	const [parent, cmp] = findParent(root, value, comparator);
	if (cmp === 0) {
		const previous = parent.value;
		if (overrideMode) {
			parent.value = value;// Same key, same position. No rebalancing needed.
			return { kind: 'replaced', previous };
		}
		return { kind: 'ignored', existing: previous };
	}

	const node = new RedBlackNode(value);
	node.parent = parent;
	if (cmp < 0) {
		parent.left = node;
	} else {
		parent.right = node;
	}
	fixInsert(links, node);
	return { kind: 'inserted' };
};

// Restores the invariants after linking the RED leaf `node`. At most two rotations.
export const fixInsert = <T>(links: TreeLinks<T>, node: RedBlackNode<T>): void => {
	let current = node;
	let parent = current.parent;
	while (parent && isRed(parent)) {
		const grandparent = parent.parent;
		if (!grandparent) {
			throw new InvalidStateError(`Red node ${String(parent.value)} is the root.`);
		}

		const uncle = getUncle(current);
		if (uncle && uncle.color === Color.RED) {// Uncle is RED: recolor and continue from the grandparent.
			parent.color = Color.BLACK;
			uncle.color = Color.BLACK;
			grandparent.color = Color.RED;
			current = grandparent;
			parent = current.parent;
			continue;
		}

		if (parent === grandparent.left) {
			const isTriangle = current === parent.right;
			if (isTriangle) {
				rotateLeft(links, parent);
			}
			rotateRight(links, grandparent);
			if (isTriangle) {
				current.color = Color.BLACK;// current moved up twice and now heads the subtree.
			} else {
				parent.color = Color.BLACK;
			}
		} else {
			const isTriangle = current === parent.left;
			if (isTriangle) {
				rotateRight(links, parent);
			}
			rotateLeft(links, grandparent);
			if (isTriangle) {
				current.color = Color.BLACK;
			} else {
				parent.color = Color.BLACK;
			}
		}
		grandparent.color = Color.RED;
		break;
	}

	const root = links.sentinel.left;
	if (root) {
		root.color = Color.BLACK;
		root.parent = null;
	}
};
