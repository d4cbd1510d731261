import { Color, RedBlackNode, TreeLinks } from '../RedBlackNode.js';
import { InvalidStateError } from '../errors.js';
import { getSibling, isBlack, isRoot, removeMin, replaceChild } from './navigation.js';
import { rotateLeft, rotateRight } from './rotations.js';

/**
 * Unlinks `node` from the tree and rebalances. The node's own links are cleared afterwards.
 *
 * A node with a right child is replaced by its in-order successor, which inherits the node's
 * position and color. Otherwise its left child (possibly null) takes its slot.
 */
export const removeNode = <T>(links: TreeLinks<T>, node: RedBlackNode<T>): void => {
	const { sentinel } = links;
	const parent = node.parent;

	const successor = node.right ? removeMin(node) : null;
	if (successor) {
		const successorWasBlack = successor.color === Color.BLACK;
		const successorWasRightChild = successor === node.right;
		// Where the deficit lands: the successor's former right child, under its former parent.
		const deficitNode = successor.right;
		const deficitParent = successorWasRightChild ? successor : successor.parent;

		successor.left = node.left;
		if (node.left) {
			node.left.parent = successor;
		}
		if (!successorWasRightChild) {
			successor.right = node.right;
			if (node.right) {
				node.right.parent = successor;
			}
		}
		replaceChild(sentinel, parent, node, successor);
		successor.color = node.color;

		if (successorWasBlack) {
			fixRemove(links, deficitNode, deficitParent);
		}
	} else {
		const child = node.left;
		replaceChild(sentinel, parent, node, child);
		if (node.color === Color.BLACK && sentinel.left) {
			fixRemove(links, child, parent);
		}
	}

	node.parent = null;
	node.left = null;
	node.right = null;

	const root = sentinel.left;
	if (root) {
		root.color = Color.BLACK;
		root.parent = null;
	}
};

/**
 * Restores black-height after a BLACK node left the path through `node`.
 * `node` may be null, in which case it names the missing child of `parent`. At most three rotations.
 */
export const fixRemove = <T>(links: TreeLinks<T>, node: RedBlackNode<T> | null, parent: RedBlackNode<T> | null): void => {
	const { sentinel } = links;
	let current = node;
	let currentParent = node ? node.parent : parent;

	while (isBlack(current) && !isRoot(sentinel, current)) {
		if (!currentParent) {
			throw new InvalidStateError('Black-height deficit below a missing parent.');
		}
		const sibling = getSibling(current, currentParent);
		if (!sibling) {
			throw new InvalidStateError(`Black-height deficit under ${String(currentParent.value)} with no sibling.`);
		}
		const isLeft = current === currentParent.left;

		if (sibling.color === Color.RED) {// Case 1: rotate a BLACK nephew into the sibling position.
			currentParent.color = Color.RED;
			sibling.color = Color.BLACK;
			if (isLeft) {
				rotateLeft(links, currentParent);
			} else {
				rotateRight(links, currentParent);
			}
			continue;
		}

		const nearNephew = isLeft ? sibling.left : sibling.right;
		const farNephew = isLeft ? sibling.right : sibling.left;

		if (farNephew && farNephew.color === Color.RED) {// Case 4: terminal.
			sibling.color = currentParent.color;
			currentParent.color = Color.BLACK;
			farNephew.color = Color.BLACK;
			if (isLeft) {
				rotateLeft(links, currentParent);
			} else {
				rotateRight(links, currentParent);
			}
			current = sentinel.left;
			break;
		}

		if (nearNephew && nearNephew.color === Color.RED) {// Case 3: the near nephew becomes the sibling, leaving case 4.
			nearNephew.color = Color.BLACK;
			sibling.color = Color.RED;
			if (isLeft) {
				rotateRight(links, sibling);
			} else {
				rotateLeft(links, sibling);
			}
			continue;
		}

		// Case 2: both nephews BLACK. Push the deficit up.
		sibling.color = Color.RED;
		current = currentParent;
		currentParent = current.parent;
	}

	if (current && current.color === Color.RED) {
		current.color = Color.BLACK;
	}
	const root = sentinel.left;
	if (root) {
		root.color = Color.BLACK;
		root.parent = null;
	}
};
