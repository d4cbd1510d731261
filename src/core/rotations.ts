import { RedBlackNode, TreeLinks } from '../RedBlackNode.js';
import { InvalidStateError } from '../errors.js';
import { replaceChild } from './navigation.js';

// Rotates left at the given node. Its right child takes its place.
export const rotateLeft = <T>(links: TreeLinks<T>, node: RedBlackNode<T>): RedBlackNode<T> => {
	const rightChild = node.right;
	if (!rightChild) {
		throw new InvalidStateError(`Cannot rotate left at ${String(node.value)}: no right child.`);
	}
	const parent = node.parent;
	node.right = rightChild.left;
	if (rightChild.left) {
		rightChild.left.parent = node;
	}
	replaceChild(links.sentinel, parent, node, rightChild);
	rightChild.left = node;
	node.parent = rightChild;
	links.onRotate?.('left', node);
	return rightChild;
};

// Rotates right at the given node. Its left child takes its place.
export const rotateRight = <T>(links: TreeLinks<T>, node: RedBlackNode<T>): RedBlackNode<T> => {
	const leftChild = node.left;
	if (!leftChild) {
		throw new InvalidStateError(`Cannot rotate right at ${String(node.value)}: no left child.`);
	}
	const parent = node.parent;
	node.left = leftChild.right;
	if (leftChild.right) {
		leftChild.right.parent = node;
	}
	replaceChild(links.sentinel, parent, node, leftChild);
	leftChild.right = node;
	node.parent = leftChild;
	links.onRotate?.('right', node);
	return leftChild;
};
