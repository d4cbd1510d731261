import { Color, Comparator, RedBlackNode } from './RedBlackNode.js';

const show = (value: unknown): string => String(value);

/**
 * Checks a tree rooted at `root` against the red-black invariants, parent back-references
 * and comparator ordering. Returns one message per violation; an empty array means the tree is valid.
 */
export const findViolations = <T>(root: RedBlackNode<T> | null, comparator: Comparator<T>): string[] => {
	const violations: string[] = [];
	if (!root) {
		return violations;
	}
	if (root.color !== Color.BLACK) {
		violations.push(`Root ${show(root.value)} is red.`);
	}
	if (root.parent !== null) {
		violations.push(`Root ${show(root.value)} has a parent reference.`);
	}

	// Pre-order walk. Reversing it visits every child before its parent.
	const preOrder: RedBlackNode<T>[] = [];
	const stack: RedBlackNode<T>[] = [root];
	for (let node = stack.pop(); node; node = stack.pop()) {
		preOrder.push(node);
		for (const child of [node.left, node.right]) {
			if (!child) {
				continue;
			}
			if (child.parent !== node) {
				violations.push(`Node ${show(child.value)} does not reference its parent ${show(node.value)}.`);
			}
			if (node.color === Color.RED && child.color === Color.RED) {
				violations.push(`Red node ${show(node.value)} has red child ${show(child.value)}.`);
			}
			stack.push(child);
		}
	}

	const blackHeights = new Map<RedBlackNode<T>, number>();
	const blackHeightOf = (node: RedBlackNode<T> | null): number => (node ? blackHeights.get(node) ?? 0 : 1);
	for (let i = preOrder.length - 1; i >= 0; i--) {
		const node = preOrder[i];
		const leftHeight = blackHeightOf(node.left);
		const rightHeight = blackHeightOf(node.right);
		if (leftHeight !== rightHeight) {
			violations.push(`Black height mismatch at node ${show(node.value)}: left ${leftHeight}, right ${rightHeight}.`);
		}
		blackHeights.set(node, Math.max(leftHeight, rightHeight) + (node.color === Color.BLACK ? 1 : 0));
	}

	// In-order walk for ordering.
	const inOrderStack: RedBlackNode<T>[] = [];
	let current: RedBlackNode<T> | null = root;
	let previous: RedBlackNode<T> | null = null;
	while (inOrderStack.length > 0 || current !== null) {
		while (current !== null) {
			inOrderStack.push(current);
			current = current.left;
		}
		const node = inOrderStack.pop();
		if (!node) {
			break;
		}
		if (previous && comparator(previous.value, node.value) >= 0) {
			violations.push(`Values out of order: ${show(previous.value)} before ${show(node.value)}.`);
		}
		previous = node;
		current = node.right;
	}

	return violations;
};

export const countNodes = <T>(root: RedBlackNode<T> | null): number => {
	let count = 0;
	const stack: RedBlackNode<T>[] = root ? [root] : [];
	for (let node = stack.pop(); node; node = stack.pop()) {
		count++;
		if (node.left) {
			stack.push(node.left);
		}
		if (node.right) {
			stack.push(node.right);
		}
	}
	return count;
};
