import { Color, RedBlackNode } from './RedBlackNode.js';

export type ChildRelation = 'root' | 'left' | 'right';

export interface LevelOrderEntry<T> {
	readonly value: T;
	readonly color: Color;
	readonly relation: ChildRelation;
	readonly parent: T | undefined;// Undefined for the root.
	readonly depth: number;
}

// In-order iterator.
export function* inOrder<T>(root: RedBlackNode<T> | null): Generator<T, void, undefined> {
	const stack: RedBlackNode<T>[] = [];
	let current = root;

	while (stack.length > 0 || current !== null) {
		while (current !== null) {
			stack.push(current);
			current = current.left;
		}
		const node = stack.pop();
		if (!node) {
			return;
		}
		yield node.value;
		current = node.right;
	}
}

// Breadth-first, level by level, left to right. Queue driven so depth never touches the call stack.
export function* levelOrder<T>(root: RedBlackNode<T> | null): Generator<LevelOrderEntry<T>, void, undefined> {
	if (!root) {
		return;
	}
	const queue: [RedBlackNode<T>, number][] = [[root, 0]];
	for (let head = 0; head < queue.length; head++) {
		const [node, depth] = queue[head];
		const parent = node.parent;
		yield {
			value: node.value,
			color: node.color,
			relation: !parent ? 'root' : parent.left === node ? 'left' : 'right',
			parent: parent ? parent.value : undefined,
			depth,
		};
		if (node.left) {
			queue.push([node.left, depth + 1]);
		}
		if (node.right) {
			queue.push([node.right, depth + 1]);
		}
	}
}
