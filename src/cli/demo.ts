import { RedBlackTree } from '../RedBlackTree.js';
import { compareNumbers } from '../RedBlackNode.js';
import { unixTime3Decimal } from '../utils/util.js';
import { formatLevelOrder } from '../printer.js';

export type DemoResult = {
	tree: RedBlackTree<number>;
	rotations: number;
	violations: string[];
};

/**
 * Inserts `values`, prints the tree, removes `remove` and prints it again.
 * Every line goes through `write`.
 */
export const runDemo = ({ values, remove, overrideMode, enableConsoleDebugLog, write }: {
	values: readonly number[];
	remove: readonly number[];
	overrideMode?: boolean;
	enableConsoleDebugLog?: boolean;
	write: (line: string) => void;
}): DemoResult => {
	const tree = new RedBlackTree<number>(compareNumbers, { overrideMode });
	let rotations = 0;
	tree.on('rotate', (direction, value) => {
		rotations++;
		enableConsoleDebugLog && write(`${unixTime3Decimal()} - Rotated ${direction} at ${value}.`);
	});

	for (const value of values) {
		tree.insert(value);
	}
	write('Tree after inserting:');
	write(formatLevelOrder(tree.levelOrder()));

	for (const value of remove) {
		const removed = tree.remove(value);
		enableConsoleDebugLog && write(`${unixTime3Decimal()} - ${removed === undefined ? 'Not found' : 'Removed'}: ${value}.`);
	}
	write(`Tree after removing ${remove.join(', ')}:`);
	write(formatLevelOrder(tree.levelOrder()));
	write(`Size: ${tree.size}.`);

	return { tree, rotations, violations: tree.verify() };
};
