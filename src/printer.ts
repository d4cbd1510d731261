import { Color } from './RedBlackNode.js';
import { LevelOrderEntry } from './traversal.js';

const colorLetter = (color: Color): string => (color === Color.RED ? 'R' : 'B');

export const formatEntry = <T>(entry: LevelOrderEntry<T>, formatValue: (value: T) => string = String): string => {
	const value = formatValue(entry.value);
	if (entry.relation === 'root' || entry.parent === undefined) {
		return `${value}(${colorLetter(entry.color)})`;
	}
	return `${value}(${colorLetter(entry.color)} ${formatValue(entry.parent)} ${entry.relation})`;
};

/**
 * Renders a level-order walk one tree level per line, e.g.
 *
 *   2(B)
 *   1(R 2 left)	3(R 2 right)
 */
export const formatLevelOrder = <T>(entries: Iterable<LevelOrderEntry<T>>, formatValue: (value: T) => string = String): string => {
	const lines: string[][] = [];
	for (const entry of entries) {
		while (lines.length <= entry.depth) {
			lines.push([]);
		}
		lines[entry.depth].push(formatEntry(entry, formatValue));
	}
	return lines.map(line => line.join('\t')).join('\n');
};
