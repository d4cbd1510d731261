import { expect, test, describe } from 'vitest';

import { RedBlackTree } from '../src/RedBlackTree.js';
import { compareStrings } from '../src/RedBlackNode.js';
import { SCENARIO_VALUES, countRotations, createNumberTree, expectValid, range, shuffled, treeOf } from './testUtils.js';

type Account = { id: number; owner: string };
const byId = (a: Account, b: Account) => a.id - b.id;

describe('RedBlackTree (Number Values)', () => {
	test('should initialize an empty tree', () => {
		const tree = createNumberTree();
		expect(tree.size).toBe(0);
		expect(tree.isEmpty()).toBe(true);
		expect(tree.find(1)).toBeUndefined();
		expect(tree.isOverrideMode()).toBe(true);
		expect([...tree]).toEqual([]);
		expectValid(tree);
	});

	test('should insert a single value and find it', () => {
		const tree = createNumberTree();
		expect(tree.insert(1)).toBeUndefined();
		expect(tree.size).toBe(1);
		expect(tree.find(1)).toBe(1);
		expect(tree.find(2)).toBeUndefined();
		expect(tree.has(1)).toBe(true);
		expect(tree.has(2)).toBe(false);
		expectValid(tree);
	});

	test('should clear the tree', () => {
		const tree = treeOf([1, 2, 3]);
		tree.clear();
		expect(tree.size).toBe(0);
		expect(tree.find(1)).toBeUndefined();
		expect([...tree.values()]).toEqual([]);
		expectValid(tree);
		tree.insert(4);
		expect([...tree]).toEqual([4]);
	});

	test('should keep the reference sequence sorted and balanced', () => {
		const tree = treeOf(SCENARIO_VALUES);
		expect(tree.size).toBe(20);
		expect([...tree]).toEqual(range(20));
		expectValid(tree);

		expect(tree.remove(12)).toBe(12);
		expect(tree.size).toBe(19);
		expect([...tree]).toEqual(range(20).filter(value => value !== 12));
		expect(tree.find(12)).toBeUndefined();
		expectValid(tree);
	});

	test('should return undefined when removing a value that is absent', () => {
		const tree = treeOf([1]);
		expect(tree.remove(2)).toBeUndefined();
		expect(tree.size).toBe(1);
		expectValid(tree);
	});

	test('should remove every value in any order', () => {
		for (const seed of [1, 2, 3, 4, 5]) {
			const values = shuffled(range(200), seed);
			const tree = treeOf(values);
			expect(tree.size).toBe(200);
			for (const value of shuffled(values, seed * 31)) {
				expect(tree.remove(value)).toBe(value);
				expect(tree.find(value)).toBeUndefined();
			}
			expect(tree.size).toBe(0);
			expect(tree.isEmpty()).toBe(true);
			expect(range(200).every(value => tree.find(value) === undefined)).toBe(true);
			expectValid(tree);
		}
	});

	test('should keep invariants through interleaved inserts and removes', () => {
		const tree = createNumberTree();
		const present = new Set<number>();
		const operations = shuffled(range(600), 7).map(value => value % 150);
		operations.forEach((value, index) => {
			if (index % 3 === 2) {
				expect(tree.remove(value)).toBe(present.has(value) ? value : undefined);
				present.delete(value);
			} else {
				tree.insert(value);
				present.add(value);
			}
			expect(tree.size).toBe(present.size);
		});
		expectValid(tree);
		expect([...tree]).toEqual([...present].sort((a, b) => a - b));
	});

	test('should handle a large number of insertions and deletions', () => {
		const tree = createNumberTree();
		const N = 1000;
		const keys = shuffled(range(N), 1000);

		keys.forEach(k => tree.insert(k));
		expect(tree.size).toBe(N);
		expectValid(tree);

		for (let i = 0; i < N / 2; i++) {
			expect(tree.remove(keys[i])).toBe(keys[i]);
		}
		expect(tree.size).toBe(N - N / 2);
		expectValid(tree);

		const remainingKeys = keys.slice(N / 2).sort((a, b) => a - b);
		expect([...tree.values()]).toEqual(remainingKeys);
	});

	test('should treat repeated infinities as one key', () => {
		const tree = treeOf([Infinity, Infinity, -Infinity, -Infinity]);
		expect(tree.size).toBe(2);
		expect([...tree]).toEqual([-Infinity, Infinity]);
		expect(tree.remove(Infinity)).toBe(Infinity);
		expect(tree.has(Infinity)).toBe(false);
		expect(tree.size).toBe(1);
		expectValid(tree);
	});

	test('should keep NaN as a single key sorted last', () => {
		const tree = treeOf([NaN, 1, NaN, Infinity]);
		expect(tree.size).toBe(3);
		expect([...tree]).toEqual([1, Infinity, NaN]);
		expect(tree.has(NaN)).toBe(true);
		expectValid(tree);
	});

	test('should not match a value the comparator cannot order', () => {
		const tree = new RedBlackTree<number>((a, b) => a - b);
		[1, 2, 3].forEach(value => tree.insert(value));
		expect(tree.find(NaN)).toBeUndefined();
		expect(tree.has(NaN)).toBe(false);
		expect(tree.remove(NaN)).toBeUndefined();
		expect(tree.size).toBe(3);
		expect([...tree]).toEqual([1, 2, 3]);
		expectValid(tree);
	});

	describe('Rotations', () => {
		test('should rotate at most twice per insert and three times per remove', () => {
			for (const seed of [11, 12, 13]) {
				const values = shuffled(range(300), seed);
				const tree = createNumberTree();
				for (const value of values) {
					expect(countRotations(tree, () => tree.insert(value))).toBeLessThanOrEqual(2);
				}
				for (const value of shuffled(values, seed + 100)) {
					expect(countRotations(tree, () => tree.remove(value))).toBeLessThanOrEqual(3);
				}
			}
		});

		test('should report direction and pivot value', () => {
			const tree = createNumberTree();
			const seen: string[] = [];
			tree.on('rotate', (direction, value) => seen.push(`${direction}:${value}`));
			[3, 1, 2].forEach(value => tree.insert(value));
			expect(seen).toEqual(['left:1', 'right:3']);
		});

		test('should report rotations after the tree is rebalanced', () => {
			const tree = treeOf([1, 2]);
			const sizes: number[] = [];
			tree.on('rotate', () => {
				sizes.push(tree.size);
				expectValid(tree);
			});
			tree.insert(3);
			expect(sizes).toEqual([3]);
		});

		test('should stay consistent when a rotate listener throws', () => {
			const tree = treeOf([1, 2]);
			const failing = () => {
				throw new Error('listener failed');
			};
			tree.on('rotate', failing);
			expect(() => tree.insert(3)).toThrow('listener failed');
			expect(tree.size).toBe(3);
			expect([...tree]).toEqual([1, 2, 3]);
			expectValid(tree);

			tree.off('rotate', failing);
			[4, 5].forEach(value => tree.insert(value));
			tree.on('rotate', failing);
			expect(() => tree.remove(1)).toThrow('listener failed');
			expect(tree.size).toBe(4);
			expect([...tree]).toEqual([2, 3, 4, 5]);
			expectValid(tree);
		});

		test('should count the reference scenario', () => {
			const tree = createNumberTree();
			expect(countRotations(tree, () => SCENARIO_VALUES.forEach(value => tree.insert(value)))).toBe(13);
			expect(countRotations(tree, () => tree.remove(12))).toBe(1);
		});
	});
});

describe('RedBlackTree (Override Mode)', () => {
	test('should replace the stored value when override mode is on', () => {
		const tree = new RedBlackTree<Account>(byId);
		const first = { id: 1, owner: 'first' };
		const second = { id: 1, owner: 'second' };
		expect(tree.insert(first)).toBeUndefined();
		expect(tree.insert(second)).toBe(first);
		expect(tree.size).toBe(1);
		expect(tree.find({ id: 1, owner: '' })).toBe(second);
		expectValid(tree);
	});

	test('should ignore duplicates when override mode is off', () => {
		const tree = new RedBlackTree<Account>(byId, { overrideMode: false });
		const first = { id: 1, owner: 'first' };
		expect(tree.isOverrideMode()).toBe(false);
		tree.insert(first);
		expect(tree.insert({ id: 1, owner: 'second' })).toBe(first);
		expect(tree.size).toBe(1);
		expect(tree.find({ id: 1, owner: '' })).toBe(first);
	});

	test('should apply a changed flag to later inserts only', () => {
		const tree = new RedBlackTree<Account>(byId, { overrideMode: false });
		const first = { id: 1, owner: 'first' };
		const second = { id: 1, owner: 'second' };
		tree.insert(first);
		tree.insert(second);
		expect(tree.find(first)).toBe(first);

		tree.setOverrideMode(true);
		expect(tree.isOverrideMode()).toBe(true);
		expect(tree.find(first)).toBe(first);
		expect(tree.insert(second)).toBe(first);
		expect(tree.find(first)).toBe(second);
		expect(tree.size).toBe(1);
	});

	test('should return the stored value on remove', () => {
		const tree = new RedBlackTree<Account>(byId);
		const stored = { id: 7, owner: 'stored' };
		tree.insert(stored);
		expect(tree.remove({ id: 7, owner: 'probe' })).toBe(stored);
		expect(tree.find(stored)).toBeUndefined();
	});
});

describe('RedBlackTree (String Values)', () => {
	test('should handle string values correctly, including iteration and deletion', () => {
		const tree = new RedBlackTree<string>(compareStrings);
		const words = ['banana', 'apple', 'orange', 'grape', 'cherry'];
		words.forEach(word => tree.insert(word));

		expect([...tree]).toEqual(['apple', 'banana', 'cherry', 'grape', 'orange']);
		expect(tree.find('apple')).toBe('apple');
		expect(tree.find('kiwi')).toBeUndefined();

		expect(tree.remove('orange')).toBe('orange');
		expect(tree.size).toBe(4);
		expect([...tree]).toEqual(['apple', 'banana', 'cherry', 'grape']);
		expectValid(tree);
	});
});
